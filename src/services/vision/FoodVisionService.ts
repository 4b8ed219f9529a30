/**
 * FoodVisionService — the image analysis capability.
 *
 * Implementations:
 *   - GeminiVisionService  (production — Google Gemini)
 *   - MockVisionService    (offline dev / tests)
 */
import type { CaptureFrame } from '../../types/models';

export interface FoodVisionService {
  /**
   * Describe the food in a captured frame.
   * @param prompt - defaults to FOOD_ANALYSIS_PROMPT
   * @returns the model's free-text answer, food name on the first line
   */
  analyzeImage(frame: CaptureFrame, prompt?: string): Promise<string>;
}
