/**
 * Vision service factory.
 *
 * Returns GeminiVisionService when VISION_PROVIDER is `gemini`,
 * MockVisionService otherwise.
 */
import type { Env } from '../../config/env';
import type { FoodVisionService } from './FoodVisionService';
import { GeminiVisionService } from './GeminiVisionService';
import { MockVisionService } from './MockVisionService';

export { type FoodVisionService } from './FoodVisionService';
export { GeminiVisionService, type ContentGenerator, type GeminiVisionOptions } from './GeminiVisionService';
export { MockVisionService, MOCK_ANALYSES } from './MockVisionService';
export { compressImage, encodeJpeg, type CompressedImage } from './imageCompress';
export { FOOD_ANALYSIS_PROMPT } from './prompts';
export * from './types';

export function createVisionService(env: Env): FoodVisionService {
  if (env.VISION_PROVIDER === 'gemini') {
    return new GeminiVisionService({ apiKey: env.GEMINI_API_KEY, model: env.GEMINI_MODEL });
  }
  return new MockVisionService();
}
