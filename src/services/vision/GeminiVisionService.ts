/**
 * GeminiVisionService — one request/response call to Gemini per analysis.
 *
 * 1. Compress the frame on-device (768px JPEG 0.65)
 * 2. Send prompt + inline image to models.generateContent
 * 3. Return the response text
 */
import { GoogleGenAI, type GenerateContentParameters } from '@google/genai';
import { __DEV__ } from '../../config/env';
import type { CaptureFrame } from '../../types/models';
import { errorMessage } from '../../utils/helpers';
import type { FoodVisionService } from './FoodVisionService';
import { compressImage, type CompressedImage } from './imageCompress';
import { FOOD_ANALYSIS_PROMPT } from './prompts';
import { VisionError } from './types';

/** The part of the Gemini client this service calls. */
export interface ContentGenerator {
  generateContent(params: GenerateContentParameters): Promise<{ text?: string }>;
}

export interface GeminiVisionOptions {
  apiKey?: string;
  model: string;
  /** Replaces the client built from apiKey. */
  generator?: ContentGenerator;
}

export class GeminiVisionService implements FoodVisionService {
  private readonly generator: ContentGenerator | null;
  private readonly model: string;

  constructor(options: GeminiVisionOptions) {
    this.model = options.model;
    this.generator =
      options.generator ?? (options.apiKey ? new GoogleGenAI({ apiKey: options.apiKey }).models : null);
    if (!this.generator) console.error('[Vision] Gemini API key is missing; analysis is disabled');
  }

  async analyzeImage(frame: CaptureFrame, prompt: string = FOOD_ANALYSIS_PROMPT): Promise<string> {
    if (!this.generator) throw new VisionError('model_not_configured');

    let image: CompressedImage;
    try {
      image = await compressImage(frame);
    } catch (e) {
      console.error('[Vision] Compressing frame failed:', errorMessage(e));
      throw new VisionError('image_encoding_failed', e);
    }
    if (__DEV__) {
      console.log(`[Vision] Sending ${(image.buffer.byteLength / 1024).toFixed(1)} KB to ${this.model}`);
    }

    let text: string | undefined;
    try {
      const response = await this.generator.generateContent({
        model: this.model,
        contents: [
          {
            role: 'user',
            parts: [
              { text: prompt },
              { inlineData: { mimeType: image.mimeType, data: image.buffer.toString('base64') } },
            ],
          },
        ],
        config: { temperature: 0.2 },
      });
      text = response.text;
    } catch (e) {
      console.error('[Vision] Gemini request failed:', errorMessage(e));
      throw new VisionError('api_error', e);
    }

    const answer = text?.trim();
    if (!answer) {
      console.error('[Vision] Gemini response contained no text');
      throw new VisionError('no_text_response');
    }
    if (__DEV__) console.log('[Vision] Received analysis:', answer.slice(0, 80));
    return answer;
  }
}
