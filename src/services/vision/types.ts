/**
 * Errors raised by the food analysis pipeline.
 */

export type VisionErrorCode =
  | 'model_not_configured'
  | 'image_encoding_failed'
  | 'no_text_response'
  | 'api_error';

const MESSAGES: Record<VisionErrorCode, string> = {
  model_not_configured: "Couldn't initialize the AI model. Check the Gemini API key setup.",
  image_encoding_failed: 'Failed preparing the image for analysis.',
  no_text_response: 'The analysis finished but returned no text.',
  api_error: 'The analysis service returned an error.',
};

export class VisionError extends Error {
  constructor(
    readonly code: VisionErrorCode,
    cause?: unknown,
  ) {
    const detail = cause instanceof Error ? `: ${cause.message}` : '';
    super(code === 'api_error' ? `Gemini API error${detail}` : MESSAGES[code], { cause });
    this.name = 'VisionError';
  }
}
