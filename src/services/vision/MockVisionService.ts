/**
 * MockVisionService — canned analyses for offline runs and tests.
 */
import type { CaptureFrame } from '../../types/models';
import type { FoodVisionService } from './FoodVisionService';

const delay = (ms: number) => new Promise((r) => setTimeout(r, ms));

export const MOCK_ANALYSES: readonly string[] = [
  [
    'Apple',
    '- Ingredients: apple',
    '- Per 100 g: 52 kcal, 0.3 g protein, 14 g carbohydrates, 0.2 g fat, 2.4 g fibre',
    '- Freshness: firm skin with no bruising; looks fresh.',
  ].join('\n'),
  [
    'Caesar salad',
    '- Ingredients: romaine, croutons, parmesan, Caesar dressing',
    '- Per 100 g: 190 kcal, 4 g protein, 8 g carbohydrates, 16 g fat, 1.5 g fibre',
    '- Freshness: leaves look crisp; likely prepared recently.',
  ].join('\n'),
];

export class MockVisionService implements FoodVisionService {
  private calls = 0;

  constructor(private readonly delayMs = 600) {}

  async analyzeImage(_frame: CaptureFrame, _prompt?: string): Promise<string> {
    if (this.delayMs > 0) await delay(this.delayMs);
    const answer = MOCK_ANALYSES[this.calls % MOCK_ANALYSES.length];
    this.calls++;
    return answer;
  }
}
