/**
 * src/modules/detector/simulated-baldness.detector.ts
 *
 * WHY:
 * - Stand-in for the real image model, behind the BaldnessDetector port.
 *   It produces plausible, internally consistent numbers so clients can be
 *   built and tested end to end.
 *
 * RULES:
 * - All randomness comes from the injected sources (tests pass fixed sequences).
 *   Numbers draw from `random`; spot positions from the painter's own source.
 * - The processed image is the decoded upload with the bald spots drawn,
 *   re-encoded as PNG. Undecodable uploads reject with UnreadableImageError.
 */

import {
  BALDNESS_REGIONS,
  type BaldnessArea,
  type BaldnessCategory,
  type BaldnessDetector,
  type BaldnessResult,
  type RandomSource,
} from './detector.types';
import { BaldSpotPainter } from './bald-spot.painter';

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function categorize(level: number): BaldnessCategory {
  if (level < 0.1) return 'NONE';
  if (level < 0.3) return 'SLIGHT';
  if (level < 0.5) return 'MODERATE';
  if (level < 0.7) return 'SIGNIFICANT';
  if (level < 0.9) return 'SEVERE';
  return 'COMPLETE';
}

export class SimulatedBaldnessDetector implements BaldnessDetector {
  constructor(
    private readonly random: RandomSource = Math.random,
    private readonly painter: BaldSpotPainter = new BaldSpotPainter(random),
  ) {}

  async analyze(image: Buffer): Promise<BaldnessResult> {
    const level = roundTo(this.random(), 2);
    const processed = await this.painter.paint(image, level);

    return {
      processedImage: processed.toString('base64'),
      baldnessLevel: level,
      baldnessCategory: categorize(level),
      baldnessAreas: this.areas(level),
    };
  }

  private uniform(min: number, max: number): number {
    return min + (max - min) * this.random();
  }

  private areas(level: number): BaldnessArea[] {
    const areas: BaldnessArea[] = [];

    for (const region of BALDNESS_REGIONS) {
      // Low levels leave most regions out.
      if (level < 0.5 && this.random() > level * 2) continue;

      const confidence = Math.min(1, Math.max(0.1, level * this.uniform(0.8, 1.2)));
      const pixelPercentage = confidence * 100 * this.uniform(0.7, 1.0);

      areas.push({
        region,
        confidenceScore: roundTo(confidence, 2),
        pixelPercentage: roundTo(pixelPercentage, 1),
      });
    }

    return areas;
  }
}
