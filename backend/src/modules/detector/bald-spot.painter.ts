/**
 * src/modules/detector/bald-spot.painter.ts
 *
 * WHY:
 * - The analysis result carries the photo back with the "bald" regions
 *   highlighted. This draws those highlights and re-encodes the photo as PNG.
 * - Decoding the upload is also the real check that it is an image: the
 *   declared content type is only a hint from the client.
 *
 * RULES:
 * - Anything sharp cannot decode is an UnreadableImageError.
 * - Spot count and size grow with the level: floor(level * 10) + 1 spots of
 *   radius floor(level * 50) + 10, centred in the middle half of the width
 *   and between 1/8 and 1/3 of the height.
 */

import sharp from 'sharp';
import type { RandomSource } from './detector.types';

export class UnreadableImageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnreadableImageError';
  }
}

export type BaldSpot = { cx: number; cy: number; r: number };

export class BaldSpotPainter {
  constructor(private readonly random: RandomSource = Math.random) {}

  /** Returns the image as PNG with the highlights drawn over it. */
  async paint(image: Buffer, level: number): Promise<Buffer> {
    try {
      const { width, height } = await sharp(image).metadata();
      if (!width || !height) throw new UnreadableImageError('Image has no dimensions');

      const overlay = Buffer.from(spotsSvg(width, height, this.spots(width, height, level)));
      return await sharp(image)
        .composite([{ input: overlay, top: 0, left: 0 }])
        .png()
        .toBuffer();
    } catch (err) {
      if (err instanceof UnreadableImageError) throw err;
      throw new UnreadableImageError(err instanceof Error ? err.message : String(err));
    }
  }

  spots(width: number, height: number, level: number): BaldSpot[] {
    const count = Math.floor(level * 10) + 1;
    const r = Math.floor(level * 50) + 10;

    const spots: BaldSpot[] = [];
    for (let i = 0; i < count; i++) {
      spots.push({
        cx: this.randomInt(Math.floor(width / 4), Math.floor((3 * width) / 4)),
        cy: this.randomInt(Math.floor(height / 8), Math.floor(height / 3)),
        r,
      });
    }
    return spots;
  }

  /** Inclusive on both ends. */
  private randomInt(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }
}

function spotsSvg(width: number, height: number, spots: BaldSpot[]): string {
  const circles = spots
    .map(
      (s) =>
        `<circle cx="${s.cx}" cy="${s.cy}" r="${s.r}" fill="rgb(255,0,0)" fill-opacity="0.25" ` +
        `stroke="rgb(255,0,0)" stroke-opacity="0.5"/>`,
    )
    .join('');
  return `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">${circles}</svg>`;
}
