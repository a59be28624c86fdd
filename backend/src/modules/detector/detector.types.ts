/**
 * src/modules/detector/detector.types.ts
 *
 * WHY:
 * - Result shape of one analysis, shared by the JSON and the streamed endpoints.
 * - Field names are camelCase on the wire (clients already parse them so).
 */

export const BALDNESS_REGIONS = ['CROWN', 'FRONTAL', 'TEMPORAL', 'VERTEX', 'OVERALL'] as const;
export type BaldnessRegion = (typeof BALDNESS_REGIONS)[number];

export const BALDNESS_CATEGORIES = [
  'NONE',
  'SLIGHT',
  'MODERATE',
  'SIGNIFICANT',
  'SEVERE',
  'COMPLETE',
] as const;
export type BaldnessCategory = (typeof BALDNESS_CATEGORIES)[number];

export type BaldnessArea = {
  region: BaldnessRegion;
  /** 0..1 */
  confidenceScore: number;
  /** 0..100 */
  pixelPercentage: number;
};

export type BaldnessResult = {
  /** base64-encoded PNG with the detected regions highlighted */
  processedImage: string;
  /** 0..1 */
  baldnessLevel: number;
  baldnessCategory: BaldnessCategory;
  baldnessAreas: BaldnessArea[];
};

export type BaldnessMetadata = Omit<BaldnessResult, 'processedImage'>;

/** Returns a float in [0, 1). */
export type RandomSource = () => number;

export interface BaldnessDetector {
  /** Rejects with UnreadableImageError when the bytes are not a decodable image. */
  analyze(image: Buffer): Promise<BaldnessResult>;
}

export type UploadedImage = {
  filename: string;
  mimetype: string;
  data: Buffer;
};
