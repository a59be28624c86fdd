/**
 * src/modules/detector/detector.framing.ts
 *
 * Binary framing for the streamed analysis result:
 *
 *   [u32be metaLen][meta JSON, utf-8][u32be imageLen][image bytes]
 *
 * meta = { baldnessLevel, baldnessCategory, baldnessAreas }
 */

import { Readable } from 'node:stream';
import type { BaldnessMetadata, BaldnessResult } from './detector.types';

function lengthPrefix(length: number): Buffer {
  const buf = Buffer.alloc(4);
  buf.writeUInt32BE(length, 0);
  return buf;
}

export function encodeResultFrames(result: BaldnessResult): Buffer[] {
  const meta: BaldnessMetadata = {
    baldnessLevel: result.baldnessLevel,
    baldnessCategory: result.baldnessCategory,
    baldnessAreas: result.baldnessAreas,
  };
  const metaBytes = Buffer.from(JSON.stringify(meta), 'utf8');
  const imageBytes = Buffer.from(result.processedImage, 'base64');

  return [lengthPrefix(metaBytes.length), metaBytes, lengthPrefix(imageBytes.length), imageBytes];
}

export function resultStream(result: BaldnessResult): Readable {
  return Readable.from(encodeResultFrames(result));
}

/** Inverse of encodeResultFrames. Throws on truncated input. */
export function decodeResultFrames(payload: Buffer): { meta: unknown; image: Buffer } {
  let offset = 0;

  const readChunk = (what: string): Buffer => {
    if (payload.length < offset + 4) throw new Error(`Truncated frame: missing ${what} length`);
    const length = payload.readUInt32BE(offset);
    offset += 4;
    if (payload.length < offset + length) throw new Error(`Truncated frame: ${what} is incomplete`);
    const chunk = payload.subarray(offset, offset + length);
    offset += length;
    return chunk;
  };

  const meta: unknown = JSON.parse(readChunk('metadata').toString('utf8'));
  const image = readChunk('image');

  return { meta, image };
}
