import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import { z } from 'zod';
import { buildTestApp, multipartFile } from '../helpers/build-test-app';
import { ErrorResponseSchema, bearer, emailLogin } from '../helpers/api';
import { decodeResultFrames } from '../../src/modules/detector/detector.framing';
import type { BaldnessDetector, BaldnessResult } from '../../src/modules/detector/detector.types';

const ResultSchema = z.object({
  processedImage: z.string(),
  baldnessLevel: z.number(),
  baldnessCategory: z.string(),
  baldnessAreas: z.array(
    z.object({ region: z.string(), confidenceScore: z.number(), pixelPercentage: z.number() }),
  ),
});

const PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);

/** Returns a fixed result and counts how often it ran. */
class RecordingDetector implements BaldnessDetector {
  readonly inputs: Buffer[] = [];

  analyze(image: Buffer): Promise<BaldnessResult> {
    this.inputs.push(image);
    return Promise.resolve({
      processedImage: image.toString('base64'),
      baldnessLevel: 0.42,
      baldnessCategory: 'MODERATE',
      baldnessAreas: [{ region: 'CROWN', confidenceScore: 0.4, pixelPercentage: 33.3 }],
    });
  }
}

async function setup(env: Record<string, string> = {}) {
  const detector = new RecordingDetector();
  const built = await buildTestApp({ env, overrides: { detector } });
  const login = await emailLogin(built.app);
  return { ...built, detector, token: login.access_token };
}

describe('POST /api/v1/detect-baldness', () => {
  it('answers 401 without Authorization and never runs the detector', async () => {
    const { app, detector, close } = await setup();

    try {
      const upload = multipartFile({ field: 'photo', filename: 'me.png', contentType: 'image/png', data: PNG });
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/detect-baldness',
        headers: upload.headers,
        payload: upload.payload,
      });

      expect(res.statusCode).toBe(401);
      expect(ErrorResponseSchema.parse(res.json()).error.type).toBe('UNAUTHORIZED');
      expect(detector.inputs).toEqual([]);
    } finally {
      await close();
    }
  });

  it('analyzes an uploaded image', async () => {
    const { app, detector, token, close } = await setup();

    try {
      const upload = multipartFile({ field: 'photo', filename: 'me.png', contentType: 'image/png', data: PNG });
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/detect-baldness',
        headers: { ...upload.headers, ...bearer(token) },
        payload: upload.payload,
      });

      expect(res.statusCode).toBe(200);
      expect(res.json()).toEqual({
        processedImage: PNG.toString('base64'),
        baldnessLevel: 0.42,
        baldnessCategory: 'MODERATE',
        baldnessAreas: [{ region: 'CROWN', confidenceScore: 0.4, pixelPercentage: 33.3 }],
      });
      expect(detector.inputs).toEqual([PNG]);
    } finally {
      await close();
    }
  });

  it('answers 400 for a file that is not an image', async () => {
    const { app, detector, token, close } = await setup();

    try {
      const upload = multipartFile({
        field: 'photo',
        filename: 'notes.txt',
        contentType: 'text/plain',
        data: Buffer.from('hello'),
      });
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/detect-baldness',
        headers: { ...upload.headers, ...bearer(token) },
        payload: upload.payload,
      });

      expect(res.statusCode).toBe(400);
      expect(ErrorResponseSchema.parse(res.json()).error).toEqual({
        code: 400,
        message: 'File must be an image',
        type: 'BAD_REQUEST',
        details: [],
      });
      expect(detector.inputs).toEqual([]);
    } finally {
      await close();
    }
  });

  it('answers 422 when no photo is sent', async () => {
    const { app, token, close } = await setup();

    try {
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/detect-baldness',
        headers: bearer(token),
        payload: { nothing: true },
      });

      expect(res.statusCode).toBe(422);
      expect(ErrorResponseSchema.parse(res.json()).error.details).toEqual([
        { field: 'photo', message: 'An image file is required' },
      ]);
    } finally {
      await close();
    }
  });

  it('answers 422 when the file is sent under another field', async () => {
    const { app, token, close } = await setup();

    try {
      const upload = multipartFile({ field: 'image', filename: 'me.png', contentType: 'image/png', data: PNG });
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/detect-baldness',
        headers: { ...upload.headers, ...bearer(token) },
        payload: upload.payload,
      });

      expect(res.statusCode).toBe(422);
      expect(ErrorResponseSchema.parse(res.json()).error.type).toBe('VALIDATION_ERROR');
    } finally {
      await close();
    }
  });

  it('answers 413 for a file over the upload limit', async () => {
    const { app, detector, token, close } = await setup({ UPLOAD_MAX_BYTES: '1024' });

    try {
      const upload = multipartFile({
        field: 'photo',
        filename: 'big.png',
        contentType: 'image/png',
        data: Buffer.alloc(4096, 1),
      });
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/detect-baldness',
        headers: { ...upload.headers, ...bearer(token) },
        payload: upload.payload,
      });

      expect(res.statusCode).toBe(413);
      expect(ErrorResponseSchema.parse(res.json()).error.type).toBe('PAYLOAD_TOO_LARGE');
      expect(detector.inputs).toEqual([]);
    } finally {
      await close();
    }
  });
});

describe('POST /api/v1/detect-baldness/stream', () => {
  it('streams framed metadata followed by the image', async () => {
    const { app, token, close } = await setup();

    try {
      const upload = multipartFile({ field: 'photo', filename: 'me.png', contentType: 'image/png', data: PNG });
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/detect-baldness/stream',
        headers: { ...upload.headers, ...bearer(token) },
        payload: upload.payload,
      });

      expect(res.statusCode).toBe(200);
      expect(res.headers['content-type']).toBe('application/octet-stream');

      const { meta, image } = decodeResultFrames(res.rawPayload);
      expect(meta).toEqual({
        baldnessLevel: 0.42,
        baldnessCategory: 'MODERATE',
        baldnessAreas: [{ region: 'CROWN', confidenceScore: 0.4, pixelPercentage: 33.3 }],
      });
      expect(image).toEqual(PNG);
    } finally {
      await close();
    }
  });

  it('answers 401 for an invalid token', async () => {
    const { app, detector, close } = await setup();

    try {
      const upload = multipartFile({ field: 'photo', filename: 'me.png', contentType: 'image/png', data: PNG });
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/detect-baldness/stream',
        headers: { ...upload.headers, ...bearer('not-a-jwt') },
        payload: upload.payload,
      });

      expect(res.statusCode).toBe(401);
      expect(detector.inputs).toEqual([]);
    } finally {
      await close();
    }
  });
});

describe('POST /api/v1/detect-baldness with the simulated detector', () => {
  async function setupDefault() {
    const built = await buildTestApp();
    const login = await emailLogin(built.app);
    return { ...built, token: login.access_token };
  }

  it('answers 400 for bytes labelled as an image that do not decode', async () => {
    const { app, token, close } = await setupDefault();

    try {
      const upload = multipartFile({
        field: 'photo',
        filename: 'fake.png',
        contentType: 'image/png',
        data: Buffer.from('definitely not a png'),
      });
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/detect-baldness',
        headers: { ...upload.headers, ...bearer(token) },
        payload: upload.payload,
      });

      expect(res.statusCode).toBe(400);
      expect(ErrorResponseSchema.parse(res.json()).error).toEqual({
        code: 400,
        message: 'File is not a readable image',
        type: 'BAD_REQUEST',
        details: [],
      });
    } finally {
      await close();
    }
  });

  it('returns the photo as a PNG of the same size', async () => {
    const { app, token, close } = await setupDefault();

    try {
      const jpeg = await sharp({
        create: { width: 120, height: 90, channels: 3, background: { r: 200, g: 170, b: 140 } },
      })
        .jpeg()
        .toBuffer();
      const upload = multipartFile({ field: 'photo', filename: 'me.jpg', contentType: 'image/jpeg', data: jpeg });
      const res = await app.inject({
        method: 'POST',
        url: '/api/v1/detect-baldness',
        headers: { ...upload.headers, ...bearer(token) },
        payload: upload.payload,
      });

      expect(res.statusCode).toBe(200);
      const body = ResultSchema.parse(res.json());
      const meta = await sharp(Buffer.from(body.processedImage, 'base64')).metadata();
      expect(meta).toMatchObject({ format: 'png', width: 120, height: 90 });
    } finally {
      await close();
    }
  });
});
