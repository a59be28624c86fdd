/**
 * src/modules/detector/detector.controller.ts
 *
 * WHY:
 * - Maps HTTP → detector call for the JSON and the streamed endpoints.
 * - Owns upload handling: multipart field `photo`, image content types only.
 *
 * RULES:
 * - Both routes run behind the bearer guard; the handler re-reads the
 *   authenticated user through requireAuthContext.
 * - Upload size is capped by the multipart plugin (UPLOAD_MAX_BYTES).
 *   Reading past the cap fails with 413 before the detector runs.
 * - Bytes the detector cannot decode are a 400, like a non-image content type.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import type { MultipartFile } from '@fastify/multipart';
import { requireAuthContext } from '../../shared/http/require-auth-context';
import { withRequestContext } from '../../shared/logger/with-context';
import { DetectorErrors } from './detector.errors';
import { resultStream } from './detector.framing';
import { UnreadableImageError } from './bald-spot.painter';
import type { BaldnessDetector, BaldnessResult, UploadedImage } from './detector.types';

export const PHOTO_FIELD = 'photo';

export class DetectorController {
  constructor(private readonly detector: BaldnessDetector) {}

  async detect(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireAuthContext(req);
    const photo = await readPhoto(req);

    const result = await this.analyze(photo);

    withRequestContext(req).info('detector.analyzed', {
      flow: 'detector.detect',
      userId,
      bytes: photo.data.length,
      category: result.baldnessCategory,
    });

    return reply.status(200).send(result);
  }

  async detectStream(req: FastifyRequest, reply: FastifyReply) {
    const { userId } = requireAuthContext(req);
    const photo = await readPhoto(req);

    const result = await this.analyze(photo);

    withRequestContext(req).info('detector.analyzed', {
      flow: 'detector.detect_stream',
      userId,
      bytes: photo.data.length,
      category: result.baldnessCategory,
    });

    return reply
      .status(200)
      .header('content-type', 'application/octet-stream')
      .send(resultStream(result));
  }

  private async analyze(photo: UploadedImage): Promise<BaldnessResult> {
    try {
      return await this.detector.analyze(photo.data);
    } catch (err) {
      if (err instanceof UnreadableImageError) {
        throw DetectorErrors.unreadableImage({ mimetype: photo.mimetype, reason: err.message });
      }
      throw err;
    }
  }
}

async function readPhoto(req: FastifyRequest): Promise<UploadedImage> {
  if (!req.isMultipart()) throw DetectorErrors.photoRequired();

  const file: MultipartFile | undefined = await req.file();
  if (!file || file.fieldname !== PHOTO_FIELD) {
    file?.file.resume();
    throw DetectorErrors.photoRequired();
  }

  if (!file.mimetype.startsWith('image/')) {
    file.file.resume();
    throw DetectorErrors.notAnImage({ mimetype: file.mimetype });
  }

  return {
    filename: file.filename,
    mimetype: file.mimetype,
    data: await file.toBuffer(),
  };
}
