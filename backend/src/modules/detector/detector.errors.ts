/**
 * src/modules/detector/detector.errors.ts
 *
 * WHY:
 * - Detector module owns its upload error semantics.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const DetectorErrors = {
  /** No multipart file under the `photo` field. */
  photoRequired() {
    return AppError.validationError('Invalid request body', [
      { field: 'photo', message: 'An image file is required' },
    ]);
  },

  notAnImage(meta?: AppErrorMeta) {
    return AppError.badRequest('File must be an image', meta);
  },

  /** Declared as an image, but the bytes do not decode. */
  unreadableImage(meta?: AppErrorMeta) {
    return AppError.badRequest('File is not a readable image', meta);
  },
};
