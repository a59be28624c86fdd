/**
 * src/modules/detector/detector.routes.ts
 *
 * WHY:
 * - Declares Detector module endpoints. Both require a bearer token.
 *
 * RULES:
 * - No business logic here.
 */

import type { FastifyInstance, preHandlerHookHandler } from 'fastify';
import type { DetectorController } from './detector.controller';

export const DETECTOR_PREFIX = '/api/v1/detect-baldness';

export function registerDetectorRoutes(
  app: FastifyInstance,
  controller: DetectorController,
  bearerGuard: preHandlerHookHandler,
) {
  app.post(DETECTOR_PREFIX, { preHandler: bearerGuard }, controller.detect.bind(controller));
  app.post(
    `${DETECTOR_PREFIX}/stream`,
    { preHandler: bearerGuard },
    controller.detectStream.bind(controller),
  );
}
