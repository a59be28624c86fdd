/**
 * src/modules/detector/detector.module.ts
 *
 * WHY:
 * - Encapsulates Detector module wiring. DI picks the detector implementation.
 */

import type { FastifyInstance, preHandlerHookHandler } from 'fastify';
import { DetectorController } from './detector.controller';
import { registerDetectorRoutes } from './detector.routes';
import type { BaldnessDetector } from './detector.types';

export type DetectorModule = ReturnType<typeof createDetectorModule>;

export function createDetectorModule(deps: { detector: BaldnessDetector }) {
  const controller = new DetectorController(deps.detector);

  return {
    detector: deps.detector,
    registerRoutes(app: FastifyInstance, bearerGuard: preHandlerHookHandler) {
      registerDetectorRoutes(app, controller, bearerGuard);
    },
  };
}
