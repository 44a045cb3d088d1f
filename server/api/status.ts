/**
 * Status API Routes
 * Read-only view of the bridge for dashboards and health checks
 */

import { Router } from 'express';
import type { AcquisitionController } from '../acquisition/AcquisitionController.js';
import type { ApiError, HealthResponse } from '../../shared/types.js';

export interface StatusSource {
  controller: AcquisitionController;
  isClientConnected(): boolean;
}

export function createStatusRoutes(source: StatusSource): Router {
  const router = Router();
  const { controller } = source;

  // GET /api/health - Liveness plus whether a client holds the instrument
  router.get('/health', (_req, res) => {
    const response: HealthResponse = {
      status: 'ok',
      clientConnected: source.isClientConnected(),
      phase: controller.describe().acquisition.phase,
    };
    res.json(response);
  });

  // GET /api/instrument - Identity and capabilities
  router.get('/instrument', (_req, res) => {
    res.json({
      info: controller.info,
      capabilities: controller.capabilities,
    });
  });

  // GET /api/state - Live channel, pod, trigger and acquisition settings
  router.get('/state', (_req, res) => {
    try {
      res.json(controller.describe());
    } catch (err) {
      const error: ApiError = {
        error: 'STATE_UNAVAILABLE',
        message: err instanceof Error ? err.message : 'Unknown error',
      };
      res.status(500).json(error);
    }
  });

  return router;
}
