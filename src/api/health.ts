/**
 * GET /health: liveness plus database, storage and render-pool status.
 * Answers 503 when the record store is unreachable.
 */

import { Router } from 'express';
import { AssetStorage } from '../generation/asset-storage';
import { errorContext } from '../logger';
import { Renderer } from '../render/renderer';
import { Store } from '../storage/store';
import { asyncRoute, requestLogger } from './middleware';

export interface HealthRoutesDeps {
  store: Store;
  storage: AssetStorage;
  renderer: Renderer;
  startedAt?: number;
}

export function createHealthRoutes(deps: HealthRoutesDeps): Router {
  const router = Router();
  const startedAt = deps.startedAt ?? Date.now();

  router.get(
    '/health',
    asyncRoute(async (req, res) => {
      let databaseOk = true;
      let totalRecords: number | null = null;
      try {
        await deps.store.certificates.ping();
        totalRecords = await deps.store.certificates.count();
      } catch (err) {
        databaseOk = false;
        requestLogger(req).error('Health check: record store unreachable', errorContext(err));
      }

      res.status(databaseOk ? 200 : 503).json({
        status: databaseOk ? 'healthy' : 'unhealthy',
        database: databaseOk ? 'connected' : 'unreachable',
        store: deps.store.kind,
        storage: deps.storage.configured ? 'configured' : 'not_configured',
        renderPool: deps.renderer.poolStats(),
        totalRecords,
        uptimeMs: Date.now() - startedAt,
        timestamp: new Date().toISOString(),
      });
    }),
  );

  return router;
}
