import { Router } from 'express';
import { StatusCodes } from 'http-status-codes';
import { asyncHandler } from '../middleware/async-handler.js';
import type { ModuleManager } from '../../services/module-manager/index.js';

/**
 * Introspection endpoints over the module manager, mounted at `${API_PREFIX}/system`.
 *
 * - `GET /health`: aggregate health; 200 when every module is healthy, 503 otherwise
 * - `GET /modules`: registered modules with their state and last health
 * - `GET /routes`: the route table of the module router
 */
export function systemRouter(manager: ModuleManager) {
  const router = Router();

  router.get('/health', asyncHandler(async (_req, res) => {
    const health = await manager.aggregateHealth();
    const status = health.status === 'healthy' ? StatusCodes.OK : StatusCodes.SERVICE_UNAVAILABLE;
    res.status(status).json(health);
  }));

  router.get('/modules', (_req, res) => {
    res.json({ state: manager.getState(), modules: manager.listModules() });
  });

  router.get('/routes', (_req, res) => {
    res.json({ routes: manager.getRouteTable() });
  });

  return router;
}
