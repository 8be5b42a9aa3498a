import { Router } from 'express';
import type { AppContext } from '../app.js';

const startedAt = Date.now();

export function createHealthRouter({ store, catalog, registry, version }: AppContext) {
  const healthRouter = Router();

  healthRouter.get('/', (_req, res) => {
    res.json({
      ok: true,
      version,
      node: process.version,
      uptimeSec: Math.floor((Date.now() - startedAt) / 1000),
      activeProjectId: store.activeProjectId,
      projectsFound: catalog.size,
      observers: registry.size,
    });
  });

  return healthRouter;
}
