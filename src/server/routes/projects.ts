import { Router } from 'express';
import type { AppContext } from '../app.js';

export function createProjectsRouter({ store, catalog }: AppContext) {
  const projectsRouter = Router();

  projectsRouter.get('/', (_req, res) => {
    res.json({ ok: true, activeProjectId: store.activeProjectId, projects: catalog.list() });
  });

  return projectsRouter;
}

/** The active project's definition, as loaded from disk. */
export function createActiveProjectRouter({ store }: AppContext) {
  const projectRouter = Router();

  projectRouter.get('/', (_req, res) => {
    res.json(store.getActiveProject().document);
  });

  return projectRouter;
}
