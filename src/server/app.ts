import express from 'express';
import cors from 'cors';
import { createHealthRouter } from './routes/health.js';
import { createStateRouter } from './routes/state.js';
import { createSelectRouter } from './routes/select.js';
import { createProjectsRouter, createActiveProjectRouter } from './routes/projects.js';
import type { ProjectCatalog } from './services/ProjectCatalog.js';
import type { ObserverRegistry } from './services/ObserverRegistry.js';
import type { TransportStore } from './services/TransportStore.js';

export interface AppContext {
  store: TransportStore;
  catalog: ProjectCatalog;
  registry: ObserverRegistry;
  version: string;
}

export function createApp(ctx: AppContext) {
  const app = express();

  app.use(cors());

  // API Routes (request bodies are parsed per route, see middleware/lenientJson)
  app.use('/api/health', createHealthRouter(ctx));
  app.use('/api/state', createStateRouter(ctx));
  app.use('/api/select', createSelectRouter(ctx));
  app.use('/api/projects', createProjectsRouter(ctx));
  app.use('/api/project', createActiveProjectRouter(ctx));

  return app;
}
