import { createServer } from 'node:http';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { attachStateSocket, STATE_SOCKET_PATH } from './stateSocket.js';
import { loadProjectCatalog } from '../project/loader.js';
import { errorMessage } from '../project/errors.js';
import { ProjectCatalog } from './services/ProjectCatalog.js';
import { ObserverRegistry } from './services/ObserverRegistry.js';
import { TransportStore } from './services/TransportStore.js';

async function startServer() {
  const config = loadConfig();

  const catalog = new ProjectCatalog(await loadProjectCatalog(config.projectPath));
  const initialId = config.activeProject ?? catalog.ids()[0];
  console.log(`[boot] PROJECT_DIR = ${config.projectPath} (${catalog.size} projects: ${catalog.ids().join(', ')})`);

  const registry = new ObserverRegistry();
  const store = new TransportStore(catalog, initialId, registry);
  console.log(`[boot] Active project = ${store.activeProjectId}`);

  const app = createApp({ store, catalog, registry, version: config.version });
  const server = createServer(app);
  const wss = attachStateSocket(server, { registry, store, heartbeatMs: config.heartbeatMs });

  const shutdown = (signal: string) => {
    console.log(`[boot] ${signal} received, shutting down`);
    for (const ws of wss.clients) ws.terminate();
    wss.close();
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  server.listen(config.port, config.host, () => {
    console.log(`Transport relay running at http://${config.host}:${config.port} (ws: ${STATE_SOCKET_PATH})`);
  });
}

startServer().catch((err: unknown) => {
  console.error(`[boot] ${errorMessage(err)}`);
  process.exit(1);
});
