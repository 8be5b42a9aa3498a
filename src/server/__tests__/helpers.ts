import { createServer } from 'node:http';
import WebSocket from 'ws';
import { createApp } from '../app.js';
import { attachStateSocket, STATE_SOCKET_PATH } from '../stateSocket.js';
import { ProjectCatalog } from '../services/ProjectCatalog.js';
import { ObserverRegistry } from '../services/ObserverRegistry.js';
import { TransportStore } from '../services/TransportStore.js';
import type { ProjectMetadata } from '../../project/schema.js';

export function project(id: string, meta: { title?: string; artist?: string; bpm?: number; timeSig?: string } = {}): ProjectMetadata {
  return {
    id,
    displayName: meta.title ?? id,
    artist: meta.artist ?? '',
    bpm: meta.bpm,
    timeSig: meta.timeSig,
    sourcePath: `/projects/${id}.json`,
    document: { id, meta },
  };
}

export const TEST_PROJECTS: ProjectMetadata[] = [
  project('intro', { title: 'Intro Groove', artist: 'Test Band' }),
  project('waltz', { title: 'Slow Waltz', artist: 'Test Trio', bpm: 90, timeSig: '3/4' }),
];

export interface TestServer {
  baseUrl: string;
  wsUrl: string;
  store: TransportStore;
  registry: ObserverRegistry;
  close(): Promise<void>;
}

export async function startTestServer(heartbeatMs = 0): Promise<TestServer> {
  const catalog = new ProjectCatalog(TEST_PROJECTS);
  const registry = new ObserverRegistry();
  const store = new TransportStore(catalog, 'intro', registry);
  const server = createServer(createApp({ store, catalog, registry, version: 'test' }));
  const wss = attachStateSocket(server, { registry, store, heartbeatMs });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') throw new Error('test server is not listening on a TCP port');
  const { port } = address;

  return {
    baseUrl: `http://127.0.0.1:${port}`,
    wsUrl: `ws://127.0.0.1:${port}${STATE_SOCKET_PATH}`,
    store,
    registry,
    close: () => new Promise<void>((resolve, reject) => {
      for (const ws of wss.clients) ws.terminate();
      wss.close();
      server.closeAllConnections();
      server.close((err) => (err ? reject(err) : resolve()));
    }),
  };
}

export interface TestClient {
  ws: WebSocket;
  next(): Promise<string>;
}

/** Connects and buffers every text frame so none is missed between awaits. */
export function connectClient(url: string): Promise<TestClient> {
  const ws = new WebSocket(url);
  const buffered: string[] = [];
  const waiting: Array<(msg: string) => void> = [];

  ws.on('message', (data) => {
    const msg = data.toString();
    const waiter = waiting.shift();
    if (waiter) waiter(msg);
    else buffered.push(msg);
  });

  const next = () => {
    const msg = buffered.shift();
    if (msg !== undefined) return Promise.resolve(msg);
    return new Promise<string>((resolve) => waiting.push(resolve));
  };

  return new Promise((resolve, reject) => {
    ws.once('open', () => resolve({ ws, next }));
    ws.once('error', reject);
  });
}

export async function postJson(url: string, body: unknown): Promise<Response> {
  return fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: typeof body === 'string' ? body : JSON.stringify(body),
  });
}
