import type { Server } from 'node:http';
import { WebSocketServer, type WebSocket } from 'ws';
import { ObserverConnection } from './services/ObserverConnection.js';
import type { ObserverRegistry } from './services/ObserverRegistry.js';
import type { TransportStore } from './services/TransportStore.js';

export const STATE_SOCKET_PATH = '/ws/state';

export interface StateSocketOptions {
  registry: ObserverRegistry;
  store: TransportStore;
  /** Protocol-level ping interval; sockets that miss one are terminated. 0 disables. */
  heartbeatMs: number;
}

export function attachStateSocket(server: Server, opts: StateSocketOptions): WebSocketServer {
  const wss = new WebSocketServer({ server, path: STATE_SOCKET_PATH });
  const alive = new WeakMap<WebSocket, boolean>();

  wss.on('connection', (ws) => {
    alive.set(ws, true);
    ws.on('pong', () => alive.set(ws, true));

    const connection = new ObserverConnection(ws, opts.registry, opts.store);
    connection.open().catch((err: unknown) => {
      console.error('[ws] Failed to open observer connection:', err);
      connection.close();
    });
  });

  // ── Heartbeat ──────────────────────────────────────────────────
  if (opts.heartbeatMs > 0) {
    const timer = setInterval(() => {
      for (const ws of wss.clients) {
        if (alive.get(ws) === false) {
          console.log('[ws] Heartbeat timeout, terminating connection');
          ws.terminate();
          continue;
        }
        alive.set(ws, false);
        ws.ping();
      }
    }, opts.heartbeatMs);

    wss.on('close', () => clearInterval(timer));
  }

  return wss;
}
