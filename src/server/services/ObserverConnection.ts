/**
 * ObserverConnection — one WebSocket observer from accept to teardown.
 *
 * connecting → active → closed. On open the observer is registered and gets
 * one snapshot pushed to it alone; after that it only receives broadcasts.
 * A text frame reading "ping" (any case) is answered with "pong". Close,
 * transport error and failed sends all end in the same idempotent teardown.
 */

import type { RawData, WebSocket } from 'ws';
import { randomUUID } from 'node:crypto';
import type { Observer } from '../../types/transport.js';
import { errorMessage } from '../../project/errors.js';
import type { ObserverRegistry } from './ObserverRegistry.js';
import type { TransportStore } from './TransportStore.js';

const WS_OPEN = 1;
const WS_CLOSING = 2;

export type ConnectionPhase = 'connecting' | 'active' | 'closed';

/** Adapts a ws socket to the promise-based Observer contract. */
export class WebSocketObserver implements Observer {
  readonly id: string;

  constructor(private readonly ws: WebSocket, id: string = randomUUID().slice(0, 12)) {
    this.id = id;
  }

  send(payload: string): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.ws.readyState !== WS_OPEN) {
        reject(new Error(`socket not open (readyState ${this.ws.readyState})`));
        return;
      }
      this.ws.send(payload, (err) => (err ? reject(err) : resolve()));
    });
  }
}

export class ObserverConnection {
  readonly observer: WebSocketObserver;
  private phase: ConnectionPhase = 'connecting';

  constructor(
    private readonly ws: WebSocket,
    private readonly registry: ObserverRegistry,
    private readonly store: TransportStore,
  ) {
    this.observer = new WebSocketObserver(ws);
  }

  get id(): string {
    return this.observer.id;
  }

  get state(): ConnectionPhase {
    return this.phase;
  }

  async open(): Promise<void> {
    if (this.phase !== 'connecting') return;

    this.ws.on('message', this.handleMessage);
    this.ws.on('close', this.handleClose);
    this.ws.on('error', this.handleError);

    this.phase = 'active';
    this.registry.register(this.observer);
    console.log(`[ws] Observer ${this.id} connected (${this.registry.size} observers)`);

    try {
      await this.observer.send(JSON.stringify(this.store.getSnapshot()));
    } catch (err) {
      console.warn(`[ws] Welcome snapshot to ${this.id} failed: ${errorMessage(err)}`);
      this.close();
    }
  }

  close(): void {
    if (this.phase === 'closed') return;
    this.phase = 'closed';

    this.registry.deregister(this.id);
    this.ws.off('message', this.handleMessage);

    if (this.ws.readyState === WS_OPEN || this.ws.readyState === WS_CLOSING) {
      this.ws.terminate();
    }
    console.log(`[ws] Observer ${this.id} disconnected (${this.registry.size} observers)`);
  }

  // ── Socket events ───────────────────────────────────────────────

  private handleMessage = (data: RawData, isBinary: boolean): void => {
    if (isBinary || this.phase !== 'active') return;
    if (rawToText(data).trim().toLowerCase() !== 'ping') return;

    this.observer.send('pong').catch((err: unknown) => {
      console.warn(`[ws] Pong to ${this.id} failed: ${errorMessage(err)}`);
      this.close();
    });
  };

  private handleClose = (): void => {
    this.close();
  };

  private handleError = (err: Error): void => {
    console.error(`[ws] Observer ${this.id} error:`, err.message);
    this.close();
  };
}

function rawToText(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}
