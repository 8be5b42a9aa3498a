/**
 * Transport state shared with observers over HTTP and WebSocket.
 *
 * Field names are part of the wire format consumed by overlay clients.
 */

export const DEFAULT_BPM = 120;
export const DEFAULT_TIME_SIG = { num: 4, den: 4 } as const;

/** Field names a client may set through a partial update. */
export const TRANSPORT_FIELDS = ['playing', 'bar', 'beat', 'bpm', 'ppq', 'ts_num', 'ts_den'] as const;

export type TransportField = typeof TRANSPORT_FIELDS[number];

export interface TransportState {
  playing: boolean;
  bar: number;      // 1-based
  beat: number;     // 1-based
  bpm: number;
  ppq: number;      // position in ticks
  ts_num: number;
  ts_den: number;
  t_host: number;   // server time, seconds
}

export interface TransportSnapshot extends Readonly<TransportState> {
  readonly activeProjectId: string;
}

/** Partial update as received from a controller; values are not yet validated. */
export type TransportUpdate = Partial<Record<TransportField, unknown>>;

// ── Observers ────────────────────────────────────────────────────

export type ObserverHandle = string;

export interface Observer {
  readonly id: ObserverHandle;
  /** Resolves once the payload was handed to the transport, rejects on failure. */
  send(payload: string): Promise<void>;
}

export interface BroadcastResult {
  delivered: number;
  dropped: number;
}

export interface Broadcaster {
  broadcast(snapshot: TransportSnapshot): Promise<BroadcastResult>;
}
