/**
 * TransportStore — sole owner of the live transport state and the active
 * project id.
 *
 * Every mutation runs synchronously up to the snapshot it produces, so no
 * observer can see a half-applied update or project switch. The snapshot is
 * then handed to the broadcaster.
 */

import { ProjectNotFoundError } from '../../project/errors.js';
import { parseTimeSignature } from '../../project/loader.js';
import type { ProjectMetadata } from '../../project/schema.js';
import {
  DEFAULT_BPM,
  DEFAULT_TIME_SIG,
  TRANSPORT_FIELDS,
  type Broadcaster,
  type TransportField,
  type TransportSnapshot,
  type TransportState,
  type TransportUpdate,
} from '../../types/transport.js';
import type { ProjectCatalog } from './ProjectCatalog.js';

export interface TransportStoreOptions {
  /** Clock in seconds. */
  now?: () => number;
}

export class TransportStore {
  private state: TransportState;
  private activeId: string;
  private readonly now: () => number;

  constructor(
    private readonly catalog: ProjectCatalog,
    initialProjectId: string,
    private readonly broadcaster: Broadcaster,
    options: TransportStoreOptions = {},
  ) {
    const project = this.requireProject(initialProjectId);
    const timeSig = project.timeSig ? parseTimeSignature(project.timeSig) : null;

    this.now = options.now ?? (() => Date.now() / 1000);
    this.activeId = project.id;
    this.state = {
      playing: false,
      bar: 1,
      beat: 1,
      bpm: project.bpm ?? DEFAULT_BPM,
      ppq: 0,
      ts_num: timeSig?.num ?? DEFAULT_TIME_SIG.num,
      ts_den: timeSig?.den ?? DEFAULT_TIME_SIG.den,
      t_host: 0,
    };
  }

  get activeProjectId(): string {
    return this.activeId;
  }

  getActiveProject(): ProjectMetadata {
    return this.requireProject(this.activeId);
  }

  getSnapshot(): TransportSnapshot {
    this.clamp();
    this.state.t_host = Math.max(this.now(), this.state.t_host);
    return Object.freeze({ ...this.state, activeProjectId: this.activeId });
  }

  /**
   * Overwrite the recognized fields present in `fields`; anything else is
   * ignored. A non-object input is an empty update.
   */
  async applyPartialUpdate(fields: unknown): Promise<TransportSnapshot> {
    if (isRecord(fields)) {
      for (const key of TRANSPORT_FIELDS) {
        if (Object.prototype.hasOwnProperty.call(fields, key)) {
          this.assign(key, fields[key]);
        }
      }
    }
    const snapshot = this.getSnapshot();
    await this.broadcaster.broadcast(snapshot);
    return snapshot;
  }

  /**
   * Make `id` the active project and re-derive tempo and meter from it.
   * Throws ProjectNotFoundError without touching any state when `id` is unknown.
   */
  async selectProject(id: string): Promise<TransportSnapshot> {
    const project = this.requireProject(id);
    const timeSig = project.timeSig ? parseTimeSignature(project.timeSig) : null;

    this.activeId = project.id;
    this.state.bar = 1;
    this.state.beat = 1;
    this.state.ppq = 0;
    this.state.bpm = project.bpm ?? this.state.bpm;
    if (timeSig) {
      this.state.ts_num = timeSig.num;
      this.state.ts_den = timeSig.den;
    }

    const snapshot = this.getSnapshot();
    console.log(`[state] Active project -> ${project.id} (${snapshot.bpm} bpm, ${snapshot.ts_num}/${snapshot.ts_den})`);
    await this.broadcaster.broadcast(snapshot);
    return snapshot;
  }

  // ── Helpers ─────────────────────────────────────────────────────

  private requireProject(id: string): ProjectMetadata {
    const project = this.catalog.get(id);
    if (!project) throw new ProjectNotFoundError(id, this.catalog.ids());
    return project;
  }

  private assign(key: TransportField, value: unknown): void {
    if (key === 'playing') {
      this.state.playing = toBoolean(value);
    } else {
      this.state[key] = toNumber(value);
    }
  }

  private clamp(): void {
    const s = this.state;
    s.bar = atLeastOne(s.bar);
    s.beat = atLeastOne(s.beat);
    s.bpm = Number.isFinite(s.bpm) && s.bpm > 0 ? s.bpm : DEFAULT_BPM;
    s.ppq = Number.isFinite(s.ppq) && s.ppq > 0 ? s.ppq : 0;
    s.ts_num = atLeastOne(s.ts_num);
    s.ts_den = atLeastOne(s.ts_den);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function atLeastOne(value: number): number {
  return Number.isFinite(value) ? Math.max(1, Math.trunc(value)) : 1;
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (typeof value === 'string' && value.trim() !== '') return Number(value);
  return Number.NaN;
}

function toBoolean(value: unknown): boolean {
  if (typeof value === 'string') {
    const v = value.trim().toLowerCase();
    return v === 'true' || v === '1';
  }
  return Boolean(value);
}
