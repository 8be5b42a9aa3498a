/**
 * ObserverRegistry — the set of connected observers and the broadcast
 * fan-out over them.
 *
 * A broadcast serializes once, delivers to the membership as it stood when
 * the call began, and retires every observer whose delivery failed after the
 * whole pass has settled.
 */

import type {
  BroadcastResult,
  Broadcaster,
  Observer,
  ObserverHandle,
  TransportSnapshot,
} from '../../types/transport.js';
import { errorMessage } from '../../project/errors.js';

export class ObserverRegistry implements Broadcaster {
  private observers: Map<ObserverHandle, Observer> = new Map();

  register(observer: Observer): ObserverHandle {
    this.observers.set(observer.id, observer);
    return observer.id;
  }

  /** Returns false when the handle was already gone. */
  deregister(handle: ObserverHandle): boolean {
    return this.observers.delete(handle);
  }

  has(handle: ObserverHandle): boolean {
    return this.observers.has(handle);
  }

  members(): Observer[] {
    return [...this.observers.values()];
  }

  get size(): number {
    return this.observers.size;
  }

  async broadcast(snapshot: TransportSnapshot): Promise<BroadcastResult> {
    const payload = JSON.stringify(snapshot);
    const targets = this.members();
    if (targets.length === 0) return { delivered: 0, dropped: 0 };

    const results = await Promise.allSettled(targets.map(async o => o.send(payload)));

    const dead: ObserverHandle[] = [];
    results.forEach((result, i) => {
      if (result.status === 'rejected') {
        dead.push(targets[i].id);
        console.warn(`[ws] Delivery to ${targets[i].id} failed: ${errorMessage(result.reason)}`);
      }
    });

    for (const handle of dead) {
      this.observers.delete(handle);
    }
    if (dead.length > 0) {
      console.log(`[ws] Dropped ${dead.length} observer(s) (${this.observers.size} remaining)`);
    }

    return { delivered: targets.length - dead.length, dropped: dead.length };
  }
}
