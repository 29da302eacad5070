import type { DashboardEvent } from '@bmad-dashboard/shared';
import { errorMessage } from '../utils';

/** One live-update connection, bound to a project root or to none */
export interface Subscriber {
  readonly id: string;
  projectRoot: string | null;
  /** False (or a throw) means the subscriber can no longer be written to */
  send(event: DashboardEvent): boolean;
  close(): void;
}

export interface BroadcasterOptions {
  heartbeatIntervalMs: number;
}

/**
 * Event hub. Fan-out iterates over a copy of the subscriber set, so a
 * subscriber removed (or added) mid-publish does not disturb delivery to
 * the others. A failed send removes that subscriber and nothing else.
 */
export class Broadcaster {
  private subscribers = new Set<Subscriber>();
  private heartbeat: ReturnType<typeof setInterval> | null = null;

  constructor(private readonly options: BroadcasterOptions) {}

  get size(): number {
    return this.subscribers.size;
  }

  add(subscriber: Subscriber): void {
    this.subscribers.add(subscriber);
    console.log(`[ws] Subscriber ${subscriber.id} connected (${this.subscribers.size} total)`);
  }

  /** Returns false when the subscriber was already gone */
  remove(subscriber: Subscriber, reason = 'disconnected'): boolean {
    if (!this.subscribers.delete(subscriber)) return false;
    console.log(`[ws] Subscriber ${subscriber.id} removed: ${reason} (${this.subscribers.size} left)`);
    try {
      subscriber.close();
    } catch (err) {
      console.warn(`[ws] Error closing subscriber ${subscriber.id}:`, errorMessage(err));
    }
    return true;
  }

  /** Deliver to one subscriber; it is removed on failure */
  sendTo(subscriber: Subscriber, event: DashboardEvent): boolean {
    let delivered: boolean;
    try {
      delivered = subscriber.send(event);
    } catch (err) {
      this.remove(subscriber, `send failed: ${errorMessage(err)}`);
      return false;
    }
    if (!delivered) this.remove(subscriber, `send of ${event.type} failed`);
    return delivered;
  }

  /** Send to every subscriber bound to `projectRoot`; returns the delivery count */
  publish(projectRoot: string, event: DashboardEvent): number {
    let delivered = 0;
    for (const subscriber of [...this.subscribers]) {
      if (subscriber.projectRoot !== projectRoot) continue;
      if (this.sendTo(subscriber, event)) delivered++;
    }
    return delivered;
  }

  /** Send to every subscriber regardless of binding */
  broadcast(event: DashboardEvent): number {
    let delivered = 0;
    for (const subscriber of [...this.subscribers]) {
      if (this.sendTo(subscriber, event)) delivered++;
    }
    return delivered;
  }

  /** Move every subscriber to a new session and tell it so */
  rebindAll(projectRoot: string | null, sessionId: string): void {
    for (const subscriber of [...this.subscribers]) {
      subscriber.projectRoot = projectRoot;
      this.sendTo(subscriber, { type: 'connected', data: { sessionId, projectRoot } });
    }
  }

  startHeartbeat(): void {
    if (this.heartbeat) return;
    this.heartbeat = setInterval(() => {
      this.broadcast({ type: 'heartbeat', data: { timestamp: new Date().toISOString() } });
    }, this.options.heartbeatIntervalMs);
    this.heartbeat.unref();
  }

  stopHeartbeat(): void {
    if (this.heartbeat) clearInterval(this.heartbeat);
    this.heartbeat = null;
  }

  closeAll(): void {
    this.stopHeartbeat();
    for (const subscriber of [...this.subscribers]) this.remove(subscriber, 'server shutting down');
  }
}
