import type { DashboardEvent, DashboardEventType } from '@bmad-dashboard/shared';
import { DEFAULT_RECONNECT_POLICY, reconnectDelay, type ReconnectPolicy } from './reconnectPolicy';

export type ConnectionStatus = 'idle' | 'connecting' | 'connected' | 'reconnecting' | 'failed';

export interface SocketHandlers {
  open(): void;
  message(raw: string): void;
  close(): void;
}

export interface SocketHandle {
  close(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketHandle;

const EVENT_TYPES: ReadonlySet<string> = new Set<DashboardEventType>([
  'connected',
  'workflow_update',
  'sprint_update',
  'claude_status',
  'heartbeat',
]);

/** Known event frames only; newer servers may send types this client does not handle */
export function parseEvent(raw: string): DashboardEvent | null {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    console.warn('[ws] Ignoring malformed frame');
    return null;
  }
  if (!isDashboardEvent(value)) return null;
  return value;
}

function isDashboardEvent(value: unknown): value is DashboardEvent {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string' &&
    EVENT_TYPES.has(value.type) &&
    'data' in value &&
    typeof value.data === 'object' &&
    value.data !== null
  );
}

export const browserSocket: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);
  ws.onopen = () => handlers.open();
  ws.onmessage = (event) => handlers.message(String(event.data));
  ws.onclose = () => handlers.close();
  ws.onerror = () => ws.close();
  return { close: () => ws.close() };
};

export interface EventStreamOptions {
  url: string;
  onEvent: (event: DashboardEvent) => void;
  onStatus: (status: ConnectionStatus) => void;
  policy?: ReconnectPolicy;
  socketFactory?: SocketFactory;
}

/**
 * WebSocket subscription with exponential reconnect. It only holds a
 * connection while `setLive(true)`; after the last attempt fails it stays
 * `failed` until `retry()`.
 */
export class EventStream {
  private socket: SocketHandle | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private attempt = 0;
  private live = false;
  private status: ConnectionStatus = 'idle';
  private readonly policy: ReconnectPolicy;
  private readonly socketFactory: SocketFactory;

  constructor(private readonly options: EventStreamOptions) {
    this.policy = options.policy ?? DEFAULT_RECONNECT_POLICY;
    this.socketFactory = options.socketFactory ?? browserSocket;
  }

  get connectionStatus(): ConnectionStatus {
    return this.status;
  }

  setLive(live: boolean): void {
    this.live = live;
    if (!live) {
      this.stop();
      return;
    }
    if (this.socket || this.timer || this.status === 'failed') return;
    this.open();
  }

  /** Manual reconnect, also after the attempts ran out */
  retry(): void {
    this.clearTimer();
    this.dropSocket();
    this.attempt = 0;
    this.live = true;
    this.open();
  }

  close(): void {
    this.live = false;
    this.stop();
  }

  private open(): void {
    this.setStatus(this.attempt === 0 ? 'connecting' : 'reconnecting');
    const socket = this.socketFactory(this.options.url, {
      open: () => {
        if (this.socket !== socket) return;
        this.attempt = 0;
        this.setStatus('connected');
      },
      message: (raw) => {
        if (this.socket !== socket) return;
        const event = parseEvent(raw);
        if (event) this.options.onEvent(event);
      },
      close: () => {
        if (this.socket !== socket) return;
        this.socket = null;
        this.scheduleReconnect();
      },
    });
    this.socket = socket;
  }

  private scheduleReconnect(): void {
    if (!this.live) {
      this.setStatus('idle');
      return;
    }
    this.attempt++;
    const delay = reconnectDelay(this.attempt, this.policy);
    if (delay === null) {
      console.warn(`[ws] Giving up after ${this.policy.maxAttempts} reconnect attempts`);
      this.setStatus('failed');
      return;
    }
    this.setStatus('reconnecting');
    this.timer = setTimeout(() => {
      this.timer = null;
      this.open();
    }, delay);
  }

  private stop(): void {
    this.clearTimer();
    this.dropSocket();
    this.attempt = 0;
    this.setStatus('idle');
  }

  private dropSocket(): void {
    const socket = this.socket;
    this.socket = null;
    socket?.close();
  }

  private clearTimer(): void {
    if (this.timer === null) return;
    clearTimeout(this.timer);
    this.timer = null;
  }

  private setStatus(status: ConnectionStatus): void {
    if (status === this.status) return;
    this.status = status;
    this.options.onStatus(status);
  }
}
