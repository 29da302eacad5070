import { randomUUID } from 'crypto';
import { WebSocket } from 'ws';
import type { DashboardEvent } from '@bmad-dashboard/shared';
import type { Broadcaster, Subscriber } from './broadcaster';
import { errorMessage } from '../utils';

/** Sends beyond this much unflushed data count as failed */
export const MAX_BUFFERED_BYTES = 1024 * 1024;

/**
 * Wrap a socket as a Subscriber. A write error reported asynchronously
 * by `ws` removes the subscriber through the broadcaster, the same way a
 * synchronous failure does.
 */
export function createWsSubscriber(ws: WebSocket, broadcaster: Broadcaster, projectRoot: string | null): Subscriber {
  const subscriber: Subscriber = {
    id: randomUUID(),
    projectRoot,
    send(event: DashboardEvent): boolean {
      if (ws.readyState !== WebSocket.OPEN) return false;
      if (ws.bufferedAmount > MAX_BUFFERED_BYTES) return false;
      ws.send(JSON.stringify(event), (err) => {
        if (err) broadcaster.remove(subscriber, `async send error: ${errorMessage(err)}`);
      });
      return true;
    },
    close(): void {
      if (ws.readyState === WebSocket.OPEN || ws.readyState === WebSocket.CONNECTING) {
        ws.close(1001, 'Going away');
      }
    },
  };

  ws.on('close', () => broadcaster.remove(subscriber, 'socket closed'));
  ws.on('error', (err) => broadcaster.remove(subscriber, `socket error: ${errorMessage(err)}`));
  return subscriber;
}
