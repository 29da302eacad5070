import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { DashboardEvent } from '@bmad-dashboard/shared';
import { Broadcaster, type Subscriber } from '../events/broadcaster';

interface FakeSubscriber extends Subscriber {
  received: DashboardEvent[];
  closed: number;
}

function fake(id: string, projectRoot: string | null, behaviour: 'ok' | 'refuse' | 'throw' = 'ok'): FakeSubscriber {
  const subscriber: FakeSubscriber = {
    id,
    projectRoot,
    received: [],
    closed: 0,
    send(event) {
      if (behaviour === 'throw') throw new Error('socket gone');
      if (behaviour === 'refuse') return false;
      subscriber.received.push(event);
      return true;
    },
    close() {
      subscriber.closed++;
    },
  };
  return subscriber;
}

const HEARTBEAT_MS = 1_000;
const heartbeat: DashboardEvent = { type: 'heartbeat', data: { timestamp: '2024-01-01T00:00:00.000Z' } };

let broadcaster: Broadcaster;

beforeEach(() => {
  broadcaster = new Broadcaster({ heartbeatIntervalMs: HEARTBEAT_MS });
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  broadcaster.closeAll();
  vi.restoreAllMocks();
  vi.useRealTimers();
});

describe('Broadcaster.publish', () => {
  it('delivers only to subscribers bound to the project', () => {
    const a = fake('a', '/work/shop');
    const b = fake('b', '/work/shop');
    const other = fake('c', '/work/billing');
    [a, b, other].forEach((s) => broadcaster.add(s));

    expect(broadcaster.publish('/work/shop', heartbeat)).toBe(2);
    expect(a.received).toEqual([heartbeat]);
    expect(b.received).toEqual([heartbeat]);
    expect(other.received).toEqual([]);
  });

  it('drops a failing subscriber without affecting the others', () => {
    const before = fake('before', '/p');
    const broken = fake('broken', '/p', 'throw');
    const refusing = fake('refusing', '/p', 'refuse');
    const after = fake('after', '/p');
    [before, broken, refusing, after].forEach((s) => broadcaster.add(s));

    expect(broadcaster.publish('/p', heartbeat)).toBe(2);
    expect(before.received).toHaveLength(1);
    expect(after.received).toHaveLength(1);
    expect(broadcaster.size).toBe(2);
    expect(broken.closed).toBe(1);
    expect(refusing.closed).toBe(1);
  });

  it('tolerates a subscriber removing another mid-publish', () => {
    const victim = fake('victim', '/p');
    const remover = fake('remover', '/p');
    remover.send = (event) => {
      remover.received.push(event);
      broadcaster.remove(victim);
      return true;
    };
    broadcaster.add(remover);
    broadcaster.add(victim);

    broadcaster.publish('/p', heartbeat);
    expect(remover.received).toHaveLength(1);
    expect(broadcaster.size).toBe(1);
  });
});

describe('Broadcaster.remove', () => {
  it('removes and closes exactly once', () => {
    const s = fake('s', null);
    broadcaster.add(s);
    expect(broadcaster.remove(s)).toBe(true);
    expect(broadcaster.remove(s)).toBe(false);
    expect(s.closed).toBe(1);
  });
});

describe('Broadcaster.rebindAll', () => {
  it('moves every subscriber and announces the new session', () => {
    const a = fake('a', null);
    const b = fake('b', '/old');
    broadcaster.add(a);
    broadcaster.add(b);

    broadcaster.rebindAll('/new', 'session-2');
    const connected: DashboardEvent = { type: 'connected', data: { sessionId: 'session-2', projectRoot: '/new' } };
    expect(a.received).toEqual([connected]);
    expect(b.received).toEqual([connected]);
    expect(broadcaster.publish('/new', heartbeat)).toBe(2);
    expect(broadcaster.publish('/old', heartbeat)).toBe(0);
  });
});

describe('Broadcaster heartbeat', () => {
  it('reaches every subscriber on each interval until stopped', () => {
    vi.useFakeTimers();
    const bound = fake('bound', '/p');
    const idle = fake('idle', null);
    broadcaster.add(bound);
    broadcaster.add(idle);

    broadcaster.startHeartbeat();
    vi.advanceTimersByTime(HEARTBEAT_MS * 2);
    expect(bound.received.map((e) => e.type)).toEqual(['heartbeat', 'heartbeat']);
    expect(idle.received).toHaveLength(2);

    broadcaster.stopHeartbeat();
    vi.advanceTimersByTime(HEARTBEAT_MS * 2);
    expect(bound.received).toHaveLength(2);
  });

  it('closes everything on shutdown', () => {
    const a = fake('a', '/p');
    broadcaster.add(a);
    broadcaster.closeAll();
    expect(broadcaster.size).toBe(0);
    expect(a.closed).toBe(1);
  });
});
