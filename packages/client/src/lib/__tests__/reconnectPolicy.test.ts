import { describe, it, expect } from 'vitest';
import { DEFAULT_RECONNECT_POLICY, reconnectDelay } from '../reconnectPolicy';

describe('reconnectDelay', () => {
  it('doubles from three seconds', () => {
    expect(reconnectDelay(1)).toBe(3000);
    expect(reconnectDelay(2)).toBe(6000);
    expect(reconnectDelay(3)).toBe(12_000);
    expect(reconnectDelay(4)).toBe(24_000);
  });

  it('caps the wait at thirty seconds', () => {
    expect(reconnectDelay(5)).toBe(30_000);
    expect(reconnectDelay(10)).toBe(30_000);
  });

  it('gives up after the last attempt', () => {
    expect(reconnectDelay(DEFAULT_RECONNECT_POLICY.maxAttempts + 1)).toBeNull();
    expect(reconnectDelay(0)).toBeNull();
  });

  it('honours a custom policy', () => {
    const policy = { baseDelayMs: 100, maxDelayMs: 250, maxAttempts: 2 };
    expect(reconnectDelay(1, policy)).toBe(100);
    expect(reconnectDelay(2, policy)).toBe(200);
    expect(reconnectDelay(3, policy)).toBeNull();
  });
});
