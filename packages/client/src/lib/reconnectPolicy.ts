export interface ReconnectPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
}

export const DEFAULT_RECONNECT_POLICY: ReconnectPolicy = {
  baseDelayMs: 3000,
  maxDelayMs: 30_000,
  maxAttempts: 10,
};

/** Wait before reconnect attempt `attempt` (1-based), or null once the attempts are used up */
export function reconnectDelay(attempt: number, policy: ReconnectPolicy = DEFAULT_RECONNECT_POLICY): number | null {
  if (attempt < 1 || attempt > policy.maxAttempts) return null;
  return Math.min(policy.baseDelayMs * 2 ** (attempt - 1), policy.maxDelayMs);
}
