export interface ReconnectPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
  maxAttempts: number;
}

export const RECONNECT_POLICY: ReconnectPolicy = {
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  maxAttempts: 10,
};

/**
 * Delay before reconnect attempt `attempt` (1-based): base · 2^attempt,
 * capped at `maxDelayMs`.
 */
export function reconnectDelay(attempt: number, policy: ReconnectPolicy = RECONNECT_POLICY): number {
  return Math.min(policy.baseDelayMs * 2 ** attempt, policy.maxDelayMs);
}

export function canRetry(attempt: number, policy: ReconnectPolicy = RECONNECT_POLICY): boolean {
  return attempt < policy.maxAttempts;
}
