/**
 * Reconnect policies.
 *
 * `nextDelay` receives the 1-based attempt number of the retry about to be
 * scheduled and returns the delay in milliseconds, or null to give up.
 */

export interface ReconnectPolicy {
  nextDelay(attempt: number): number | null;
}

/** Same delay every time, optionally capped at `maxAttempts` retries */
export function fixedDelay(delayMs: number, maxAttempts = Infinity): ReconnectPolicy {
  return {
    nextDelay: (attempt) => (attempt > maxAttempts ? null : delayMs),
  };
}

export interface LinearBackoffOptions {
  maxMultiplier?: number;
  maxAttempts?: number;
}

/** Delay grows with the attempt number until `maxMultiplier`, then stays flat */
export function linearBackoff(
  intervalMs: number,
  { maxMultiplier = 5, maxAttempts = 10 }: LinearBackoffOptions = {}
): ReconnectPolicy {
  return {
    nextDelay: (attempt) =>
      attempt > maxAttempts ? null : intervalMs * Math.min(attempt, maxMultiplier),
  };
}
