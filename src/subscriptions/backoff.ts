export interface BackoffPolicy {
  base: number;
  max: number;
  jitter: number;
}

/**
 * Delay before retry number `attempt` (1-based): `base * 2^(attempt-1)`
 * capped at `max`, plus up to `jitter * delay` of random spread.
 */
export function computeBackoff(
  attempt: number,
  policy: BackoffPolicy,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, attempt - 1);
  const delay = Math.min(policy.base * 2 ** exponent, policy.max);
  return Math.round(delay + delay * policy.jitter * random());
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}
