export type BackoffOptions = {
  baseMs: number;
  capMs: number;
  /** Full jitter draws uniformly from [0, ceiling); none returns the ceiling itself. */
  jitter?: 'full' | 'none';
};

/**
 * Exponential backoff delay for the given zero-based attempt: `min(cap, base * 2^attempt)`,
 * optionally scaled by a uniform random factor.
 */
export const computeBackoff = (
  attempt: number,
  { baseMs, capMs, jitter = 'full' }: BackoffOptions,
  random: () => number = Math.random,
): number => {
  const ceiling = Math.min(capMs, baseMs * 2 ** Math.max(0, attempt));
  return jitter === 'full' ? Math.floor(random() * ceiling) : ceiling;
};
