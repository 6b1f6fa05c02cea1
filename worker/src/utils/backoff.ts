export type Sleeper = (ms: number) => Promise<void>;

export const sleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Delay before retrying after the given 1-based attempt failed:
 * base, 2 * base, 4 * base, ...
 */
export function exponentialDelay(attempt: number, baseDelayMs: number): number {
  return baseDelayMs * Math.pow(2, attempt - 1);
}
