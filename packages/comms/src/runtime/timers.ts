/** Longest delay `setTimeout` honours; anything above it fires after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

/**
 * Converts a timeout in seconds to a timer delay in milliseconds, clamped to
 * the range timers accept.
 */
export function timeoutToDelay(seconds: number): number {
  return Math.min(Math.max(seconds * 1000, 0), MAX_TIMER_DELAY_MS);
}
