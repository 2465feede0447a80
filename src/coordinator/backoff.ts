// =============================================================================
// Retry backoff
// =============================================================================

/** Quadratic backoff: attempt 1 waits `baseMs`, attempt 2 waits `4 × baseMs`. */
export function backoffDelayMs(attempt: number, baseMs: number): number {
  return attempt * attempt * baseMs;
}
