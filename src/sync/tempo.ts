// ─── Clock Tempo Estimator ──────────────────────────────────────────────────
//
// MIDI Clock runs at 24 pulses per quarter note, so the gap between two
// consecutive clocks gives the tempo directly: bpm = 60 / (Δt × 24).
// ─────────────────────────────────────────────────────────────────────────────

/** Clock pulses per quarter note (fixed in MIDI 1.0). */
export const CLOCKS_PER_QUARTER_NOTE = 24;

/**
 * Tempo from two consecutive Clock timestamps (seconds).
 *
 * Returns `previousBpm` unchanged when there is no previous timestamp or
 * when the interval is not positive (jitter, reordering). Seed the first
 * call with whatever "unknown" value suits the caller, e.g. 0.
 */
export function estimateBpm(
  previousBpm: number,
  previousTimestamp: number | null,
  timestamp: number
): number {
  if (previousTimestamp === null) return previousBpm;
  const interval = timestamp - previousTimestamp;
  if (!(interval > 0)) return previousBpm;
  return 60 / (interval * CLOCKS_PER_QUARTER_NOTE);
}

/** Seconds between clocks at a given tempo. Inverse of estimateBpm. */
export function clockIntervalForBpm(bpm: number): number {
  return 60 / (bpm * CLOCKS_PER_QUARTER_NOTE);
}
