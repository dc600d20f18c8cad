// ─── MIDI Time Code Assembler ───────────────────────────────────────────────
//
// A timecode is sent as eight quarter-frame messages (0xF1 nn). Each data
// byte carries a piece number in bits 4–6 and a nibble in bits 0–3:
//
//   piece 0  frames  low nibble     piece 4  minutes low nibble
//   piece 1  frames  bit 4          piece 5  minutes high nibble
//   piece 2  seconds low nibble     piece 6  hours   low nibble
//   piece 3  seconds high nibble    piece 7  hours bit 4 + rate (bits 1–2)
//
// The piece number decides the slot, so repeated or out-of-order pieces
// overwrite their slot. A frame is produced on every eighth push.
// ─────────────────────────────────────────────────────────────────────────────

import { MidiError } from "../errors.js";

// ─── Types ──────────────────────────────────────────────────────────────────

/** Frame rates, in wire code order (0–3). */
export const MTC_RATES = ["24fps", "25fps", "29.97fps-drop", "30fps"] as const;

export type MtcRate = (typeof MTC_RATES)[number];

/** A decoded SMPTE timecode. */
export interface TimecodeFrame {
  hours: number;
  minutes: number;
  seconds: number;
  frames: number;
  rate: MtcRate;
}

/** Accumulator owned by one input stream. */
export interface MtcState {
  /** Nibbles indexed by piece number. */
  pieces: number[];
  /** Pieces received since the last full frame (0–7). */
  count: number;
}

const FRAMES_PER_SECOND: Record<MtcRate, number> = {
  "24fps": 24,
  "25fps": 25,
  "29.97fps-drop": 29.97,
  "30fps": 30,
};

const RATE_LABELS: Record<MtcRate, string> = {
  "24fps": "24fps",
  "25fps": "25fps",
  "29.97fps-drop": "29.97fps (drop)",
  "30fps": "30fps",
};

// ─── State ──────────────────────────────────────────────────────────────────

export function createMtcState(): MtcState {
  return { pieces: [0, 0, 0, 0, 0, 0, 0, 0], count: 0 };
}

/** Forget all received pieces, e.g. on transport Stop or Reset. */
export function resetMtcState(state: MtcState): void {
  state.pieces.fill(0);
  state.count = 0;
}

// ─── Assembly ───────────────────────────────────────────────────────────────

/**
 * Push one quarter-frame data byte. Returns the decoded frame on every
 * eighth push and null otherwise.
 */
export function pushQuarterFrame(state: MtcState, quarterFrame: number): TimecodeFrame | null {
  if (!Number.isInteger(quarterFrame) || quarterFrame < 0 || quarterFrame > 0xff) {
    throw new MidiError("InvalidArgument", `Quarter-frame byte must be 0–255: got ${quarterFrame}`);
  }

  const piece = (quarterFrame >> 4) & 0x07;
  state.pieces[piece] = quarterFrame & 0x0f;
  state.count += 1;
  if (state.count < 8) return null;

  state.count = 0;
  const p = state.pieces;
  return {
    frames: p[0] | ((p[1] & 0x01) << 4),
    seconds: p[2] | (p[3] << 4),
    minutes: p[4] | (p[5] << 4),
    hours: p[6] | ((p[7] & 0x01) << 4),
    rate: MTC_RATES[(p[7] >> 1) & 0x03],
  };
}

/**
 * The eight quarter-frame data bytes for a frame, pieces 0..7 in order.
 */
export function quarterFramesFor(frame: TimecodeFrame): number[] {
  assertField(frame.hours, 23, "hours");
  assertField(frame.minutes, 59, "minutes");
  assertField(frame.seconds, 59, "seconds");
  assertField(frame.frames, Math.ceil(FRAMES_PER_SECOND[frame.rate]) - 1, "frames");

  const rateCode = MTC_RATES.indexOf(frame.rate);
  const nibbles = [
    frame.frames & 0x0f,
    (frame.frames >> 4) & 0x01,
    frame.seconds & 0x0f,
    (frame.seconds >> 4) & 0x0f,
    frame.minutes & 0x0f,
    (frame.minutes >> 4) & 0x0f,
    frame.hours & 0x0f,
    ((frame.hours >> 4) & 0x01) | (rateCode << 1),
  ];
  return nibbles.map((nibble, piece) => (piece << 4) | nibble);
}

function assertField(value: number, max: number, name: string): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new MidiError("InvalidArgument", `Timecode ${name} must be 0–${max}: got ${value}`);
  }
}

// ─── Conversions ────────────────────────────────────────────────────────────

/** Nominal frames per second for a rate (29.97 for drop-frame). */
export function framesPerSecond(rate: MtcRate): number {
  return FRAMES_PER_SECOND[rate];
}

/**
 * Seconds from midnight. Drop-frame uses the plain 29.97 division; no
 * drop-frame correction is applied.
 */
export function timecodeToSeconds(frame: TimecodeFrame): number {
  return (
    frame.hours * 3600 +
    frame.minutes * 60 +
    frame.seconds +
    frame.frames / FRAMES_PER_SECOND[frame.rate]
  );
}

/** "24fps", "25fps", "29.97fps (drop)" or "30fps". */
export function frameRateLabel(rate: MtcRate): string {
  return RATE_LABELS[rate];
}

/** HH:MM:SS:FF */
export function formatTimecode(frame: TimecodeFrame): string {
  const two = (n: number) => String(n).padStart(2, "0");
  return `${two(frame.hours)}:${two(frame.minutes)}:${two(frame.seconds)}:${two(frame.frames)}`;
}
