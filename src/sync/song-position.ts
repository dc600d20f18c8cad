// ─── Song Position Codec ────────────────────────────────────────────────────
//
// Song Position Pointer maths. One SPP "beat" is a MIDI beat: 6 clocks,
// one sixteenth note. Quarter notes = beats / 4; bars = quarter notes
// divided by the time signature numerator.
// ─────────────────────────────────────────────────────────────────────────────

import { MidiError } from "../errors.js";

/** Largest value the 14-bit pointer can carry. */
export const SONG_POSITION_MAX = 0x3fff;

/** MIDI clocks per SPP beat. */
export const CLOCKS_PER_SPP_BEAT = 6;

function assertDataByte(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 0x7f) {
    throw new MidiError("InvalidArgument", `${name} must be a 7-bit data byte: got ${value}`);
  }
}

function assertBeats(beats: number): void {
  if (!Number.isInteger(beats) || beats < 0 || beats > SONG_POSITION_MAX) {
    throw new MidiError("InvalidArgument", `Song position must be 0–${SONG_POSITION_MAX} beats: got ${beats}`);
  }
}

/**
 * Split a beat count into its wire bytes, LSB first.
 *
 *   encodeSongPosition(200) → [0x48, 0x01]
 */
export function encodeSongPosition(beats: number): [lsb: number, msb: number] {
  assertBeats(beats);
  return [beats & 0x7f, (beats >> 7) & 0x7f];
}

/** Join two wire bytes (LSB first) into a beat count. */
export function decodeSongPosition(lsb: number, msb: number): number {
  assertDataByte(lsb, "Song position LSB");
  assertDataByte(msb, "Song position MSB");
  return lsb | (msb << 7);
}

/** Beats → quarter notes (beats / 4). */
export function beatsToQuarterNotes(beats: number): number {
  return beats / 4;
}

/**
 * Beats → bars. The default numerator of 4 gives 4/4 bars (beats / 16);
 * pass the time signature numerator for anything else.
 */
export function beatsToBars(beats: number, beatsPerBar = 4): number {
  if (!(beatsPerBar > 0)) {
    throw new MidiError("InvalidArgument", `beatsPerBar must be positive: got ${beatsPerBar}`);
  }
  return beatsToQuarterNotes(beats) / beatsPerBar;
}

/** Beats → MIDI clock pulses (6 per beat). */
export function beatsToClocks(beats: number): number {
  return beats * CLOCKS_PER_SPP_BEAT;
}
