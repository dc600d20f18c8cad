// ─── midiwire: Command Core ─────────────────────────────────────────────────
//
// The operations behind the CLI and the MCP tools, kept free of I/O so both
// surfaces print the same thing.
// ─────────────────────────────────────────────────────────────────────────────

import type { CodecConfigInput } from "./config/schema.js";
import { resolveCodecConfig } from "./config/schema.js";
import { MidiError } from "./errors.js";
import { parseHexBytes } from "./hex.js";
import { decodeMessages } from "./midi/decoder.js";
import { encodeMessages } from "./midi/encoder.js";
import { parseMessage } from "./midi/schema.js";
import { MTC_QUARTER_FRAME } from "./midi/status.js";
import type { MidiMessage } from "./midi/types.js";
import {
  createMtcState,
  formatTimecode,
  frameRateLabel,
  pushQuarterFrame,
  quarterFramesFor,
  timecodeToSeconds,
} from "./sync/mtc.js";
import type { MtcRate, TimecodeFrame } from "./sync/mtc.js";
import {
  beatsToBars,
  beatsToClocks,
  beatsToQuarterNotes,
  decodeSongPosition,
  encodeSongPosition,
} from "./sync/song-position.js";
import { estimateBpm } from "./sync/tempo.js";

// ─── Decode / Encode ────────────────────────────────────────────────────────

/** Decode a hex byte string as one self-contained arrival. */
export function decodeHex(hex: string, config: CodecConfigInput = {}, timestamp = 0): MidiMessage[] {
  const { maxSysexBytes } = resolveCodecConfig(config);
  return decodeMessages(parseHexBytes(hex), timestamp, { maxSysexBytes });
}

/**
 * Encode a JSON message, or an array of them, to wire bytes.
 * Throws MidiError("InvalidMessage") naming the first bad entry.
 */
export function encodeJson(input: unknown, config: CodecConfigInput = {}): Uint8Array {
  const { maxSysexBytes } = resolveCodecConfig(config);
  const list = Array.isArray(input) ? input : [input];
  const messages = list.map((entry, index) => {
    try {
      return parseMessage(entry);
    } catch (err) {
      if (list.length > 1 && err instanceof MidiError) {
        throw new MidiError(err.code, `Message ${index}: ${err.message}`);
      }
      throw err;
    }
  });
  return encodeMessages(messages, { maxSysexBytes });
}

// ─── Timecode ───────────────────────────────────────────────────────────────

export interface TimecodeSummary {
  timecode: string;
  rate: MtcRate;
  rateLabel: string;
  seconds: number;
  frame: TimecodeFrame;
}

export function summarizeTimecode(frame: TimecodeFrame): TimecodeSummary {
  return {
    timecode: formatTimecode(frame),
    rate: frame.rate,
    rateLabel: frameRateLabel(frame.rate),
    seconds: timecodeToSeconds(frame),
    frame,
  };
}

/**
 * Assemble timecodes from quarter frames. The input is either bare data
 * bytes ("0A 10 2D ...") or full messages ("F1 0A F1 10 ..."). Returns one
 * frame per eight quarter frames.
 */
export function assembleTimecode(hex: string): TimecodeSummary[] {
  const bytes = parseHexBytes(hex);
  const values =
    bytes[0] === MTC_QUARTER_FRAME
      ? decodeMessages(bytes).flatMap((m) => (m.kind === "mtcQuarterFrame" ? [m.value] : []))
      : Array.from(bytes);

  const state = createMtcState();
  const frames: TimecodeSummary[] = [];
  for (const value of values) {
    const frame = pushQuarterFrame(state, value);
    if (frame) frames.push(summarizeTimecode(frame));
  }
  return frames;
}

/** Parse "HH:MM:SS:FF" into a frame at the given rate. */
export function parseTimecode(text: string, rate: MtcRate): TimecodeFrame {
  const match = /^(\d{1,2}):(\d{1,2}):(\d{1,2})[:;](\d{1,2})$/.exec(text.trim());
  if (!match) {
    throw new MidiError("InvalidArgument", `Timecode must look like HH:MM:SS:FF: got "${text}"`);
  }
  const [hours, minutes, seconds, frames] = match.slice(1).map(Number);
  return { hours, minutes, seconds, frames, rate };
}

/** The eight F1 messages that carry a timecode. */
export function timecodeMessages(frame: TimecodeFrame): Uint8Array {
  return Uint8Array.from(quarterFramesFor(frame).flatMap((value) => [MTC_QUARTER_FRAME, value]));
}

// ─── Song Position ──────────────────────────────────────────────────────────

export interface SongPositionSummary {
  beats: number;
  bytes: [lsb: number, msb: number];
  quarterNotes: number;
  bars: number;
  clocks: number;
}

export function songPositionInfo(beats: number, beatsPerBar = 4): SongPositionSummary {
  return {
    beats,
    bytes: encodeSongPosition(beats),
    quarterNotes: beatsToQuarterNotes(beats),
    bars: beatsToBars(beats, beatsPerBar),
    clocks: beatsToClocks(beats),
  };
}

/** Song position from its two data bytes given as hex ("48 01"). */
export function songPositionFromHex(hex: string, beatsPerBar = 4): SongPositionSummary {
  const bytes = parseHexBytes(hex);
  if (bytes.length !== 2) {
    throw new MidiError("InvalidArgument", `Song position needs exactly 2 data bytes: got ${bytes.length}`);
  }
  return songPositionInfo(decodeSongPosition(bytes[0], bytes[1]), beatsPerBar);
}

// ─── Tempo ──────────────────────────────────────────────────────────────────

/**
 * Tempo after feeding consecutive Clock timestamps through the estimator.
 * Returns 0 when fewer than two timestamps are given.
 */
export function tempoFromClockTimestamps(timestamps: readonly number[]): number {
  let bpm = 0;
  let previous: number | null = null;
  for (const timestamp of timestamps) {
    bpm = estimateBpm(bpm, previous, timestamp);
    previous = timestamp;
  }
  return bpm;
}
