// ─── midiwire: Message Encoder ───────────────────────────────────────────────
//
// Typed message → wire bytes. The encoder always produces the complete
// logical byte sequence; splitting a long SysEx for a link with a small
// write size is the job of chunkSysEx().
// ─────────────────────────────────────────────────────────────────────────────

import { MidiError, errorMessage } from "../errors.js";
import { DEFAULT_MAX_SYSEX_BYTES } from "../config/schema.js";
import { encodeSongPosition, SONG_POSITION_MAX } from "../sync/song-position.js";
import {
  CHANNEL_STATUS,
  DATA_MAX,
  MTC_QUARTER_FRAME,
  REALTIME_STATUS,
  SONG_POSITION,
  SONG_SELECT,
  SYSEX_END,
  SYSEX_START,
  TUNE_REQUEST,
  channelDataLength,
} from "./status.js";
import type { MidiMessage } from "./types.js";

export interface EncoderOptions {
  /** Longest SysEx payload accepted. Default 4096. */
  maxSysexBytes?: number;
}

/** A message the encoder rejected, as collected by safeEncodeMessage(). */
export interface EncodeWarning {
  kind: string;
  message: string;
}

function assertRange(value: number, max: number, field: string, kind: string): void {
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new MidiError("InvalidMessage", `${kind}: ${field} must be 0–${max}: got ${value}`);
  }
}

/**
 * Encode one message into the bytes a receiver expects.
 *
 * Throws MidiError("InvalidMessage") for an unknown kind or a field the wire
 * format cannot carry, and MidiError("InvalidArgument") for a missing message.
 */
export function encodeMessage(message: MidiMessage, options: EncoderOptions = {}): Uint8Array {
  if (message === null || message === undefined) {
    throw new MidiError("InvalidArgument", "encodeMessage() needs a message");
  }

  const { kind } = message;

  switch (message.kind) {
    case "clock":
    case "start":
    case "continue":
    case "stop":
    case "activeSense":
    case "reset":
      return Uint8Array.of(REALTIME_STATUS[message.kind]);

    case "noteOff":
    case "noteOn":
    case "polyPressure":
    case "controlChange":
    case "programChange":
    case "channelPressure":
    case "pitchBend": {
      assertRange(message.channel, 0x0f, "channel", message.kind);
      assertRange(message.data0, DATA_MAX, "data0", message.kind);
      const status = (CHANNEL_STATUS[message.kind] << 4) | message.channel;
      if (channelDataLength(message.kind) === 1) {
        return Uint8Array.of(status, message.data0);
      }
      assertRange(message.data1, DATA_MAX, "data1", message.kind);
      return Uint8Array.of(status, message.data0, message.data1);
    }

    case "sysex": {
      const max = options.maxSysexBytes ?? DEFAULT_MAX_SYSEX_BYTES;
      const { payload } = message;
      if (!(payload instanceof Uint8Array)) {
        throw new MidiError("InvalidMessage", "sysex: payload must be a Uint8Array");
      }
      if (payload.length > max) {
        throw new MidiError("InvalidMessage", `sysex: payload of ${payload.length} bytes exceeds ${max}`);
      }
      const bad = payload.findIndex((b) => b > DATA_MAX);
      if (bad !== -1) {
        throw new MidiError(
          "InvalidMessage",
          `sysex: payload byte ${bad} is 0x${payload[bad].toString(16)}; SysEx data must be 7-bit`
        );
      }
      const out = new Uint8Array(payload.length + 2);
      out[0] = SYSEX_START;
      out.set(payload, 1);
      out[out.length - 1] = SYSEX_END;
      return out;
    }

    case "mtcQuarterFrame":
      assertRange(message.value, DATA_MAX, "value", message.kind);
      return Uint8Array.of(MTC_QUARTER_FRAME, message.value);

    case "songPosition": {
      assertRange(message.beats, SONG_POSITION_MAX, "beats", message.kind);
      const [lsb, msb] = encodeSongPosition(message.beats);
      return Uint8Array.of(SONG_POSITION, lsb, msb);
    }

    case "songSelect":
      assertRange(message.song, DATA_MAX, "song", message.kind);
      return Uint8Array.of(SONG_SELECT, message.song);

    case "tuneRequest":
      return Uint8Array.of(TUNE_REQUEST);

    default:
      throw new MidiError("InvalidMessage", `Unsupported message kind: ${String(kind)}`);
  }
}

/**
 * Like encodeMessage(), but records the failure in `warnings` and returns
 * null instead of throwing.
 */
export function safeEncodeMessage(
  message: MidiMessage,
  warnings: EncodeWarning[],
  options: EncoderOptions = {}
): Uint8Array | null {
  try {
    return encodeMessage(message, options);
  } catch (err) {
    warnings.push({
      kind: message === null || message === undefined ? "none" : String(message.kind),
      message: errorMessage(err),
    });
    return null;
  }
}

/** Encode a list of messages back to back (no running status). */
export function encodeMessages(messages: readonly MidiMessage[], options: EncoderOptions = {}): Uint8Array {
  const parts = messages.map((m) => encodeMessage(m, options));
  const out = new Uint8Array(parts.reduce((sum, p) => sum + p.length, 0));
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Split a logical buffer into writes of at most `maxChunkBytes`. Returns the
 * input as a single chunk when it already fits.
 */
export function chunkSysEx(bytes: Uint8Array, maxChunkBytes: number): Uint8Array[] {
  if (!Number.isInteger(maxChunkBytes) || maxChunkBytes < 1) {
    throw new MidiError("InvalidArgument", `maxChunkBytes must be a positive integer: got ${maxChunkBytes}`);
  }
  if (bytes.length <= maxChunkBytes) return [bytes];

  const chunks: Uint8Array[] = [];
  for (let offset = 0; offset < bytes.length; offset += maxChunkBytes) {
    chunks.push(bytes.subarray(offset, offset + maxChunkBytes));
  }
  return chunks;
}
