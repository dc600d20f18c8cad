// ─── midiwire: Byte-Stream Decoder ───────────────────────────────────────────
//
// Turns raw arrivals from a link layer into typed messages.
//
// The stream is stateful only across SysEx: a block opened by 0xF0 may span
// any number of arrivals and is emitted when 0xF7 arrives. Real-time bytes
// (0xF8–0xFF) are emitted the moment they are seen, including inside a SysEx
// block or between a status byte and its data bytes. Data bytes with no
// status byte before them in the same arrival are dropped: running status
// is not tracked.
// ─────────────────────────────────────────────────────────────────────────────

import { MidiError } from "../errors.js";
import { DEFAULT_MAX_SYSEX_BYTES } from "../config/schema.js";
import { decodeSongPosition } from "../sync/song-position.js";
import {
  SYSEX_END,
  SYSEX_START,
  channelDataLength,
  channelKindForStatus,
  isRealtimeByte,
  isStatusByte,
  realtimeKindForStatus,
  systemCommonDataLength,
  systemCommonKindForStatus,
} from "./status.js";
import type { MidiMessage, SysExMessage, SystemCommonKind } from "./types.js";

/** Bytes as delivered by a link layer. */
export type ByteInput = ArrayLike<number>;

export interface DecoderOptions {
  /** SysEx reassembly capacity in payload bytes. Default 4096. */
  maxSysexBytes?: number;
}

/** Data bytes gathered after a status byte. */
interface DataRun {
  data: number[];
  /** Index of the first byte not consumed. */
  next: number;
  /** False when the arrival ended or a status byte interrupted the run. */
  complete: boolean;
}

/**
 * Per-stream decoder. Keep one per logical input and feed it every arrival
 * in order. Not safe to share between streams.
 */
export class StreamDecoder {
  readonly maxSysexBytes: number;

  private readonly sysexBuffer: Uint8Array;
  private sysexLength = 0;
  private sysexOpen = false;
  private sysexOverflowed = false;
  private sysexTimestamp = 0;

  constructor(options: DecoderOptions = {}) {
    const max = options.maxSysexBytes ?? DEFAULT_MAX_SYSEX_BYTES;
    if (!Number.isInteger(max) || max < 1) {
      throw new MidiError("InvalidArgument", `maxSysexBytes must be a positive integer: got ${max}`);
    }
    this.maxSysexBytes = max;
    this.sysexBuffer = new Uint8Array(max);
  }

  /** True while a SysEx block is open and waiting for 0xF7. */
  get inSysEx(): boolean {
    return this.sysexOpen;
  }

  /** True after BufferOverflow, until reset(). */
  get overflowed(): boolean {
    return this.sysexOverflowed;
  }

  /** Payload bytes buffered for the open SysEx block. */
  get pendingSysExBytes(): number {
    return this.sysexLength;
  }

  /**
   * Decode one arrival. Messages are produced lazily; decoder state advances
   * as the sequence is iterated, so consume it to the end.
   *
   * Iteration throws MidiError("BufferOverflow") when a SysEx block outgrows
   * the buffer. Until reset(), real-time bytes still decode but any other
   * byte throws BufferOverflow again; the overflowed block is never emitted.
   */
  decode(bytes: ByteInput, timestamp: number): Generator<MidiMessage, void, undefined> {
    if (bytes === null || bytes === undefined) {
      throw new MidiError("InvalidArgument", "decode() needs a byte buffer");
    }
    return this.scan(bytes, timestamp);
  }

  /**
   * Decode one arrival into an array. If iteration throws, the messages
   * decoded before the error are lost with it; iterate decode() to keep them.
   */
  decodeAll(bytes: ByteInput, timestamp: number): MidiMessage[] {
    return [...this.decode(bytes, timestamp)];
  }

  /**
   * Emit the open SysEx block, if any, as a truncated message and close it.
   * Returns null for an overflowed block.
   */
  flush(timestamp?: number): SysExMessage | null {
    if (!this.sysexOpen || this.sysexOverflowed) return null;
    return this.closeSysEx(timestamp ?? this.sysexTimestamp, true);
  }

  /** Discard any open SysEx block. */
  reset(): void {
    this.sysexOpen = false;
    this.sysexOverflowed = false;
    this.sysexLength = 0;
    this.sysexTimestamp = 0;
  }

  // ─── Scanner ──────────────────────────────────────────────────────────────

  private *scan(bytes: ByteInput, timestamp: number): Generator<MidiMessage, void, undefined> {
    let i = 0;
    while (i < bytes.length) {
      const byte = bytes[i] & 0xff;

      // Real-time: one byte, legal anywhere
      if (isRealtimeByte(byte)) {
        const kind = realtimeKindForStatus(byte);
        if (kind) yield { kind, timestamp };
        i += 1;
        continue;
      }

      if (this.sysexOverflowed) throw this.overflowError();

      if (this.sysexOpen) {
        if (byte === SYSEX_END) {
          yield this.closeSysEx(this.sysexTimestamp, false);
          i += 1;
          continue;
        }
        if (!isStatusByte(byte)) {
          this.appendSysEx(byte);
          i += 1;
          continue;
        }
        // Any other status byte ends the block; the byte itself is handled below
        yield this.closeSysEx(this.sysexTimestamp, true);
      }

      if (byte === SYSEX_START) {
        this.sysexOpen = true;
        this.sysexLength = 0;
        this.sysexTimestamp = timestamp;
        i += 1;
        continue;
      }

      if (byte > SYSEX_START) {
        const kind = systemCommonKindForStatus(byte);
        if (!kind) {
          // 0xF4, 0xF5 and a stray 0xF7
          i += 1;
          continue;
        }
        const run = yield* this.collectData(bytes, i + 1, systemCommonDataLength(kind), timestamp);
        if (run.complete) yield systemCommonMessage(kind, run.data, timestamp);
        i = run.next;
        continue;
      }

      const channelKind = channelKindForStatus(byte);
      if (channelKind) {
        const length = channelDataLength(channelKind);
        const run = yield* this.collectData(bytes, i + 1, length, timestamp);
        if (run.complete) {
          yield {
            kind: channelKind,
            channel: byte & 0x0f,
            data0: run.data[0],
            data1: length === 2 ? run.data[1] : 0,
            timestamp,
          };
        }
        i = run.next;
        continue;
      }

      // Data byte with no status context
      i += 1;
    }
  }

  /**
   * Gather `count` data bytes starting at `start`, emitting any real-time
   * bytes met on the way.
   */
  private *collectData(
    bytes: ByteInput,
    start: number,
    count: number,
    timestamp: number
  ): Generator<MidiMessage, DataRun, undefined> {
    const data: number[] = [];
    let i = start;
    while (data.length < count) {
      if (i >= bytes.length) return { data, next: i, complete: false };
      const byte = bytes[i] & 0xff;
      if (isRealtimeByte(byte)) {
        const kind = realtimeKindForStatus(byte);
        if (kind) yield { kind, timestamp };
        i += 1;
        continue;
      }
      if (isStatusByte(byte)) return { data, next: i, complete: false };
      data.push(byte);
      i += 1;
    }
    return { data, next: i, complete: true };
  }

  // ─── SysEx buffer ─────────────────────────────────────────────────────────

  private appendSysEx(byte: number): void {
    if (this.sysexLength >= this.maxSysexBytes) {
      this.sysexOverflowed = true;
      throw this.overflowError();
    }
    this.sysexBuffer[this.sysexLength] = byte;
    this.sysexLength += 1;
  }

  private overflowError(): MidiError {
    return new MidiError(
      "BufferOverflow",
      `SysEx exceeds the ${this.maxSysexBytes}-byte buffer; reset the decoder to recover`
    );
  }

  private closeSysEx(timestamp: number, truncated: boolean): SysExMessage {
    const payload = this.sysexBuffer.slice(0, this.sysexLength);
    this.reset();
    const message: SysExMessage = { kind: "sysex", payload, timestamp };
    if (truncated) message.truncated = true;
    return message;
  }
}

function systemCommonMessage(kind: SystemCommonKind, data: number[], timestamp: number): MidiMessage {
  switch (kind) {
    case "mtcQuarterFrame":
      return { kind, value: data[0], timestamp };
    case "songPosition":
      return { kind, beats: decodeSongPosition(data[0], data[1]), timestamp };
    case "songSelect":
      return { kind, song: data[0], timestamp };
    case "tuneRequest":
      return { kind, timestamp };
  }
}

/**
 * Decode a self-contained buffer with a fresh decoder. A SysEx block left
 * open at the end is returned as a truncated message.
 */
export function decodeMessages(
  bytes: ByteInput,
  timestamp = 0,
  options: DecoderOptions = {}
): MidiMessage[] {
  const decoder = new StreamDecoder(options);
  const messages = decoder.decodeAll(bytes, timestamp);
  const pending = decoder.flush();
  if (pending) messages.push(pending);
  return messages;
}
