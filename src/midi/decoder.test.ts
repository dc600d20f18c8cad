import { describe, it, expect } from "vitest";
import { StreamDecoder, decodeMessages } from "./decoder.js";
import { MidiError, isMidiError } from "../errors.js";

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return isMidiError(err) ? err.code : "not-a-midi-error";
  }
  return undefined;
}

// ─── Channel & System Common ────────────────────────────────────────────────

describe("StreamDecoder: channel messages", () => {
  it("decodes a note on with its channel and data", () => {
    const decoder = new StreamDecoder();
    expect(decoder.decodeAll([0x93, 0x3c, 0x64], 1.25)).toEqual([
      { kind: "noteOn", channel: 3, data0: 60, data1: 100, timestamp: 1.25 },
    ]);
  });

  it("reads one data byte for program change and sets data1 to 0", () => {
    const decoder = new StreamDecoder();
    expect(decoder.decodeAll([0xc5, 0x07], 0)).toEqual([
      { kind: "programChange", channel: 5, data0: 7, data1: 0, timestamp: 0 },
    ]);
  });

  it("decodes several messages in one arrival", () => {
    const messages = new StreamDecoder().decodeAll([0x90, 0x3c, 0x64, 0xb1, 0x07, 0x7f, 0xe0, 0x00, 0x40], 0);
    expect(messages.map((m) => m.kind)).toEqual(["noteOn", "controlChange", "pitchBend"]);
  });

  it("drops data bytes with no status byte (no running status)", () => {
    const decoder = new StreamDecoder();
    expect(decoder.decodeAll([0x3c, 0x64, 0x90, 0x3c, 0x64, 0x3e, 0x64], 0)).toEqual([
      { kind: "noteOn", channel: 0, data0: 60, data1: 100, timestamp: 0 },
    ]);
  });

  it("drops a message cut short by the end of the arrival", () => {
    const decoder = new StreamDecoder();
    expect(decoder.decodeAll([0x90, 0x3c], 0)).toEqual([]);
    expect(decoder.decodeAll([0x64], 1)).toEqual([]);
  });

  it("drops a message interrupted by another status byte", () => {
    const decoder = new StreamDecoder();
    expect(decoder.decodeAll([0x90, 0x3c, 0x80, 0x3c, 0x00], 0)).toEqual([
      { kind: "noteOff", channel: 0, data0: 60, data1: 0, timestamp: 0 },
    ]);
  });

  it("decodes system common messages", () => {
    const decoder = new StreamDecoder();
    expect(decoder.decodeAll([0xf2, 0x48, 0x01, 0xf1, 0x0a, 0xf3, 0x05, 0xf6], 2)).toEqual([
      { kind: "songPosition", beats: 200, timestamp: 2 },
      { kind: "mtcQuarterFrame", value: 0x0a, timestamp: 2 },
      { kind: "songSelect", song: 5, timestamp: 2 },
      { kind: "tuneRequest", timestamp: 2 },
    ]);
  });

  it("skips reserved status bytes", () => {
    const decoder = new StreamDecoder();
    expect(decoder.decodeAll([0xf4, 0xf5, 0xf9, 0xfd, 0xf7, 0x90, 0x3c, 0x64], 0)).toEqual([
      { kind: "noteOn", channel: 0, data0: 60, data1: 100, timestamp: 0 },
    ]);
  });
});

// ─── Real-Time ──────────────────────────────────────────────────────────────

describe("StreamDecoder: real-time", () => {
  it("decodes every real-time kind", () => {
    const messages = new StreamDecoder().decodeAll([0xf8, 0xfa, 0xfb, 0xfc, 0xfe, 0xff], 0);
    expect(messages.map((m) => m.kind)).toEqual(["clock", "start", "continue", "stop", "activeSense", "reset"]);
  });

  it("emits a clock between a status byte and its data before the message", () => {
    const decoder = new StreamDecoder();
    expect(decoder.decodeAll([0x90, 0x3c, 0xf8, 0x64], 3)).toEqual([
      { kind: "clock", timestamp: 3 },
      { kind: "noteOn", channel: 0, data0: 60, data1: 100, timestamp: 3 },
    ]);
  });

  it("emits a clock inside a SysEx block without disturbing the payload", () => {
    const decoder = new StreamDecoder();
    expect(decoder.decodeAll([0xf0, 0x01, 0xf8, 0x02, 0xf7], 4)).toEqual([
      { kind: "clock", timestamp: 4 },
      { kind: "sysex", payload: Uint8Array.of(0x01, 0x02), timestamp: 4 },
    ]);
  });
});

// ─── SysEx ──────────────────────────────────────────────────────────────────

describe("StreamDecoder: SysEx", () => {
  it("reassembles a block split across two arrivals", () => {
    const decoder = new StreamDecoder();
    expect(decoder.decodeAll([0xf0, 0x7e, 0x01], 1)).toEqual([]);
    expect(decoder.inSysEx).toBe(true);
    expect(decoder.pendingSysExBytes).toBe(2);

    expect(decoder.decodeAll([0x02, 0xf7], 2)).toEqual([
      { kind: "sysex", payload: Uint8Array.of(0x7e, 0x01, 0x02), timestamp: 1 },
    ]);
    expect(decoder.inSysEx).toBe(false);
  });

  it("decodes an empty block", () => {
    expect(new StreamDecoder().decodeAll([0xf0, 0xf7], 0)).toEqual([
      { kind: "sysex", payload: new Uint8Array(0), timestamp: 0 },
    ]);
  });

  it("ends a block as truncated when another status byte arrives", () => {
    const decoder = new StreamDecoder();
    expect(decoder.decodeAll([0xf0, 0x01, 0x02, 0x90, 0x3c, 0x64], 0)).toEqual([
      { kind: "sysex", payload: Uint8Array.of(0x01, 0x02), timestamp: 0, truncated: true },
      { kind: "noteOn", channel: 0, data0: 60, data1: 100, timestamp: 0 },
    ]);
  });

  it("accepts a payload exactly at capacity", () => {
    const decoder = new StreamDecoder({ maxSysexBytes: 4 });
    const [message] = decoder.decodeAll([0xf0, 1, 2, 3, 4, 0xf7], 0);
    expect(message).toEqual({ kind: "sysex", payload: Uint8Array.of(1, 2, 3, 4), timestamp: 0 });
  });

  it("throws BufferOverflow past capacity and stays stuck until reset", () => {
    const decoder = new StreamDecoder({ maxSysexBytes: 4 });
    expect(codeOf(() => decoder.decodeAll([0xf0, 1, 2, 3, 4, 5], 0))).toBe("BufferOverflow");
    expect(decoder.inSysEx).toBe(true);
    expect(codeOf(() => decoder.decodeAll([0x06], 1))).toBe("BufferOverflow");

    decoder.reset();
    expect(decoder.inSysEx).toBe(false);
    expect(decoder.decodeAll([0x90, 0x3c, 0x64], 2)).toEqual([
      { kind: "noteOn", channel: 0, data0: 60, data1: 100, timestamp: 2 },
    ]);
  });

  it("never emits an overflowed block, even when F7 or a status byte follows", () => {
    const decoder = new StreamDecoder({ maxSysexBytes: 4 });
    expect(codeOf(() => decoder.decodeAll([0xf0, 1, 2, 3, 4, 5, 6], 0))).toBe("BufferOverflow");
    expect(decoder.overflowed).toBe(true);

    expect(codeOf(() => decoder.decodeAll([0xf7], 1))).toBe("BufferOverflow");
    expect(codeOf(() => decoder.decodeAll([0x90, 0x3c, 0x64], 2))).toBe("BufferOverflow");
    expect(decoder.flush()).toBeNull();

    decoder.reset();
    expect(decoder.overflowed).toBe(false);
    expect(decoder.decodeAll([0xf7], 3)).toEqual([]);
  });

  it("still decodes real-time bytes after an overflow", () => {
    const decoder = new StreamDecoder({ maxSysexBytes: 2 });
    expect(codeOf(() => decoder.decodeAll([0xf0, 1, 2, 3], 0))).toBe("BufferOverflow");
    expect(decoder.decodeAll([0xf8, 0xfa], 1)).toEqual([
      { kind: "clock", timestamp: 1 },
      { kind: "start", timestamp: 1 },
    ]);
  });

  it("decode() yields messages that precede an overflow in the same arrival", () => {
    const decoder = new StreamDecoder({ maxSysexBytes: 2 });
    const seen: string[] = [];
    const run = () => {
      for (const message of decoder.decode([0xf8, 0xf0, 1, 2, 3], 0)) seen.push(message.kind);
    };
    expect(codeOf(run)).toBe("BufferOverflow");
    expect(seen).toEqual(["clock"]);
  });

  it("flush() emits an open block as truncated", () => {
    const decoder = new StreamDecoder();
    decoder.decodeAll([0xf0, 0x01], 5);
    expect(decoder.flush()).toEqual({
      kind: "sysex",
      payload: Uint8Array.of(0x01),
      timestamp: 5,
      truncated: true,
    });
    expect(decoder.flush()).toBeNull();
  });
});

// ─── Arguments ──────────────────────────────────────────────────────────────

describe("StreamDecoder: arguments", () => {
  it("rejects a non-positive capacity", () => {
    expect(() => new StreamDecoder({ maxSysexBytes: 0 })).toThrow(MidiError);
  });

  it("rejects a missing buffer", () => {
    const decoder = new StreamDecoder();
    expect(codeOf(() => decoder.decode(null as unknown as number[], 0))).toBe("InvalidArgument");
  });

  it("returns nothing for an empty arrival", () => {
    expect(new StreamDecoder().decodeAll([], 0)).toEqual([]);
  });
});

describe("decodeMessages", () => {
  it("appends an unterminated SysEx as truncated", () => {
    expect(decodeMessages([0xfa, 0xf0, 0x10, 0x20], 7)).toEqual([
      { kind: "start", timestamp: 7 },
      { kind: "sysex", payload: Uint8Array.of(0x10, 0x20), timestamp: 7, truncated: true },
    ]);
  });
});
