import { describe, it, expect } from "vitest";
import { chunkSysEx, encodeMessage, encodeMessages, safeEncodeMessage } from "./encoder.js";
import type { EncodeWarning } from "./encoder.js";
import { decodeMessages } from "./decoder.js";
import { isMidiError } from "../errors.js";
import type { MidiMessage } from "./types.js";

function bytes(message: MidiMessage): number[] {
  return Array.from(encodeMessage(message));
}

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    return isMidiError(err) ? err.code : "not-a-midi-error";
  }
  return undefined;
}

describe("encodeMessage", () => {
  it("encodes channel messages with the channel in the low nibble", () => {
    expect(bytes({ kind: "noteOn", channel: 3, data0: 60, data1: 100, timestamp: 0 })).toEqual([0x93, 60, 100]);
    expect(bytes({ kind: "pitchBend", channel: 0, data0: 0, data1: 0x40, timestamp: 0 })).toEqual([0xe0, 0x00, 0x40]);
  });

  it("writes a single data byte for program change and channel pressure", () => {
    expect(bytes({ kind: "programChange", channel: 15, data0: 12, data1: 99, timestamp: 0 })).toEqual([0xcf, 12]);
    expect(bytes({ kind: "channelPressure", channel: 1, data0: 64, data1: 0, timestamp: 0 })).toEqual([0xd1, 64]);
  });

  it("frames SysEx with F0 and F7", () => {
    expect(bytes({ kind: "sysex", payload: Uint8Array.of(0x7e, 0x01), timestamp: 0 })).toEqual([0xf0, 0x7e, 0x01, 0xf7]);
  });

  it("encodes system common messages", () => {
    expect(bytes({ kind: "songPosition", beats: 200, timestamp: 0 })).toEqual([0xf2, 0x48, 0x01]);
    expect(bytes({ kind: "mtcQuarterFrame", value: 0x0a, timestamp: 0 })).toEqual([0xf1, 0x0a]);
    expect(bytes({ kind: "songSelect", song: 5, timestamp: 0 })).toEqual([0xf3, 0x05]);
    expect(bytes({ kind: "tuneRequest", timestamp: 0 })).toEqual([0xf6]);
  });

  it("encodes real-time messages as one byte", () => {
    expect(bytes({ kind: "clock", timestamp: 0 })).toEqual([0xf8]);
    expect(bytes({ kind: "reset", timestamp: 0 })).toEqual([0xff]);
  });

  it("rejects fields the wire format cannot carry", () => {
    expect(codeOf(() => encodeMessage({ kind: "noteOn", channel: 16, data0: 60, data1: 100, timestamp: 0 }))).toBe(
      "InvalidMessage"
    );
    expect(codeOf(() => encodeMessage({ kind: "controlChange", channel: 0, data0: 128, data1: 0, timestamp: 0 }))).toBe(
      "InvalidMessage"
    );
    expect(codeOf(() => encodeMessage({ kind: "sysex", payload: Uint8Array.of(0x80), timestamp: 0 }))).toBe(
      "InvalidMessage"
    );
    expect(codeOf(() => encodeMessage({ kind: "songPosition", beats: 16384, timestamp: 0 }))).toBe("InvalidMessage");
  });

  it("rejects a SysEx payload over the limit", () => {
    const message: MidiMessage = { kind: "sysex", payload: Uint8Array.of(1, 2, 3), timestamp: 0 };
    expect(codeOf(() => encodeMessage(message, { maxSysexBytes: 2 }))).toBe("InvalidMessage");
    expect(encodeMessage(message, { maxSysexBytes: 3 })).toHaveLength(5);
  });

  it("rejects an unknown kind", () => {
    const bogus = { kind: "bogus", timestamp: 0 } as unknown as MidiMessage;
    expect(codeOf(() => encodeMessage(bogus))).toBe("InvalidMessage");
  });
});

describe("safeEncodeMessage", () => {
  it("collects a warning instead of throwing", () => {
    const warnings: EncodeWarning[] = [];
    const result = safeEncodeMessage({ kind: "noteOn", channel: 16, data0: 60, data1: 100, timestamp: 0 }, warnings);
    expect(result).toBeNull();
    expect(warnings).toEqual([{ kind: "noteOn", message: "noteOn: channel must be 0–15: got 16" }]);
  });
});

describe("round trip", () => {
  it("decodes the encoding of every message kind back to itself", () => {
    const messages: MidiMessage[] = [
      { kind: "noteOff", channel: 1, data0: 60, data1: 0, timestamp: 0 },
      { kind: "noteOn", channel: 2, data0: 61, data1: 90, timestamp: 0 },
      { kind: "polyPressure", channel: 3, data0: 62, data1: 10, timestamp: 0 },
      { kind: "controlChange", channel: 4, data0: 7, data1: 127, timestamp: 0 },
      { kind: "programChange", channel: 5, data0: 40, data1: 0, timestamp: 0 },
      { kind: "channelPressure", channel: 6, data0: 33, data1: 0, timestamp: 0 },
      { kind: "pitchBend", channel: 7, data0: 0x7f, data1: 0x7f, timestamp: 0 },
      { kind: "sysex", payload: Uint8Array.of(0x43, 0x10, 0x4c), timestamp: 0 },
      { kind: "mtcQuarterFrame", value: 0x76, timestamp: 0 },
      { kind: "songPosition", beats: 16383, timestamp: 0 },
      { kind: "songSelect", song: 9, timestamp: 0 },
      { kind: "tuneRequest", timestamp: 0 },
      { kind: "clock", timestamp: 0 },
      { kind: "start", timestamp: 0 },
      { kind: "continue", timestamp: 0 },
      { kind: "stop", timestamp: 0 },
      { kind: "activeSense", timestamp: 0 },
      { kind: "reset", timestamp: 0 },
    ];
    expect(decodeMessages(encodeMessages(messages))).toEqual(messages);
  });
});

describe("chunkSysEx", () => {
  it("splits a long buffer into writes of at most the given size", () => {
    const data = Uint8Array.of(0xf0, 1, 2, 3, 4, 5, 6, 7, 8, 0xf7);
    const chunks = chunkSysEx(data, 4);
    expect(chunks.map((c) => Array.from(c))).toEqual([
      [0xf0, 1, 2, 3],
      [4, 5, 6, 7],
      [8, 0xf7],
    ]);
  });

  it("returns a buffer that fits as one chunk", () => {
    const data = Uint8Array.of(0xf0, 0x01, 0xf7);
    expect(chunkSysEx(data, 3)).toEqual([data]);
  });

  it("rejects a chunk size below 1", () => {
    expect(codeOf(() => chunkSysEx(Uint8Array.of(0xf8), 0))).toBe("InvalidArgument");
  });
});
