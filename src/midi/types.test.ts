import { describe, it, expect } from "vitest";
import {
  isChannelMessage,
  isRealtimeMessage,
  isSysExMessage,
  isSystemCommonMessage,
} from "./types.js";
import type { MidiMessage } from "./types.js";
import { isRealtimeByte, isStatusByte } from "./status.js";

const MESSAGES: MidiMessage[] = [
  { kind: "controlChange", channel: 0, data0: 7, data1: 100, timestamp: 0 },
  { kind: "sysex", payload: Uint8Array.of(0x01), timestamp: 0 },
  { kind: "songPosition", beats: 8, timestamp: 0 },
  { kind: "tuneRequest", timestamp: 0 },
  { kind: "clock", timestamp: 0 },
];

describe("message guards", () => {
  it("sort every message into exactly one family", () => {
    expect(MESSAGES.map(isChannelMessage)).toEqual([true, false, false, false, false]);
    expect(MESSAGES.map(isSysExMessage)).toEqual([false, true, false, false, false]);
    expect(MESSAGES.map(isSystemCommonMessage)).toEqual([false, false, true, true, false]);
    expect(MESSAGES.map(isRealtimeMessage)).toEqual([false, false, false, false, true]);
  });
});

describe("byte classes", () => {
  it("treats F8–FF as real-time, including the undefined F9 and FD", () => {
    expect([0xf7, 0xf8, 0xf9, 0xfd, 0xff].map(isRealtimeByte)).toEqual([false, true, true, true, true]);
  });

  it("treats any byte with the high bit set as a status byte", () => {
    expect([0x00, 0x7f, 0x80, 0xf0].map(isStatusByte)).toEqual([false, false, true, true]);
  });
});
