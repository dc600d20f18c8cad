import { describe, it, expect } from "vitest";
import {
  beatsToBars,
  beatsToClocks,
  beatsToQuarterNotes,
  decodeSongPosition,
  encodeSongPosition,
} from "./song-position.js";

describe("Song Position Pointer", () => {
  it("splits 200 beats into LSB 0x48 and MSB 0x01", () => {
    expect(encodeSongPosition(200)).toEqual([0x48, 0x01]);
    expect(decodeSongPosition(0x48, 0x01)).toBe(200);
  });

  it("covers the full 14-bit range", () => {
    expect(encodeSongPosition(0)).toEqual([0, 0]);
    expect(encodeSongPosition(16383)).toEqual([0x7f, 0x7f]);
    expect(decodeSongPosition(0x7f, 0x7f)).toBe(16383);
  });

  it("rejects positions outside 0–16383", () => {
    expect(() => encodeSongPosition(16384)).toThrow("Song position must be 0–16383 beats: got 16384");
    expect(() => encodeSongPosition(-1)).toThrow();
    expect(() => encodeSongPosition(1.5)).toThrow();
  });

  it("rejects bytes with the high bit set", () => {
    expect(() => decodeSongPosition(0x80, 0)).toThrow("Song position LSB must be a 7-bit data byte: got 128");
  });
});

describe("musical position", () => {
  it("converts 200 beats to 50 quarter notes", () => {
    expect(beatsToQuarterNotes(200)).toBe(50);
  });

  it("converts beats to bars for the time signature", () => {
    expect(beatsToBars(200)).toBe(12.5);
    expect(beatsToBars(192, 3)).toBe(16);
    expect(() => beatsToBars(200, 0)).toThrow();
  });

  it("converts beats to clocks", () => {
    expect(beatsToClocks(200)).toBe(1200);
  });
});
