// ─── Hex Helpers ────────────────────────────────────────────────────────────
//
// Parsing and printing byte strings for the CLI, MCP tools and logs.
// Accepts "F0 01 02 F7", "f0,01,02,f7", "0xF0 0x01" and "F00102F7".
// ─────────────────────────────────────────────────────────────────────────────

import { MidiError } from "./errors.js";

/**
 * Parse a hex byte string into bytes.
 * Tokens may be separated by whitespace, commas or colons; a single
 * unseparated token of even length is read two digits at a time.
 */
export function parseHexBytes(text: string): Uint8Array {
  const tokens = text
    .trim()
    .split(/[\s,:]+/)
    .filter((t) => t.length > 0)
    .map((t) => t.replace(/^0x/i, ""));

  const digits = tokens.length === 1 && tokens[0].length > 2 ? splitPairs(tokens[0]) : tokens;

  return Uint8Array.from(
    digits.map((token) => {
      if (!/^[0-9a-fA-F]{1,2}$/.test(token)) {
        throw new MidiError("InvalidArgument", `Invalid hex byte: "${token}"`);
      }
      return parseInt(token, 16);
    })
  );
}

function splitPairs(token: string): string[] {
  if (token.length % 2 !== 0) {
    throw new MidiError("InvalidArgument", `Hex string has an odd number of digits: "${token}"`);
  }
  const pairs: string[] = [];
  for (let i = 0; i < token.length; i += 2) {
    pairs.push(token.slice(i, i + 2));
  }
  return pairs;
}

/** "F0 01 02 F7" */
export function formatHex(bytes: ArrayLike<number>, limit?: number): string {
  const all = Array.from(bytes);
  const shown = limit !== undefined && all.length > limit ? all.slice(0, limit) : all;
  const text = shown.map((b) => b.toString(16).toUpperCase().padStart(2, "0")).join(" ");
  return shown.length < all.length ? `${text} ...` : text;
}
