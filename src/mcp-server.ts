#!/usr/bin/env node
// ─── midiwire: MCP Server ───────────────────────────────────────────────────
//
// Exposes the MIDI 1.0 codec as MCP tools, so an LLM can read and write raw
// MIDI without doing the bit-twiddling itself.
//
// Usage:
//   node dist/mcp-server.js          # stdio transport
//
// Tools:
//   decode_bytes       decode a hex byte string into messages
//   encode_message     encode JSON messages into wire bytes
//   assemble_timecode  assemble MTC quarter frames into SMPTE timecode
//   song_position      Song Position Pointer bytes ↔ musical position
//   estimate_tempo     tempo from MIDI Clock timestamps
// ─────────────────────────────────────────────────────────────────────────────

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import {
  assembleTimecode,
  decodeHex,
  encodeJson,
  songPositionFromHex,
  songPositionInfo,
  tempoFromClockTimestamps,
} from "./commands.js";
import { loadCodecConfigFromEnv } from "./config/loader.js";
import { describeMessage } from "./describe.js";
import { errorCodeLabel, errorMessage, isMidiError } from "./errors.js";
import { formatHex } from "./hex.js";
import { messageToJson } from "./midi/schema.js";
import { SONG_POSITION_MAX } from "./sync/song-position.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

type ToolResult = {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
};

function text(body: string): ToolResult {
  return { content: [{ type: "text", text: body }] };
}

function toolError(err: unknown): ToolResult {
  const prefix = isMidiError(err) ? `[${errorCodeLabel(err.code)}] ` : "";
  return { content: [{ type: "text", text: `${prefix}${errorMessage(err)}` }], isError: true };
}

// ─── Server ─────────────────────────────────────────────────────────────────

const config = loadCodecConfigFromEnv();

const server = new McpServer({
  name: "midiwire",
  version: "0.1.0",
});

// ─── Tool: decode_bytes ─────────────────────────────────────────────────────

server.tool(
  "decode_bytes",
  "Decode raw MIDI 1.0 bytes (hex) into messages. Real-time bytes inside SysEx are reported separately; running status is not applied.",
  {
    hex: z.string().describe("Bytes as hex, e.g. 'F0 7E 01 F7 90 3C 64'"),
  },
  async ({ hex }) => {
    try {
      const messages = decodeHex(hex, config);
      if (messages.length === 0) return text("No complete messages.");
      const lines = messages.map(describeMessage).join("\n");
      const json = JSON.stringify(messages.map(messageToJson), null, 2);
      return text(`Decoded ${messages.length} message(s):\n\n${lines}\n\n${json}`);
    } catch (err) {
      return toolError(err);
    }
  }
);

// ─── Tool: encode_message ───────────────────────────────────────────────────

server.tool(
  "encode_message",
  "Encode MIDI messages into wire bytes. Each message has a 'kind' (noteOn, controlChange, sysex, songPosition, clock, ...) and its fields.",
  {
    messages: z
      .array(z.record(z.unknown()))
      .min(1)
      .describe("Messages, e.g. [{ kind: 'noteOn', channel: 0, data0: 60, data1: 100 }]"),
  },
  async ({ messages }) => {
    try {
      const bytes = encodeJson(messages, config);
      return text(`${bytes.length} byte(s): ${formatHex(bytes)}`);
    } catch (err) {
      return toolError(err);
    }
  }
);

// ─── Tool: assemble_timecode ────────────────────────────────────────────────

server.tool(
  "assemble_timecode",
  "Assemble MIDI Time Code quarter frames into SMPTE timecode. Accepts bare data bytes or full F1 messages.",
  {
    hex: z.string().describe("Quarter frames as hex, e.g. 'F1 0A F1 10 ...' or '0A 10 2D 32 47 51 61 76'"),
  },
  async ({ hex }) => {
    try {
      const frames = assembleTimecode(hex);
      if (frames.length === 0) return text("Fewer than 8 quarter frames: no complete timecode.");
      return text(
        frames.map((f) => `${f.timecode}  ${f.rateLabel}  (${f.seconds.toFixed(3)} s)`).join("\n")
      );
    } catch (err) {
      return toolError(err);
    }
  }
);

// ─── Tool: song_position ────────────────────────────────────────────────────

server.tool(
  "song_position",
  "Convert between a Song Position Pointer (MIDI beats, one per sixteenth note) and its two wire bytes, with quarter notes and bars.",
  {
    beats: z.number().int().min(0).max(SONG_POSITION_MAX).optional().describe("Position in MIDI beats"),
    hex: z.string().optional().describe("The two data bytes, LSB first, e.g. '48 01'"),
    beatsPerBar: z.number().positive().optional().describe("Time signature numerator (default 4)"),
  },
  async ({ beats, hex, beatsPerBar }) => {
    try {
      if (beats === undefined && hex === undefined) {
        return { ...text("Provide either beats or hex."), isError: true };
      }
      const info =
        hex !== undefined ? songPositionFromHex(hex, beatsPerBar) : songPositionInfo(beats ?? 0, beatsPerBar);
      return text(
        [
          `Beats: ${info.beats}`,
          `Bytes: F2 ${formatHex(info.bytes)}`,
          `Quarter notes: ${info.quarterNotes}`,
          `Bars: ${info.bars}`,
          `Clocks: ${info.clocks}`,
        ].join("\n")
      );
    } catch (err) {
      return toolError(err);
    }
  }
);

// ─── Tool: estimate_tempo ───────────────────────────────────────────────────

server.tool(
  "estimate_tempo",
  "Estimate tempo from consecutive MIDI Clock timestamps (24 clocks per quarter note).",
  {
    timestamps: z.array(z.number()).min(2).describe("Clock arrival times in seconds, in order"),
  },
  async ({ timestamps }) => {
    const bpm = tempoFromClockTimestamps(timestamps);
    return text(`${bpm.toFixed(2)} BPM`);
  }
);

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  console.error("midiwire MCP server running on stdio");
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
