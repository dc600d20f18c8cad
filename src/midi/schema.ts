// ─── Message Schema ─────────────────────────────────────────────────────────
//
// Zod schema for messages that arrive as JSON (CLI arguments, MCP tool
// input). SysEx payloads may be given as a byte array or a hex string.
// ─────────────────────────────────────────────────────────────────────────────

import { z } from "zod";
import { MidiError } from "../errors.js";
import { parseHexBytes } from "../hex.js";
import { SONG_POSITION_MAX } from "../sync/song-position.js";
import { CHANNEL_KINDS, REALTIME_KINDS, isSysExMessage } from "./types.js";
import type { MidiMessage } from "./types.js";

// ─── Zod Schemas ─────────────────────────────────────────────────────────────

const DataByteSchema = z.number().int().min(0).max(0x7f);
const TimestampSchema = z.number().finite().default(0);

const PayloadSchema = z
  .union([z.array(DataByteSchema), z.string()])
  .transform((value, ctx) => {
    if (Array.isArray(value)) return Uint8Array.from(value);
    try {
      const bytes = parseHexBytes(value);
      const bad = bytes.findIndex((b) => b > 0x7f);
      if (bad !== -1) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `byte ${bad} is not a 7-bit data byte` });
        return z.NEVER;
      }
      return bytes;
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      });
      return z.NEVER;
    }
  });

export const ChannelMessageSchema = z.object({
  kind: z.enum(CHANNEL_KINDS),
  channel: z.number().int().min(0).max(15),
  data0: DataByteSchema,
  data1: DataByteSchema.default(0),
  timestamp: TimestampSchema,
});

export const SysExMessageSchema = z.object({
  kind: z.literal("sysex"),
  payload: PayloadSchema,
  timestamp: TimestampSchema,
});

export const MtcQuarterFrameMessageSchema = z.object({
  kind: z.literal("mtcQuarterFrame"),
  value: DataByteSchema,
  timestamp: TimestampSchema,
});

export const SongPositionMessageSchema = z.object({
  kind: z.literal("songPosition"),
  beats: z.number().int().min(0).max(SONG_POSITION_MAX),
  timestamp: TimestampSchema,
});

export const SongSelectMessageSchema = z.object({
  kind: z.literal("songSelect"),
  song: DataByteSchema,
  timestamp: TimestampSchema,
});

export const TuneRequestMessageSchema = z.object({
  kind: z.literal("tuneRequest"),
  timestamp: TimestampSchema,
});

export const RealtimeMessageSchema = z.object({
  kind: z.enum(REALTIME_KINDS),
  timestamp: TimestampSchema,
});

export const MidiMessageSchema = z.discriminatedUnion("kind", [
  ChannelMessageSchema,
  SysExMessageSchema,
  MtcQuarterFrameMessageSchema,
  SongPositionMessageSchema,
  SongSelectMessageSchema,
  TuneRequestMessageSchema,
  RealtimeMessageSchema,
]);

/** Message as written in JSON, before defaults and payload conversion. */
export type MidiMessageInput = z.input<typeof MidiMessageSchema>;

// ─── Parsing ─────────────────────────────────────────────────────────────────

/**
 * Validate a JSON-shaped message. Throws MidiError("InvalidMessage") listing
 * every issue.
 */
export function parseMessage(input: unknown): MidiMessage {
  const result = MidiMessageSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "message"}: ${i.message}`)
      .join("; ");
    throw new MidiError("InvalidMessage", `Invalid message: ${issues}`);
  }
  return result.data;
}

/** JSON-friendly form of a message: SysEx payload as a byte array. */
export function messageToJson(message: MidiMessage): Record<string, unknown> {
  if (isSysExMessage(message)) {
    return { ...message, payload: Array.from(message.payload) };
  }
  return { ...message };
}
