// ─── MIDI Message Types ─────────────────────────────────────────────────────
//
// The typed message model shared by the decoder and encoder.
// Every variant carries the timestamp of the arrival it was decoded from.
// The unit is whatever the link layer supplies (seconds by convention);
// the codec never interprets it.
// ─────────────────────────────────────────────────────────────────────────────

// ─── Kinds ──────────────────────────────────────────────────────────────────

export const CHANNEL_KINDS = [
  "noteOff",
  "noteOn",
  "polyPressure",
  "controlChange",
  "programChange",
  "channelPressure",
  "pitchBend",
] as const;

export const SYSTEM_COMMON_KINDS = [
  "mtcQuarterFrame",
  "songPosition",
  "songSelect",
  "tuneRequest",
] as const;

export const REALTIME_KINDS = [
  "clock",
  "start",
  "continue",
  "stop",
  "activeSense",
  "reset",
] as const;

export type ChannelMessageKind = (typeof CHANNEL_KINDS)[number];
export type SystemCommonKind = (typeof SYSTEM_COMMON_KINDS)[number];
export type RealtimeKind = (typeof REALTIME_KINDS)[number];

/** Every message kind the codec knows. */
export type MidiMessageKind = ChannelMessageKind | "sysex" | SystemCommonKind | RealtimeKind;

// ─── Variants ───────────────────────────────────────────────────────────────

interface MessageBase {
  /** Arrival time, opaque to the codec. */
  timestamp: number;
}

/** Channel voice message (0x80–0xEF). */
export interface ChannelMessage extends MessageBase {
  kind: ChannelMessageKind;
  /** MIDI channel (0–15). */
  channel: number;
  /** First data byte: note, controller, program, pressure or bend LSB. */
  data0: number;
  /** Second data byte; 0 for programChange and channelPressure. */
  data1: number;
}

/** System-exclusive block. The payload excludes the 0xF0/0xF7 framing. */
export interface SysExMessage extends MessageBase {
  kind: "sysex";
  payload: Uint8Array;
  /** Set when the block ended without 0xF7 (flushed or cut by a status byte). */
  truncated?: true;
}

/** MTC quarter frame; `value` is the raw data byte (piece << 4 | nibble). */
export interface MtcQuarterFrameMessage extends MessageBase {
  kind: "mtcQuarterFrame";
  value: number;
}

/** Song Position Pointer, in MIDI beats (1 beat = 6 clocks = one 16th). */
export interface SongPositionMessage extends MessageBase {
  kind: "songPosition";
  /** 14-bit beat count (0–16383). */
  beats: number;
}

export interface SongSelectMessage extends MessageBase {
  kind: "songSelect";
  song: number;
}

export interface TuneRequestMessage extends MessageBase {
  kind: "tuneRequest";
}

/** Single-byte system real-time message. */
export interface RealtimeMessage extends MessageBase {
  kind: RealtimeKind;
}

export type SystemCommonMessage =
  | MtcQuarterFrameMessage
  | SongPositionMessage
  | SongSelectMessage
  | TuneRequestMessage;

/** Any decodable MIDI 1.0 message. */
export type MidiMessage =
  | ChannelMessage
  | SysExMessage
  | SystemCommonMessage
  | RealtimeMessage;

// ─── Guards ─────────────────────────────────────────────────────────────────

const CHANNEL_KIND_SET: ReadonlySet<string> = new Set(CHANNEL_KINDS);
const SYSTEM_COMMON_KIND_SET: ReadonlySet<string> = new Set(SYSTEM_COMMON_KINDS);
const REALTIME_KIND_SET: ReadonlySet<string> = new Set(REALTIME_KINDS);

export function isChannelKind(kind: string): kind is ChannelMessageKind {
  return CHANNEL_KIND_SET.has(kind);
}

export function isSystemCommonKind(kind: string): kind is SystemCommonKind {
  return SYSTEM_COMMON_KIND_SET.has(kind);
}

export function isRealtimeKind(kind: string): kind is RealtimeKind {
  return REALTIME_KIND_SET.has(kind);
}

export function isChannelMessage(message: MidiMessage): message is ChannelMessage {
  return isChannelKind(message.kind);
}

export function isSystemCommonMessage(message: MidiMessage): message is SystemCommonMessage {
  return isSystemCommonKind(message.kind);
}

export function isRealtimeMessage(message: MidiMessage): message is RealtimeMessage {
  return isRealtimeKind(message.kind);
}

export function isSysExMessage(message: MidiMessage): message is SysExMessage {
  return message.kind === "sysex";
}
