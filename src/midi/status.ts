// ─── Status Byte Tables ─────────────────────────────────────────────────────
//
// Mapping between wire status bytes and message kinds.
// ─────────────────────────────────────────────────────────────────────────────

import { CHANNEL_KINDS, REALTIME_KINDS, SYSTEM_COMMON_KINDS } from "./types.js";
import type { ChannelMessageKind, RealtimeKind, SystemCommonKind } from "./types.js";

export const SYSEX_START = 0xf0;
export const SYSEX_END = 0xf7;

export const MTC_QUARTER_FRAME = 0xf1;
export const SONG_POSITION = 0xf2;
export const SONG_SELECT = 0xf3;
export const TUNE_REQUEST = 0xf6;

/** Largest value a 7-bit data byte can hold. */
export const DATA_MAX = 0x7f;

/** High nibble of each channel message status byte. */
export const CHANNEL_STATUS: Record<ChannelMessageKind, number> = {
  noteOff: 0x8,
  noteOn: 0x9,
  polyPressure: 0xa,
  controlChange: 0xb,
  programChange: 0xc,
  channelPressure: 0xd,
  pitchBend: 0xe,
};

const CHANNEL_KIND_BY_NIBBLE: ReadonlyMap<number, ChannelMessageKind> = new Map(
  CHANNEL_KINDS.map((kind): [number, ChannelMessageKind] => [CHANNEL_STATUS[kind], kind])
);

export const REALTIME_STATUS: Record<RealtimeKind, number> = {
  clock: 0xf8,
  start: 0xfa,
  continue: 0xfb,
  stop: 0xfc,
  activeSense: 0xfe,
  reset: 0xff,
};

const REALTIME_KIND_BY_STATUS: ReadonlyMap<number, RealtimeKind> = new Map(
  REALTIME_KINDS.map((kind): [number, RealtimeKind] => [REALTIME_STATUS[kind], kind])
);

export const SYSTEM_COMMON_STATUS: Record<SystemCommonKind, number> = {
  mtcQuarterFrame: MTC_QUARTER_FRAME,
  songPosition: SONG_POSITION,
  songSelect: SONG_SELECT,
  tuneRequest: TUNE_REQUEST,
};

const SYSTEM_COMMON_KIND_BY_STATUS: ReadonlyMap<number, SystemCommonKind> = new Map(
  SYSTEM_COMMON_KINDS.map((kind): [number, SystemCommonKind] => [SYSTEM_COMMON_STATUS[kind], kind])
);

/** Channel kind for a status byte in 0x80–0xEF, or undefined. */
export function channelKindForStatus(status: number): ChannelMessageKind | undefined {
  if (status < 0x80 || status > 0xef) return undefined;
  return CHANNEL_KIND_BY_NIBBLE.get(status >> 4);
}

/** Real-time kind for a status byte; undefined for 0xF9/0xFD and non-real-time bytes. */
export function realtimeKindForStatus(status: number): RealtimeKind | undefined {
  return REALTIME_KIND_BY_STATUS.get(status);
}

/** System-common kind for a status byte; undefined for 0xF4/0xF5 and others. */
export function systemCommonKindForStatus(status: number): SystemCommonKind | undefined {
  return SYSTEM_COMMON_KIND_BY_STATUS.get(status);
}

/** Number of data bytes following a channel status. */
export function channelDataLength(kind: ChannelMessageKind): 1 | 2 {
  return kind === "programChange" || kind === "channelPressure" ? 1 : 2;
}

/** Number of data bytes following a system-common status. */
export function systemCommonDataLength(kind: SystemCommonKind): 0 | 1 | 2 {
  switch (kind) {
    case "tuneRequest":
      return 0;
    case "songPosition":
      return 2;
    default:
      return 1;
  }
}

/** True for 0xF8–0xFF, including the undefined 0xF9 and 0xFD. */
export function isRealtimeByte(byte: number): boolean {
  return byte >= 0xf8;
}

/** True when the high bit is set. */
export function isStatusByte(byte: number): boolean {
  return (byte & 0x80) !== 0;
}
