// ─── midiwire ───────────────────────────────────────────────────────────────
//
// MIDI 1.0 wire protocol codec: byte-stream decoding with SysEx reassembly,
// encoding, MIDI Time Code, Song Position Pointer and clock tempo.
//
// Usage:
//   import { StreamDecoder, encodeMessage } from "midiwire";
// ─────────────────────────────────────────────────────────────────────────────

// Message model
export {
  CHANNEL_KINDS,
  SYSTEM_COMMON_KINDS,
  REALTIME_KINDS,
  isChannelKind,
  isSystemCommonKind,
  isRealtimeKind,
  isChannelMessage,
  isSystemCommonMessage,
  isRealtimeMessage,
  isSysExMessage,
} from "./midi/types.js";

export type {
  ChannelMessageKind,
  SystemCommonKind,
  RealtimeKind,
  MidiMessageKind,
  ChannelMessage,
  SysExMessage,
  MtcQuarterFrameMessage,
  SongPositionMessage,
  SongSelectMessage,
  TuneRequestMessage,
  RealtimeMessage,
  SystemCommonMessage,
  MidiMessage,
} from "./midi/types.js";

export {
  SYSEX_START,
  SYSEX_END,
  CHANNEL_STATUS,
  REALTIME_STATUS,
  SYSTEM_COMMON_STATUS,
  channelDataLength,
  isRealtimeByte,
  isStatusByte,
} from "./midi/status.js";

export { MidiMessageSchema, parseMessage, messageToJson } from "./midi/schema.js";
export type { MidiMessageInput } from "./midi/schema.js";

// Codec
export { StreamDecoder, decodeMessages } from "./midi/decoder.js";
export type { ByteInput, DecoderOptions } from "./midi/decoder.js";

export { encodeMessage, safeEncodeMessage, encodeMessages, chunkSysEx } from "./midi/encoder.js";
export type { EncoderOptions, EncodeWarning } from "./midi/encoder.js";

// Sync
export {
  MTC_RATES,
  createMtcState,
  resetMtcState,
  pushQuarterFrame,
  quarterFramesFor,
  framesPerSecond,
  timecodeToSeconds,
  frameRateLabel,
  formatTimecode,
} from "./sync/mtc.js";
export type { MtcRate, MtcState, TimecodeFrame } from "./sync/mtc.js";

export {
  SONG_POSITION_MAX,
  CLOCKS_PER_SPP_BEAT,
  encodeSongPosition,
  decodeSongPosition,
  beatsToQuarterNotes,
  beatsToBars,
  beatsToClocks,
} from "./sync/song-position.js";

export { CLOCKS_PER_QUARTER_NOTE, estimateBpm, clockIntervalForBpm } from "./sync/tempo.js";

export { TransportTracker } from "./sync/transport.js";
export type {
  TransportEventType,
  AnyTransportEvent,
  TransportListener,
  TransportSnapshot,
} from "./sync/transport.js";

// Errors
export { MidiError, errorCodeLabel, isMidiError, errorMessage } from "./errors.js";
export type { MidiErrorCode } from "./errors.js";

// Config
export {
  CodecConfigSchema,
  DEFAULT_MAX_SYSEX_BYTES,
  DEFAULT_MAX_STREAMS,
  validateCodecConfig,
  resolveCodecConfig,
} from "./config/schema.js";
export type { CodecConfig, CodecConfigInput, ConfigError } from "./config/schema.js";
export { CONFIG_ENV_VAR, loadCodecConfig, loadCodecConfigFromEnv } from "./config/loader.js";

// Streams and links
export { MidiInputStream, MidiOutputStream, StreamRegistry } from "./stream.js";
export type { MessageListener, InputStreamOptions, OutputStreamOptions } from "./stream.js";
export { createLoopbackLink } from "./link.js";
export type { LoopbackLink, LoopbackOptions } from "./link.js";
export type { Arrival, ArrivalListener, MidiSource, MidiSink, MessageHook, StreamInfo } from "./types.js";

// Hooks
export {
  createConsoleMessageHook,
  createSilentMessageHook,
  createRecordingMessageHook,
  createCallbackMessageHook,
  composeMessageHooks,
} from "./hooks.js";
export type { ConsoleHookOptions, HookEvent, MessageCallbacks } from "./hooks.js";

// Formatting
export { messageLabel, describeMessage, midiToNoteName } from "./describe.js";
export { parseHexBytes, formatHex } from "./hex.js";
