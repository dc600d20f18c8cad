// ─── midiwire: Errors ────────────────────────────────────────────────────────
//
// Every failure the codec reports is a MidiError carrying one of a small set
// of codes. Errors are local and synchronous: callers drop the offending unit
// (or reset the stream) and carry on.
// ─────────────────────────────────────────────────────────────────────────────

/** Failure categories reported by the codec and the stream registry. */
export type MidiErrorCode =
  | "InvalidArgument"   // required input missing or outside its domain
  | "BufferOverflow"    // SysEx longer than the configured capacity
  | "InvalidMessage"    // encoder given an unknown kind or unrepresentable field
  | "OutOfRange"        // stream registry is full
  | "AlreadyOpen"       // stream name already registered
  | "NotOpen";          // stream name not registered

const CODE_LABELS: Record<MidiErrorCode, string> = {
  InvalidArgument: "MIDI_INVALID_ARG",
  BufferOverflow: "MIDI_BUFFER_OVERFLOW",
  InvalidMessage: "MIDI_INVALID_MESSAGE",
  OutOfRange: "MIDI_OUT_OF_RANGE",
  AlreadyOpen: "MIDI_ALREADY_OPEN",
  NotOpen: "MIDI_NOT_OPEN",
};

export class MidiError extends Error {
  constructor(
    public readonly code: MidiErrorCode,
    message: string
  ) {
    super(message);
    this.name = "MidiError";
  }
}

/** Constant-style name for an error code, e.g. "MIDI_BUFFER_OVERFLOW". */
export function errorCodeLabel(code: MidiErrorCode): string {
  return CODE_LABELS[code];
}

/** Narrow an unknown thrown value to a MidiError, optionally of one code. */
export function isMidiError(err: unknown, code?: MidiErrorCode): err is MidiError {
  if (!(err instanceof MidiError)) return false;
  return code === undefined || err.code === code;
}

/** Message text for any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
