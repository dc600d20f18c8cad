// ─── Message Formatting ─────────────────────────────────────────────────────
//
// One-line, human-readable renderings of decoded messages for monitors,
// the CLI and the console hook.
// ─────────────────────────────────────────────────────────────────────────────

import { formatHex } from "./hex.js";
import { isChannelMessage } from "./midi/types.js";
import type { MidiMessage, MidiMessageKind } from "./midi/types.js";
import { beatsToQuarterNotes } from "./sync/song-position.js";

const LABELS: Record<MidiMessageKind, string> = {
  noteOff: "NoteOff",
  noteOn: "NoteOn",
  polyPressure: "PolyPres",
  controlChange: "CC",
  programChange: "ProgChg",
  channelPressure: "ChanPres",
  pitchBend: "PitchBnd",
  sysex: "SysEx",
  mtcQuarterFrame: "MTC-QF",
  songPosition: "SongPos",
  songSelect: "SongSel",
  tuneRequest: "TuneReq",
  clock: "Clock",
  start: "Start",
  continue: "Continue",
  stop: "Stop",
  activeSense: "ActSense",
  reset: "Reset",
};

/** Channel kinds whose first data byte is a note number. */
const NOTE_KINDS: ReadonlySet<string> = new Set(["noteOn", "noteOff", "polyPressure"]);

const NOTE_NAMES = ["C", "C#", "D", "D#", "E", "F", "F#", "G", "G#", "A", "A#", "B"];

/** Bytes of a SysEx payload shown before "...". */
export const SYSEX_PREVIEW_BYTES = 16;

/** Short label for a message kind, e.g. "NoteOn", "MTC-QF". */
export function messageLabel(kind: MidiMessageKind): string {
  return LABELS[kind];
}

/**
 * Convert MIDI note number to note name.
 * @example midiToNoteName(60) → "C4"
 */
export function midiToNoteName(midi: number): string {
  const octave = Math.floor(midi / 12) - 1;
  return `${NOTE_NAMES[midi % 12]}${octave}`;
}

/**
 * Render a message as a single line:
 * `[   1.500] NoteOn    ch=0 d0=60 d1=100 note=C4`
 */
export function describeMessage(message: MidiMessage): string {
  const head = `[${message.timestamp.toFixed(3).padStart(8)}] ${messageLabel(message.kind).padEnd(9)}`;
  const fields = describeFields(message);
  return fields ? `${head} ${fields}` : head.trimEnd();
}

function describeFields(message: MidiMessage): string {
  if (isChannelMessage(message)) {
    const fields = `ch=${message.channel} d0=${message.data0} d1=${message.data1}`;
    return NOTE_KINDS.has(message.kind) ? `${fields} note=${midiToNoteName(message.data0)}` : fields;
  }
  switch (message.kind) {
    case "sysex": {
      const size = message.payload.length;
      const parts = [`${size} bytes:`];
      if (size > 0) parts.push(formatHex(message.payload, SYSEX_PREVIEW_BYTES));
      if (message.truncated) parts.push("(truncated)");
      return parts.join(" ");
    }
    case "songPosition":
      return `beat=${message.beats} (QN ${beatsToQuarterNotes(message.beats).toFixed(2)})`;
    case "mtcQuarterFrame":
      return `piece=0x${message.value.toString(16).toUpperCase().padStart(2, "0")}`;
    case "songSelect":
      return `song=${message.song}`;
    default:
      return "";
  }
}
