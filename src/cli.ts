#!/usr/bin/env node
// ─── midiwire: CLI Entry Point ──────────────────────────────────────────────
//
// Usage:
//   midiwire                              # Show help
//   midiwire decode "90 3C 64 F8 80 3C 00" # Decode bytes to messages
//   midiwire encode '{"kind":"noteOn","channel":0,"data0":60,"data1":100}'
//   midiwire mtc "F1 0A F1 10 ..."        # Assemble MTC quarter frames
//   midiwire spp 200                      # Song Position Pointer maths
//   midiwire bpm 0 0.0208333              # Tempo from clock timestamps
//   midiwire monitor                      # Decode hex lines from stdin
// ─────────────────────────────────────────────────────────────────────────────

import { createInterface } from "node:readline";
import {
  assembleTimecode,
  decodeHex,
  encodeJson,
  parseTimecode,
  songPositionFromHex,
  songPositionInfo,
  tempoFromClockTimestamps,
  timecodeMessages,
} from "./commands.js";
import type { CodecConfig } from "./config/schema.js";
import { loadCodecConfigFromEnv } from "./config/loader.js";
import { describeMessage } from "./describe.js";
import { errorCodeLabel, errorMessage, isMidiError } from "./errors.js";
import { formatHex, parseHexBytes } from "./hex.js";
import { createConsoleMessageHook } from "./hooks.js";
import { messageToJson } from "./midi/schema.js";
import { MidiInputStream } from "./stream.js";
import { MTC_RATES, formatTimecode, frameRateLabel } from "./sync/mtc.js";
import type { MtcRate } from "./sync/mtc.js";

// ─── Helpers ────────────────────────────────────────────────────────────────

function hasFlag(args: string[], flag: string): boolean {
  return args.includes(flag);
}

function getFlag(args: string[], flag: string): string | null {
  const idx = args.indexOf(flag);
  if (idx === -1 || idx + 1 >= args.length) return null;
  return args[idx + 1];
}

/** Positional arguments, with flags and their values removed. */
function positionals(args: string[], valueFlags: string[] = []): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (valueFlags.includes(args[i])) {
      i += 1;
      continue;
    }
    if (args[i].startsWith("--")) continue;
    out.push(args[i]);
  }
  return out;
}

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function isMtcRate(value: string): value is MtcRate {
  return MTC_RATES.some((rate) => rate === value);
}

// ─── Commands ───────────────────────────────────────────────────────────────

function cmdDecode(args: string[], config: CodecConfig): void {
  const hex = positionals(args).join(" ");
  if (!hex) fail("Usage: midiwire decode <hex bytes> [--json]");

  const messages = decodeHex(hex, config);
  if (hasFlag(args, "--json")) {
    console.log(JSON.stringify(messages.map(messageToJson), null, 2));
    return;
  }
  if (messages.length === 0) {
    console.log("  (no complete messages)");
    return;
  }
  for (const message of messages) console.log(describeMessage(message));
}

function cmdEncode(args: string[], config: CodecConfig): void {
  const text = positionals(args).join(" ");
  if (!text) fail("Usage: midiwire encode '<json message or array>'");

  let input: unknown;
  try {
    input = JSON.parse(text);
  } catch (err) {
    fail(`Not valid JSON: ${errorMessage(err)}`);
  }
  console.log(formatHex(encodeJson(input, config)));
}

function cmdMtc(args: string[]): void {
  const encode = getFlag(args, "--encode");
  if (encode !== null) {
    const rate = getFlag(args, "--rate") ?? "30fps";
    if (!isMtcRate(rate)) fail(`Unknown rate "${rate}". Valid rates: ${MTC_RATES.join(", ")}`);
    const frame = parseTimecode(encode, rate);
    console.log(formatHex(timecodeMessages(frame)));
    return;
  }

  const hex = positionals(args, ["--rate"]).join(" ");
  if (!hex) fail("Usage: midiwire mtc <quarter-frame hex> | --encode HH:MM:SS:FF [--rate 30fps]");

  const frames = assembleTimecode(hex);
  if (frames.length === 0) {
    console.log("  (fewer than 8 quarter frames)");
    return;
  }
  for (const f of frames) {
    console.log(`  ${f.timecode}  ${f.rateLabel}  (${f.seconds.toFixed(3)} s)`);
  }
}

function cmdSpp(args: string[]): void {
  const numerator = Number(getFlag(args, "--beats-per-bar") ?? "4");
  const decode = getFlag(args, "--decode");
  const info =
    decode !== null
      ? songPositionFromHex(decode, numerator)
      : songPositionInfo(Number(positionals(args, ["--beats-per-bar"])[0]), numerator);

  console.log(`\n  Song position: ${info.beats} beats`);
  console.log(`  Bytes:         F2 ${formatHex(info.bytes)}`);
  console.log(`  Quarter notes: ${info.quarterNotes.toFixed(2)}`);
  console.log(`  Bars (${numerator}/4):    ${info.bars.toFixed(2)}`);
  console.log(`  Clocks:        ${info.clocks}\n`);
}

function cmdBpm(args: string[]): void {
  const timestamps = positionals(args).map(Number);
  if (timestamps.length < 2 || timestamps.some((t) => !Number.isFinite(t))) {
    fail("Usage: midiwire bpm <clock timestamp> <clock timestamp> [...]  (seconds)");
  }
  console.log(`  ${tempoFromClockTimestamps(timestamps).toFixed(2)} BPM`);
}

async function cmdMonitor(args: string[], config: CodecConfig): Promise<void> {
  const stream = new MidiInputStream("stdin", {
    config,
    hook: createConsoleMessageHook({ suppressClock: !hasFlag(args, "--show-clock") }),
  });

  stream.transport.on("*", (event) => {
    switch (event.type) {
      case "beat":
        console.log(`  Beat ${event.beat}  BPM: ${event.bpm.toFixed(2)}`);
        break;
      case "timecode":
        console.log(`  [MTC] ${formatTimecode(event.frame)}  ${frameRateLabel(event.frame.rate)}`);
        break;
      case "songPosition":
        break;
      default:
        console.log(`  [TRANSPORT] ${event.type.toUpperCase()}`);
    }
  });

  const started = performance.now();
  const lines = createInterface({ input: process.stdin, terminal: false });
  console.error("Reading hex lines from stdin... (Ctrl-D to end)");

  for await (const line of lines) {
    if (line.trim() === "") continue;
    let bytes: Uint8Array;
    try {
      bytes = parseHexBytes(line);
    } catch (err) {
      console.error(`  ${errorMessage(err)}`);
      continue;
    }
    try {
      stream.receive({ timestamp: (performance.now() - started) / 1000, bytes });
    } catch (err) {
      if (!isMidiError(err, "BufferOverflow")) throw err;
      // Already logged by the console hook; drop the partial block
      stream.reset();
    }
  }

  stream.flush();
  stream.close();
}

function cmdHelp(): void {
  console.log(`
midiwire: MIDI 1.0 wire protocol tools

Commands:
  decode <hex> [--json]          Decode bytes into messages
  encode '<json>'                Encode a message (or array) into bytes
  mtc <hex>                      Assemble MTC quarter frames into timecode
  mtc --encode HH:MM:SS:FF       Quarter-frame messages for a timecode
      [--rate <rate>]            24fps, 25fps, 29.97fps-drop, 30fps (default)
  spp <beats>                    Song Position Pointer bytes and musical position
  spp --decode "<lsb> <msb>"     Beats from the two data bytes
      [--beats-per-bar <n>]      Time signature numerator (default 4)
  bpm <t1> <t2> [...]            Tempo from Clock timestamps (seconds)
  monitor [--show-clock]         Decode hex lines from stdin as they arrive
  help                           Show this help

Configuration:
  Set MIDIWIRE_CONFIG to a JSON file: { "maxSysexBytes": 4096, "maxStreams": 64 }

Examples:
  midiwire decode "F0 7E 7F 06 01 F7 90 3C 64"
  midiwire encode '[{"kind":"start"},{"kind":"songPosition","beats":200}]'
  midiwire mtc "0A 10 2D 32 47 51 61 76"
  midiwire spp --decode "48 01"
`);
}

// ─── CLI Router ─────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const command = args[0] ?? "help";
  const rest = args.slice(1);

  switch (command) {
    case "decode":
      cmdDecode(rest, loadCodecConfigFromEnv());
      break;
    case "encode":
      cmdEncode(rest, loadCodecConfigFromEnv());
      break;
    case "mtc":
      cmdMtc(rest);
      break;
    case "spp":
      cmdSpp(rest);
      break;
    case "bpm":
      cmdBpm(rest);
      break;
    case "monitor":
      await cmdMonitor(rest, loadCodecConfigFromEnv());
      break;
    case "help":
    case "--help":
    case "-h":
      cmdHelp();
      break;
    default:
      fail(`Unknown command: "${command}". Run 'midiwire help' for usage.`);
  }
}

main().catch((err) => {
  if (isMidiError(err)) {
    console.error(`[${errorCodeLabel(err.code)}] ${err.message}`);
  } else {
    console.error(errorMessage(err));
  }
  process.exit(1);
});
