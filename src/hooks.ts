// ─── midiwire: Message Hooks ────────────────────────────────────────────────
//
// MessageHook implementations that observe decoded traffic on an input
// stream. The stream calls onMessage for every decoded message and onError
// when decoding fails.
//
// Implementations:
//   - ConsoleMessageHook: logs to console (monitor/CLI)
//   - SilentMessageHook: no-op (testing)
//   - RecordingMessageHook: keeps every call for assertions
//   - CallbackMessageHook: routes to custom callbacks
//   - composeMessageHooks: fans out to several hooks
// ─────────────────────────────────────────────────────────────────────────────

import { describeMessage } from "./describe.js";
import { errorCodeLabel } from "./errors.js";
import type { MidiError } from "./errors.js";
import type { MidiMessage } from "./midi/types.js";
import type { MessageHook, StreamInfo } from "./types.js";

// ─── Console Hook ───────────────────────────────────────────────────────────

export interface ConsoleHookOptions {
  /** Skip Clock and Active Sensing, which arrive many times a second (default: true). */
  suppressClock?: boolean;
  /** Prefix each line with the stream name (default: false). */
  showStream?: boolean;
}

/**
 * Logs each message as one line via console.log, errors via console.error.
 */
export function createConsoleMessageHook(options: ConsoleHookOptions = {}): MessageHook {
  const { suppressClock = true, showStream = false } = options;
  const prefix = (stream: StreamInfo) => (showStream ? `${stream.name} ` : "");

  return {
    onMessage(message, stream) {
      if (suppressClock && (message.kind === "clock" || message.kind === "activeSense")) return;
      console.log(`${prefix(stream)}${describeMessage(message)}`);
    },

    onError(error, stream) {
      console.error(`${prefix(stream)}[${errorCodeLabel(error.code)}] ${error.message}`);
    },
  };
}

// ─── Silent Hook ────────────────────────────────────────────────────────────

/** No-op hook. */
export function createSilentMessageHook(): MessageHook {
  return {
    onMessage() {},
    onError() {},
  };
}

// ─── Recording Hook (testing) ───────────────────────────────────────────────

/** A recorded hook call for assertions. */
export type HookEvent =
  | { type: "message"; stream: string; message: MidiMessage }
  | { type: "error"; stream: string; error: MidiError };

/**
 * Records all hook calls.
 * Use: `const hook = createRecordingMessageHook(); ... hook.events`
 */
export function createRecordingMessageHook(): MessageHook & { events: HookEvent[] } {
  const events: HookEvent[] = [];

  return {
    events,

    onMessage(message, stream) {
      events.push({ type: "message", stream: stream.name, message });
    },

    onError(error, stream) {
      events.push({ type: "error", stream: stream.name, error });
    },
  };
}

// ─── Callback Hook ──────────────────────────────────────────────────────────

/** Callbacks for a custom hook. All optional; unset means no-op. */
export interface MessageCallbacks {
  onMessage?: (message: MidiMessage, stream: StreamInfo) => void;
  onError?: (error: MidiError, stream: StreamInfo) => void;
}

export function createCallbackMessageHook(callbacks: MessageCallbacks): MessageHook {
  return {
    onMessage(message, stream) {
      callbacks.onMessage?.(message, stream);
    },
    onError(error, stream) {
      callbacks.onError?.(error, stream);
    },
  };
}

// ─── Compose ────────────────────────────────────────────────────────────────

/** Call every hook in order. */
export function composeMessageHooks(...hooks: MessageHook[]): MessageHook {
  return {
    onMessage(message, stream) {
      for (const hook of hooks) hook.onMessage(message, stream);
    },
    onError(error, stream) {
      for (const hook of hooks) hook.onError(error, stream);
    },
  };
}
