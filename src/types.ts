// ─── midiwire: Core Types ───────────────────────────────────────────────────
//
// Contracts between the codec and the outside world: the link layer that
// moves bytes, and the hooks that observe decoded traffic.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiError } from "./errors.js";
import type { MidiMessage } from "./midi/types.js";

// ─── Link Layer ─────────────────────────────────────────────────────────────

/** One delivery from a link layer: the bytes plus the time they arrived. */
export interface Arrival {
  /** Arrival time, seconds by convention. */
  timestamp: number;
  bytes: Uint8Array | number[];
}

export type ArrivalListener = (arrival: Arrival) => void;

/**
 * Byte source (a port, socket, pipe). Arrivals are delivered in order;
 * a single message may be split across arrivals.
 */
export interface MidiSource {
  /** Subscribe to arrivals. Returns an unsubscribe function. */
  onArrival(listener: ArrivalListener): () => void;
}

/** Byte sink (an output port or pipe). */
export interface MidiSink {
  /**
   * Largest write the link accepts in one call. Longer buffers are split
   * by the output stream. Unset means unlimited.
   */
  readonly maxWriteBytes?: number;

  send(bytes: Uint8Array): void | Promise<void>;
}

// ─── Hooks ──────────────────────────────────────────────────────────────────

/** Identifies the stream a hook call came from. */
export interface StreamInfo {
  name: string;
}

/**
 * Message hook: inject into an input stream to observe decoded traffic.
 * Implementations can log, record, forward or drop.
 */
export interface MessageHook {
  /** Called once per decoded message, in wire order. */
  onMessage(message: MidiMessage, stream: StreamInfo): void;

  /** Called when decoding fails; the error is rethrown afterwards. */
  onError(error: MidiError, stream: StreamInfo): void;
}
