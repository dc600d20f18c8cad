// ─── Transport Tracker ──────────────────────────────────────────────────────
//
// Follows an incoming sync stream (Start/Continue/Stop, Clock, Song Position,
// MTC) and keeps the receiver's view of the transport. External systems
// subscribe to transport events instead of re-deriving them from messages.
// ─────────────────────────────────────────────────────────────────────────────

import type { MidiMessage } from "../midi/types.js";
import { createMtcState, pushQuarterFrame, resetMtcState } from "./mtc.js";
import type { MtcState, TimecodeFrame } from "./mtc.js";
import { CLOCKS_PER_QUARTER_NOTE, estimateBpm } from "./tempo.js";

// ─── Event Types ────────────────────────────────────────────────────────────

export type TransportEventType =
  | "start"
  | "continue"
  | "stop"
  | "beat"
  | "songPosition"
  | "timecode"
  | "reset";

export interface TransportEvent {
  type: TransportEventType;
  /** Timestamp of the message that caused the event. */
  timestamp: number;
  /** Quarter notes counted since the last Start. */
  beat: number;
  bpm: number;
}

export interface TransportStateEvent extends TransportEvent {
  type: "start" | "continue" | "stop" | "reset" | "beat";
}

export interface SongPositionEvent extends TransportEvent {
  type: "songPosition";
  /** MIDI beats (sixteenth notes). */
  songPosition: number;
}

export interface TimecodeEvent extends TransportEvent {
  type: "timecode";
  frame: TimecodeFrame;
}

export type AnyTransportEvent = TransportStateEvent | SongPositionEvent | TimecodeEvent;

export type TransportListener = (event: AnyTransportEvent) => void;

/** Read-only view of the tracker. */
export interface TransportSnapshot {
  running: boolean;
  /** Clocks since the last beat (0–23). */
  clockCount: number;
  beat: number;
  bpm: number;
  songPosition: number;
  lastClockTimestamp: number | null;
  /** Last fully assembled timecode, if any. */
  timecode: TimecodeFrame | null;
}

// ─── Tracker ────────────────────────────────────────────────────────────────

/**
 * Transport state for one input stream.
 *
 * Start zeroes the counters and runs; Continue resumes without touching
 * them. Clocks only count while running. Reset clears everything,
 * including partially received MTC.
 */
export class TransportTracker {
  private running = false;
  private clockCount = 0;
  private beat = 0;
  private bpm = 0;
  private songPosition = 0;
  private lastClockTimestamp: number | null = null;
  private timecode: TimecodeFrame | null = null;
  private readonly mtc: MtcState = createMtcState();

  private listeners = new Map<TransportEventType | "*", Set<TransportListener>>();

  /** Feed one decoded message. Messages unrelated to sync are ignored. */
  handle(message: MidiMessage): void {
    const { timestamp } = message;

    switch (message.kind) {
      case "start":
        this.running = true;
        this.clockCount = 0;
        this.beat = 0;
        this.songPosition = 0;
        this.emitState("start", timestamp);
        break;

      case "continue":
        this.running = true;
        this.emitState("continue", timestamp);
        break;

      case "stop":
        this.running = false;
        this.emitState("stop", timestamp);
        break;

      case "clock":
        if (!this.running) break;
        this.bpm = estimateBpm(this.bpm, this.lastClockTimestamp, timestamp);
        this.lastClockTimestamp = timestamp;
        this.clockCount += 1;
        if (this.clockCount >= CLOCKS_PER_QUARTER_NOTE) {
          this.clockCount = 0;
          this.beat += 1;
          this.emitState("beat", timestamp);
        }
        break;

      case "songPosition":
        this.songPosition = message.beats;
        this.emit({
          type: "songPosition",
          timestamp,
          beat: this.beat,
          bpm: this.bpm,
          songPosition: message.beats,
        });
        break;

      case "mtcQuarterFrame": {
        const frame = pushQuarterFrame(this.mtc, message.value);
        if (frame) {
          this.timecode = frame;
          this.emit({ type: "timecode", timestamp, beat: this.beat, bpm: this.bpm, frame });
        }
        break;
      }

      case "reset":
        this.clear();
        this.emitState("reset", timestamp);
        break;

      default:
        break;
    }
  }

  /** Feed several messages in order. */
  handleAll(messages: Iterable<MidiMessage>): void {
    for (const message of messages) this.handle(message);
  }

  /**
   * Discard partially received quarter frames and the last timecode,
   * leaving clock and transport state alone.
   */
  resetTimecode(): void {
    resetMtcState(this.mtc);
    this.timecode = null;
  }

  snapshot(): TransportSnapshot {
    return {
      running: this.running,
      clockCount: this.clockCount,
      beat: this.beat,
      bpm: this.bpm,
      songPosition: this.songPosition,
      lastClockTimestamp: this.lastClockTimestamp,
      timecode: this.timecode,
    };
  }

  // ─── Event System ───────────────────────────────────────────────────────

  /**
   * Subscribe to transport events. Use "*" for all events.
   * Returns an unsubscribe function.
   */
  on(type: TransportEventType | "*", listener: TransportListener): () => void {
    let set = this.listeners.get(type);
    if (!set) {
      set = new Set();
      this.listeners.set(type, set);
    }
    set.add(listener);
    return () => {
      this.listeners.get(type)?.delete(listener);
    };
  }

  off(type: TransportEventType | "*", listener: TransportListener): void {
    this.listeners.get(type)?.delete(listener);
  }

  removeAllListeners(): void {
    this.listeners.clear();
  }

  private clear(): void {
    this.running = false;
    this.clockCount = 0;
    this.beat = 0;
    this.bpm = 0;
    this.songPosition = 0;
    this.lastClockTimestamp = null;
    this.resetTimecode();
  }

  private emitState(type: TransportStateEvent["type"], timestamp: number): void {
    this.emit({ type, timestamp, beat: this.beat, bpm: this.bpm });
  }

  private emit(event: AnyTransportEvent): void {
    for (const key of [event.type, "*"] as const) {
      const set = this.listeners.get(key);
      if (!set) continue;
      for (const fn of set) {
        try {
          fn(event);
        } catch (err) {
          console.error(`[transport] ${event.type} listener failed:`, err);
        }
      }
    }
  }
}
