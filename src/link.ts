// ─── Loopback Link ──────────────────────────────────────────────────────────
//
// An in-process link whose sink feeds its own source. Used to pipe an
// output stream into an input stream without a device.
// ─────────────────────────────────────────────────────────────────────────────

import type { Arrival, ArrivalListener, MidiSink, MidiSource } from "./types.js";

export interface LoopbackOptions {
  /** Split writes longer than this, as a constrained link would. */
  maxWriteBytes?: number;
  /** Timestamp source for arrivals. Default: seconds since the link was created. */
  clock?: () => number;
}

export interface LoopbackLink {
  source: MidiSource;
  sink: MidiSink;
  /** Every write seen by the sink, in order. */
  writes: Uint8Array[];
}

export function createLoopbackLink(options: LoopbackOptions = {}): LoopbackLink {
  const created = performance.now();
  const clock = options.clock ?? (() => (performance.now() - created) / 1000);
  const listeners = new Set<ArrivalListener>();
  const writes: Uint8Array[] = [];

  const source: MidiSource = {
    onArrival(listener) {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
  };

  const sink: MidiSink = {
    maxWriteBytes: options.maxWriteBytes,
    send(bytes) {
      const copy = Uint8Array.from(bytes);
      writes.push(copy);
      const arrival: Arrival = { timestamp: clock(), bytes: copy };
      for (const listener of listeners) listener(arrival);
    },
  };

  return { source, sink, writes };
}
