// ─── midiwire: Streams ──────────────────────────────────────────────────────
//
// An input stream owns the per-stream decoding state (decoder, MTC
// accumulator via its transport tracker) for one logical input. An output
// stream encodes messages and writes them to a link sink. The registry
// keeps named inputs and enforces the stream limit.
// ─────────────────────────────────────────────────────────────────────────────

import { resolveCodecConfig } from "./config/schema.js";
import type { CodecConfig, CodecConfigInput } from "./config/schema.js";
import { MidiError, isMidiError } from "./errors.js";
import { StreamDecoder } from "./midi/decoder.js";
import { chunkSysEx, encodeMessage } from "./midi/encoder.js";
import type { MidiMessage, SysExMessage } from "./midi/types.js";
import { TransportTracker } from "./sync/transport.js";
import { createSilentMessageHook } from "./hooks.js";
import type { Arrival, MessageHook, MidiSink, MidiSource, StreamInfo } from "./types.js";

export type MessageListener = (message: MidiMessage) => void;

export interface InputStreamOptions {
  config?: CodecConfigInput;
  /** Observer for decoded messages and errors (default: silent). */
  hook?: MessageHook;
}

// ─── Input ──────────────────────────────────────────────────────────────────

export class MidiInputStream {
  readonly info: StreamInfo;
  /** Transport view derived from this stream's sync messages. */
  readonly transport = new TransportTracker();

  private readonly decoder: StreamDecoder;
  private readonly hook: MessageHook;
  private readonly listeners = new Set<MessageListener>();
  private readonly detachers = new Set<() => void>();
  private closed = false;

  constructor(readonly name: string, options: InputStreamOptions = {}) {
    const config = resolveCodecConfig(options.config);
    this.info = { name };
    this.decoder = new StreamDecoder({ maxSysexBytes: config.maxSysexBytes });
    this.hook = options.hook ?? createSilentMessageHook();
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  /** True while a SysEx block is waiting for more arrivals. */
  get inSysEx(): boolean {
    return this.decoder.inSysEx;
  }

  /**
   * Decode one arrival and dispatch every message to the hook, the
   * transport tracker and listeners. Returns the decoded messages.
   *
   * A decode error is passed to the hook's onError and rethrown; messages
   * decoded before it have already been dispatched. Call reset() to
   * recover from BufferOverflow.
   */
  receive(arrival: Arrival): MidiMessage[] {
    if (this.closed) {
      throw new MidiError("NotOpen", `Input stream "${this.name}" is closed`);
    }
    const messages: MidiMessage[] = [];
    try {
      for (const message of this.decoder.decode(arrival.bytes, arrival.timestamp)) {
        messages.push(message);
        this.dispatch(message);
      }
    } catch (err) {
      if (isMidiError(err)) this.hook.onError(err, this.info);
      throw err;
    }
    return messages;
  }

  /** Emit a pending SysEx block as truncated, if one is open. */
  flush(timestamp?: number): SysExMessage | null {
    const pending = this.decoder.flush(timestamp);
    if (pending) this.dispatch(pending);
    return pending;
  }

  /**
   * Drop partial SysEx state, including an overflowed block. Timecode
   * assembly is separate: see `transport.resetTimecode()`.
   */
  reset(): void {
    this.decoder.reset();
  }

  /** Subscribe to decoded messages. Returns an unsubscribe function. */
  on(listener: MessageListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Feed every arrival from `source` into this stream.
   * Returns a function that detaches the source.
   */
  attach(source: MidiSource): () => void {
    const unsubscribe = source.onArrival((arrival) => {
      this.receive(arrival);
    });
    const detach = () => {
      unsubscribe();
      this.detachers.delete(detach);
    };
    this.detachers.add(detach);
    return detach;
  }

  /** Detach all sources and drop state. Further arrivals throw NotOpen. */
  close(): void {
    for (const detach of [...this.detachers]) detach();
    this.listeners.clear();
    this.transport.removeAllListeners();
    this.decoder.reset();
    this.closed = true;
  }

  private dispatch(message: MidiMessage): void {
    this.hook.onMessage(message, this.info);
    this.transport.handle(message);
    for (const listener of this.listeners) {
      try {
        listener(message);
      } catch (err) {
        console.error(`[${this.name}] message listener failed:`, err);
      }
    }
  }
}

// ─── Output ─────────────────────────────────────────────────────────────────

export interface OutputStreamOptions {
  config?: CodecConfigInput;
}

export class MidiOutputStream {
  private readonly config: CodecConfig;

  constructor(
    readonly name: string,
    private readonly sink: MidiSink,
    options: OutputStreamOptions = {}
  ) {
    this.config = resolveCodecConfig(options.config);
  }

  /**
   * Encode and write one message. SysEx longer than the sink's
   * maxWriteBytes is written in several chunks, in order.
   * Resolves to the number of bytes written.
   */
  async send(message: MidiMessage): Promise<number> {
    const bytes = encodeMessage(message, { maxSysexBytes: this.config.maxSysexBytes });
    const limit = this.sink.maxWriteBytes;
    const chunks = message.kind === "sysex" && limit !== undefined ? chunkSysEx(bytes, limit) : [bytes];
    for (const chunk of chunks) {
      await this.sink.send(chunk);
    }
    return bytes.length;
  }

  /** Send messages one after another. Resolves to the total bytes written. */
  async sendAll(messages: Iterable<MidiMessage>): Promise<number> {
    let total = 0;
    for (const message of messages) {
      total += await this.send(message);
    }
    return total;
  }
}

// ─── Registry ───────────────────────────────────────────────────────────────

/**
 * Named input streams, at most `maxStreams` open at once.
 */
export class StreamRegistry {
  readonly config: CodecConfig;
  private readonly streams = new Map<string, MidiInputStream>();

  constructor(config: CodecConfigInput = {}) {
    this.config = resolveCodecConfig(config);
  }

  get size(): number {
    return this.streams.size;
  }

  /**
   * Open a new input stream.
   * Throws AlreadyOpen for a name in use and OutOfRange past maxStreams.
   */
  open(name: string, hook?: MessageHook): MidiInputStream {
    if (!name) {
      throw new MidiError("InvalidArgument", "Stream name must not be empty");
    }
    if (this.streams.has(name)) {
      throw new MidiError("AlreadyOpen", `Stream "${name}" is already open`);
    }
    if (this.streams.size >= this.config.maxStreams) {
      throw new MidiError("OutOfRange", `Cannot open more than ${this.config.maxStreams} streams`);
    }
    const stream = new MidiInputStream(name, { config: this.config, hook });
    this.streams.set(name, stream);
    return stream;
  }

  get(name: string): MidiInputStream | undefined {
    return this.streams.get(name);
  }

  names(): string[] {
    return [...this.streams.keys()];
  }

  /** Close a stream. Throws NotOpen for an unknown name. */
  close(name: string): void {
    const stream = this.streams.get(name);
    if (!stream) {
      throw new MidiError("NotOpen", `Stream "${name}" is not open`);
    }
    stream.close();
    this.streams.delete(name);
  }

  closeAll(): void {
    for (const stream of this.streams.values()) stream.close();
    this.streams.clear();
  }
}
