/**
 * Sinks backed by a Node writable stream
 */

import { once } from "events";
import { finished } from "stream/promises";
import type { Writable } from "stream";
import type { AppendableSink } from "./types.js";

/**
 * Writes to a stream, honouring backpressure. Closing ends the stream.
 */
export class StreamSink implements AppendableSink {
  constructor(protected readonly stream: Writable) {}

  async write(chunk: string): Promise<void> {
    if (!this.stream.write(chunk)) {
      await once(this.stream, "drain");
    }
  }

  async close(): Promise<void> {
    this.stream.end();
    await finished(this.stream);
  }
}

/**
 * Echoes input to a shared stream such as stdout, which is never ended
 */
export class EchoSink implements AppendableSink {
  constructor(private readonly stream: NodeJS.WritableStream) {}

  async write(chunk: string): Promise<void> {
    if (!this.stream.write(chunk)) {
      await once(this.stream, "drain");
    }
  }

  async close(): Promise<void> {}
}
