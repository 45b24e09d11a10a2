/**
 * Fan-out sink and sink construction from options
 */

import type { AppendableSink, SinkOptions } from "./types.js";
import { EchoSink } from "./stream-sink.js";
import { FileAppendSink, GzipFileSink } from "./file-sink.js";
import { logger } from "../../utils/logger.js";

export class TeeSink implements AppendableSink {
  constructor(private readonly sinks: AppendableSink[]) {}

  get size(): number {
    return this.sinks.length;
  }

  async write(chunk: string): Promise<void> {
    await Promise.all(this.sinks.map((sink) => sink.write(chunk)));
  }

  async close(): Promise<void> {
    const results = await Promise.allSettled(
      this.sinks.map((sink) => sink.close()),
    );
    const failure = results.find(
      (result): result is PromiseRejectedResult => result.status === "rejected",
    );
    if (failure) {
      throw failure.reason;
    }
  }
}

/**
 * Build the tee for the configured side channels. An empty tee is returned
 * when none is configured.
 */
export async function openSinks(options: SinkOptions): Promise<TeeSink> {
  const sinks: AppendableSink[] = [];

  if (options.appendPath) {
    if (options.gzipPath) {
      logger.warn("Both append and gzip outputs given; using append", {
        append: options.appendPath,
        gzip: options.gzipPath,
      });
    }
    sinks.push(await FileAppendSink.open(options.appendPath));
  } else if (options.gzipPath) {
    sinks.push(await GzipFileSink.open(options.gzipPath));
  }

  if (options.echo) {
    sinks.push(new EchoSink(options.echo));
  }

  return new TeeSink(sinks);
}
