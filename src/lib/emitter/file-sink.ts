/**
 * File-backed sinks: plain append and gzip
 */

import { open } from "fs/promises";
import type { FileHandle } from "fs/promises";
import { pipeline } from "stream/promises";
import { createGzip, type Gzip } from "zlib";
import { StreamSink } from "./stream-sink.js";
import { FileIOError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const FILE_MODE = 0o644;

async function openFile(path: string, flags: "a" | "w"): Promise<FileHandle> {
  try {
    return await open(path, flags, FILE_MODE);
  } catch (error) {
    throw new FileIOError(
      `Failed to open ${path}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      { path, flags },
      { cause: error },
    );
  }
}

/**
 * Appends every chunk to a file, creating it if needed
 */
export class FileAppendSink extends StreamSink {
  static async open(path: string): Promise<FileAppendSink> {
    const handle = await openFile(path, "a");
    logger.debug("Opened append sink", { path });
    return new FileAppendSink(handle);
  }

  private constructor(handle: FileHandle) {
    super(handle.createWriteStream());
  }
}

/**
 * Gzips every chunk into a file. gzip has no append mode, so the file is
 * truncated on open.
 */
export class GzipFileSink extends StreamSink {
  private readonly done: Promise<void>;

  static async open(path: string): Promise<GzipFileSink> {
    const handle = await openFile(path, "w");
    logger.debug("Opened gzip sink", { path });
    return new GzipFileSink(handle, path);
  }

  private constructor(handle: FileHandle, path: string) {
    const gzip: Gzip = createGzip();
    super(gzip);
    this.done = pipeline(gzip, handle.createWriteStream());
    this.done.catch((error: Error) => {
      logger.error(`Gzip sink failed: ${path}`, error);
    });
  }

  async close(): Promise<void> {
    this.stream.end();
    await this.done;
  }
}
