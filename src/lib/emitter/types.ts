/**
 * Emitter module types
 */

/**
 * Narrow write contract for the places input lines are duplicated to
 */
export interface AppendableSink {
  /** Write one chunk, waiting for the backend to drain if it is full */
  write(chunk: string): Promise<void>;
  /** Flush and release the backend */
  close(): Promise<void>;
}

export interface SinkOptions {
  /** Append every input line to this file */
  appendPath?: string;
  /** Write every input line, gzipped, to this file (truncates) */
  gzipPath?: string;
  /** Echo every input line to this stream */
  echo?: NodeJS.WritableStream;
}
