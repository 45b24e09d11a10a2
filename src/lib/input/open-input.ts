import { open } from "fs/promises";
import { FileIOError } from "../../utils/errors.js";

/**
 * Resolve the input path: `-` is stdin, anything else a file opened up front
 * so that a missing file fails at startup rather than mid-stream
 */
export async function openInput(path: string): Promise<NodeJS.ReadableStream> {
  if (path === "-" || path === "stdin") {
    return process.stdin;
  }
  try {
    const handle = await open(path, "r");
    return handle.createReadStream({ encoding: "utf8" });
  } catch (error) {
    throw new FileIOError(
      `Failed to open input ${path}: ${
        error instanceof Error ? error.message : String(error)
      }`,
      { path },
      { cause: error },
    );
  }
}
