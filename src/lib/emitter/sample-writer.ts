/**
 * Final emission of the sample to the primary output
 */

import type { ReservoirSnapshot } from "../reservoir/types.js";
import { formatTabbed } from "../exposure/render.js";

/**
 * Write `<sequenceIndex>\t<content>` lines, resolving once the output has
 * accepted them
 */
export function emitSample(
  snapshot: ReservoirSnapshot,
  output: NodeJS.WritableStream,
): Promise<void> {
  const text = formatTabbed(snapshot.entries);
  if (text === "") return Promise.resolve();

  return new Promise((resolve, reject) => {
    output.write(text, (error?: Error | null) =>
      error ? reject(error) : resolve(),
    );
  });
}
