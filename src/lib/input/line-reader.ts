/**
 * Producer task: reads input lines, tees them and feeds the reservoir
 */

import * as readline from "readline";
import type { AppendableSink } from "../emitter/types.js";
import type { TerminationCoordinator } from "../termination/coordinator.js";
import { ErrorCode } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Whatever accepts records; the reservoir in practice
 */
export interface RecordConsumer {
  admit(content: string): unknown;
}

export interface ConsumeLinesOptions {
  input: NodeJS.ReadableStream;
  reservoir: RecordConsumer;
  coordinator: TerminationCoordinator;
  /** Side channels every consumed line is written to before admission */
  sink?: AppendableSink;
}

/**
 * Consume `input` until it ends or the coordinator stops.
 *
 * End of input and read faults both count as exhaustion; only the log line
 * tells them apart. A stop observed between records ends the loop without
 * draining what is left of the input. A failed sink write drops the sink
 * for the rest of the run; sampling continues.
 *
 * @returns number of lines admitted
 */
export async function consumeLines(
  options: ConsumeLinesOptions,
): Promise<number> {
  const { input, reservoir, coordinator } = options;
  let sink = options.sink;

  const rl = readline.createInterface({
    input,
    crlfDelay: Infinity, // Handle all line endings
  });
  const onAbort = () => rl.close();
  coordinator.signal.addEventListener("abort", onAbort, { once: true });

  let admitted = 0;
  try {
    for await (const line of rl) {
      if (coordinator.stopped) break;

      if (sink) {
        try {
          await sink.write(line + "\n");
        } catch (error) {
          // keep sampling without the tee
          logger.warn("Sink write failed; no longer copying input", {
            code: ErrorCode.FILE_IO_ERROR,
            error: error instanceof Error ? error.message : String(error),
            admitted,
          });
          sink = undefined;
        }
        if (coordinator.stopped) break;
      }

      reservoir.admit(line);
      admitted++;
    }

    if (coordinator.stopped) {
      logger.info("Stop observed, no longer reading input", { admitted });
    } else {
      logger.info("Input exhausted", { admitted });
    }
  } catch (error) {
    logger.warn("Input read failed; treating as end of input", {
      code: ErrorCode.INPUT_READ_ERROR,
      error: error instanceof Error ? error.message : String(error),
      admitted,
    });
  } finally {
    coordinator.signal.removeEventListener("abort", onAbort);
    rl.close();
    coordinator.stop("exhausted");
  }

  return admitted;
}
