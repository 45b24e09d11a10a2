#!/usr/bin/env node

/**
 * linesample CLI - uniform reservoir sampling of line streams
 */

import { createSampleCommand } from "./commands/sample.js";
import { logger } from "../utils/logger.js";

const pkg = {
  name: "linesample",
  version: "0.1.0",
};

/**
 * CLI entry point
 */
async function main(): Promise<void> {
  const program = createSampleCommand().name(pkg.name).version(pkg.version);
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unexpected error", { error: message });
  console.error(
    JSON.stringify(
      {
        status: "error",
        error: {
          code: "UNEXPECTED_ERROR",
          message,
        },
      },
      null,
      2,
    ),
  );
  process.exit(1);
});
