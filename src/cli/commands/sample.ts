import { Command, InvalidArgumentError } from "commander";
import { runSampler } from "../../lib/sampler/run.js";
import { openInput } from "../../lib/input/open-input.js";
import { logger } from "../../utils/logger.js";
import { toLineSampleError } from "../../utils/errors.js";
import { parseConfigFile, mergeSampleConfig } from "../config/parser.js";
import type {
  LineSampleConfigFile,
  SampleCommandOptions,
} from "../config/types.js";

function parseLineCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/**
 * Create the sampling command
 * @returns Commander Command
 */
export function createSampleCommand(): Command {
  return new Command("linesample")
    .description(
      "Keep a uniform random sample of lines from stdin; print it when input ends or on interrupt",
    )
    .option(
      "-l, --lines <number>",
      "Keep this many lines, uniformly sampled across all input (default: 100)",
      parseLineCount,
    )
    .option("--http <address>", "host:port (or :port) to serve the live sample on")
    .option("-a, --append <path>", "Also append all input to file")
    .option("--gzip <path>", "Also write all input to file (gzipped)")
    .option("--echo", "Also write all lines to stdout as they arrive")
    .option("--seed <seed>", "Seed for reproducible sampling")
    .option("--input <path>", 'Read from file instead of stdin ("-" for stdin)')
    .option("--config <path>", "Path to configuration file (JSON/YAML)")
    .option(
      "--log-level <level>",
      "Logging verbosity: error, warn, info, debug",
    )
    .action(async (opts: SampleCommandOptions) => {
      try {
        let configFile: LineSampleConfigFile | undefined;
        if (opts.config) {
          configFile = parseConfigFile(opts.config);
        }

        const config = mergeSampleConfig(opts, configFile);
        logger.setLevel(config.logLevel);

        const input = await openInput(config.input);
        const result = await runSampler(
          {
            lines: config.lines,
            http: config.http,
            appendPath: config.appendPath,
            gzipPath: config.gzipPath,
            echo: config.echo,
            seed: config.seed,
          },
          { input, output: process.stdout },
        );

        logger.info("Sample written", { ...result });
        process.exit(0);
      } catch (error) {
        const failure = toLineSampleError(error);
        logger.error("Sampling failed", failure);
        console.error(JSON.stringify(failure.toResponse("sample"), null, 2));
        process.exit(1);
      }
    });
}
