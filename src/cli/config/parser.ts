/**
 * Configuration file parser - supports JSON and YAML
 */

import { readFileSync } from "fs";
import { parse as parseYaml } from "yaml";
import type {
  LineSampleConfigFile,
  ResolvedSampleConfig,
  SampleCommandOptions,
} from "./types.js";
import { DEFAULT_CAPACITY } from "../../lib/reservoir/reservoir.js";
import { ConfigError } from "../../utils/errors.js";
import { isLogLevel, logger, type LogLevel } from "../../utils/logger.js";

const STRING_KEYS = ["http", "append", "gzip", "seed", "input"] as const;

/**
 * Parse configuration file (JSON or YAML)
 */
export function parseConfigFile(filePath: string): LineSampleConfigFile {
  logger.info("Parsing configuration file", { filePath });

  let content: string;
  try {
    content = readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new ConfigError(`Failed to read config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  // Determine format from file extension
  const isYaml = filePath.endsWith(".yaml") || filePath.endsWith(".yml");
  const isJson = filePath.endsWith(".json");

  if (!isYaml && !isJson) {
    throw new ConfigError(
      `Unsupported config file format: ${filePath}. Must be .json, .yaml, or .yml`,
    );
  }

  let raw: unknown;
  try {
    raw = isYaml ? parseYaml(content) : JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse config file: ${filePath}`, undefined, {
      cause: error,
    });
  }

  const config = validateConfigFile(raw, filePath);
  logger.debug("Configuration file parsed successfully", {
    keys: Object.keys(config),
  });
  return config;
}

/**
 * Check the parsed document has the expected shape; unknown keys are ignored
 */
export function validateConfigFile(
  raw: unknown,
  source = "config",
): LineSampleConfigFile {
  if (raw === null || raw === undefined) return {};
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new ConfigError(`${source}: expected a mapping at the top level`);
  }

  const doc = new Map<string, unknown>(Object.entries(raw));
  const config: LineSampleConfigFile = {};

  const lines = doc.get("lines");
  if (lines !== undefined) {
    if (typeof lines !== "number") {
      throw new ConfigError(`${source}: "lines" must be a number`, { lines });
    }
    config.lines = lines;
  }

  for (const key of STRING_KEYS) {
    const value = doc.get(key);
    if (value === undefined) continue;
    if (typeof value !== "string") {
      throw new ConfigError(`${source}: "${key}" must be a string`, {
        [key]: value,
      });
    }
    config[key] = value;
  }

  const echo = doc.get("echo");
  if (echo !== undefined) {
    if (typeof echo !== "boolean") {
      throw new ConfigError(`${source}: "echo" must be a boolean`, { echo });
    }
    config.echo = echo;
  }

  const logLevel = doc.get("logLevel");
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigError(
        `${source}: "logLevel" must be one of error, warn, info, debug`,
        { logLevel },
      );
    }
    config.logLevel = logLevel;
  }

  return config;
}

/**
 * Merge CLI options with config file: CLI > config file > defaults
 */
export function mergeSampleConfig(
  options: SampleCommandOptions,
  configFile: LineSampleConfigFile = {},
): ResolvedSampleConfig {
  const lines = options.lines ?? configFile.lines ?? DEFAULT_CAPACITY;
  if (!Number.isSafeInteger(lines) || lines < 1) {
    throw new ConfigError(
      `Number of lines to keep must be a positive integer, got ${lines}`,
      { lines },
    );
  }

  let logLevel: LogLevel = configFile.logLevel ?? "info";
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      throw new ConfigError(
        `Log level must be one of error, warn, info, debug, got ${options.logLevel}`,
      );
    }
    logLevel = options.logLevel;
  }

  return {
    lines,
    http: options.http ?? configFile.http,
    appendPath: options.append ?? configFile.append,
    gzipPath: options.gzip ?? configFile.gzip,
    echo: options.echo ?? configFile.echo ?? false,
    seed: options.seed ?? configFile.seed,
    input: options.input ?? configFile.input ?? "-",
    logLevel,
  };
}
