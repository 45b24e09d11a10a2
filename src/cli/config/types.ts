/**
 * CLI configuration types
 */

import type { LogLevel } from "../../utils/logger.js";

/**
 * Configuration file structure (JSON or YAML); every key is optional
 */
export interface LineSampleConfigFile {
  lines?: number;
  http?: string;
  append?: string;
  gzip?: string;
  echo?: boolean;
  seed?: string;
  input?: string;
  logLevel?: LogLevel;
}

/**
 * CLI command options (from commander)
 */
export interface SampleCommandOptions {
  lines?: number;
  http?: string;
  append?: string;
  gzip?: string;
  echo?: boolean;
  seed?: string;
  input?: string;
  config?: string;
  logLevel?: string;
}

/**
 * Configuration after CLI, config file and defaults are merged
 */
export interface ResolvedSampleConfig {
  lines: number;
  http?: string;
  appendPath?: string;
  gzipPath?: string;
  echo: boolean;
  seed?: string;
  /** `-` for stdin */
  input: string;
  logLevel: LogLevel;
}
