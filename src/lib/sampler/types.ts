/**
 * Sampler module types
 */

import type { RandomSource } from "../../utils/seed-manager.js";
import type {
  SignalEmitter,
  StopReason,
  TerminationCoordinator,
} from "../termination/coordinator.js";

export interface SamplerOptions {
  /** Reservoir capacity */
  lines: number;
  /** Listen address for the HTTP view; omitted disables it */
  http?: string;
  appendPath?: string;
  gzipPath?: string;
  /** Echo every input line to the output as it arrives */
  echo?: boolean;
  seed?: string;
  /** Overrides `seed` */
  random?: RandomSource;
}

export interface SamplerIO {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Where interrupt signals are registered; defaults to `process` */
  signals?: SignalEmitter;
  coordinator?: TerminationCoordinator;
}

export interface SamplerResult {
  reason: StopReason;
  seen: number;
  retained: number;
  durationMs: number;
}
