/**
 * Exposure layer types
 */

import type { ReservoirSnapshot } from "../reservoir/types.js";

export type SampleFormat = "json" | "tabbed" | "plain";

/** JSON wire shape; `lines` and `lineNumbers` are parallel arrays */
export interface SampleJsonBody {
  lines: string[];
  lineNumbers: number[];
  seen: number;
}

export interface RenderedSample {
  status: number;
  contentType: string;
  body: string;
}

export type SampleRenderer = (
  snapshot: ReservoirSnapshot,
  format: SampleFormat,
) => RenderedSample;

export interface ListenAddress {
  /** Undefined listens on every interface */
  host?: string;
  port: number;
}
