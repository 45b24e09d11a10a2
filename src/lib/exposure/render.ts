/**
 * Rendering of reservoir snapshots for pull requests and final output
 */

import type {
  ReservoirEntry,
  ReservoirSnapshot,
  SnapshotSource,
} from "../reservoir/types.js";
import type {
  RenderedSample,
  SampleFormat,
  SampleJsonBody,
  SampleRenderer,
} from "./types.js";
import { RenderError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

const FALSE_TOKENS = new Set(["", "f", "false", "0"]);

export const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";
export const JSON_CONTENT_TYPE = "application/json; charset=utf-8";

/**
 * A parameter is false when absent, empty, or a false token
 * (`false`, `f`, `0`, any case); anything else is true.
 */
export function isTruthyParam(value: string | undefined): boolean {
  if (value === undefined) return false;
  return !FALSE_TOKENS.has(value.toLowerCase());
}

/**
 * First string value of a parsed query parameter, if any
 */
export function firstQueryValue(value: unknown): string | undefined {
  if (typeof value === "string") return value;
  if (Array.isArray(value)) {
    const first: unknown = value[0];
    return typeof first === "string" ? first : undefined;
  }
  return undefined;
}

/**
 * `p` (plain) wins over `t` (tabbed); JSON otherwise
 */
export function selectFormat(query: Record<string, unknown>): SampleFormat {
  if (isTruthyParam(firstQueryValue(query.p))) return "plain";
  if (isTruthyParam(firstQueryValue(query.t))) return "tabbed";
  return "json";
}

export function formatTabbed(entries: ReservoirEntry[]): string {
  return entries
    .map((entry) => `${entry.sequenceIndex}\t${entry.content}\n`)
    .join("");
}

export function formatPlain(entries: ReservoirEntry[]): string {
  return entries.map((entry) => `${entry.content}\n`).join("");
}

export function toJsonBody(snapshot: ReservoirSnapshot): SampleJsonBody {
  return {
    lines: snapshot.entries.map((entry) => entry.content),
    lineNumbers: snapshot.entries.map((entry) => entry.sequenceIndex),
    seen: snapshot.seen,
  };
}

export const renderSnapshot: SampleRenderer = (snapshot, format) => {
  switch (format) {
    case "plain":
      return {
        status: 200,
        contentType: TEXT_CONTENT_TYPE,
        body: formatPlain(snapshot.entries),
      };
    case "tabbed":
      return {
        status: 200,
        contentType: TEXT_CONTENT_TYPE,
        body: formatTabbed(snapshot.entries),
      };
    case "json":
      try {
        return {
          status: 200,
          contentType: JSON_CONTENT_TYPE,
          body: JSON.stringify(toJsonBody(snapshot)),
        };
      } catch (error) {
        throw new RenderError(
          `json: ${error instanceof Error ? error.message : String(error)}`,
          { format },
          { cause: error },
        );
      }
  }
};

/**
 * Serve one pull request: exactly one snapshot, rendered in the requested
 * format. Render failures become a 500 and leave the reservoir untouched.
 */
export function respondWithSample(
  source: SnapshotSource,
  query: Record<string, unknown>,
  render: SampleRenderer = renderSnapshot,
): RenderedSample {
  const format = selectFormat(query);
  const snapshot = source.snapshot();

  try {
    return render(snapshot, format);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error("Failed to render sample", { format, error: message });
    return {
      status: 500,
      contentType: TEXT_CONTENT_TYPE,
      body: `render error: ${message}`,
    };
  }
}
