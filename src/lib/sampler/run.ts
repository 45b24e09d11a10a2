/**
 * Main flow: wire producer, HTTP view and termination, then emit the sample
 */

import type { Server } from "http";
import { createReservoir } from "../reservoir/reservoir.js";
import {
  TerminationCoordinator,
  registerInterruptHandlers,
} from "../termination/coordinator.js";
import { consumeLines } from "../input/line-reader.js";
import { openSinks } from "../emitter/tee-sink.js";
import { emitSample } from "../emitter/sample-writer.js";
import {
  createExposureApp,
  parseListenAddress,
  startExposureServer,
  stopExposureServer,
} from "../exposure/server.js";
import { createRandomSource } from "../../utils/seed-manager.js";
import { logger } from "../../utils/logger.js";
import type { SamplerIO, SamplerOptions, SamplerResult } from "./types.js";

export async function runSampler(
  options: SamplerOptions,
  io: SamplerIO,
): Promise<SamplerResult> {
  const startTime = Date.now();
  const reservoir = createReservoir({
    capacity: options.lines,
    random: options.random ?? createRandomSource(options.seed),
  });

  const listenAddress =
    options.http !== undefined ? parseListenAddress(options.http) : undefined;

  const sink = await openSinks({
    appendPath: options.appendPath,
    gzipPath: options.gzipPath,
    echo: options.echo ? io.output : undefined,
  });

  let server: Server | undefined;
  if (listenAddress) {
    try {
      server = await startExposureServer(
        createExposureApp(reservoir),
        listenAddress,
      );
    } catch (error) {
      await sink.close();
      throw error;
    }
  }

  const coordinator = io.coordinator ?? new TerminationCoordinator();
  const unregister = registerInterruptHandlers(
    coordinator,
    ["SIGINT", "SIGTERM"],
    io.signals ?? process,
  );

  logger.debug("Sampling started", {
    capacity: reservoir.capacity,
    http: options.http,
    sinks: sink.size,
  });

  const producer = consumeLines({
    input: io.input,
    reservoir,
    coordinator,
    sink: sink.size > 0 ? sink : undefined,
  });

  const reason = await coordinator.wait();
  const snapshot = reservoir.snapshot();

  try {
    await emitSample(snapshot, io.output);
  } finally {
    unregister();
    if (server) {
      await stopExposureServer(server);
    }
    await producer;
    await sink.close();
  }

  return {
    reason,
    seen: snapshot.seen,
    retained: snapshot.entries.length,
    durationMs: Date.now() - startTime,
  };
}
