/**
 * HTTP pull endpoint exposing the live sample
 */

import express, { type Express, type Request, type Response } from "express";
import type { Server } from "http";
import type { AddressInfo } from "net";
import type { SnapshotSource } from "../reservoir/types.js";
import type { ListenAddress, SampleRenderer } from "./types.js";
import { respondWithSample, renderSnapshot } from "./render.js";
import { ConfigError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";

/**
 * Parse `host:port`, `:port` or `[v6]:port`
 */
export function parseListenAddress(address: string): ListenAddress {
  const separator = address.lastIndexOf(":");
  if (separator === -1) {
    throw new ConfigError(
      `Listen address must be host:port or :port, got "${address}"`,
      { address },
    );
  }

  let host = address.slice(0, separator);
  const portText = address.slice(separator + 1);
  if (host.startsWith("[") && host.endsWith("]")) {
    host = host.slice(1, -1);
  }

  const port = Number(portText);
  if (portText === "" || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigError(`Invalid port in listen address "${address}"`, {
      address,
    });
  }

  return host === "" ? { port } : { host, port };
}

export function createExposureApp(
  source: SnapshotSource,
  render: SampleRenderer = renderSnapshot,
): Express {
  const app = express();
  app.disable("x-powered-by");

  app.get("/", (req: Request, res: Response) => {
    const rendered = respondWithSample(source, req.query, render);
    res.status(rendered.status);
    res.set("Content-Type", rendered.contentType);
    res.send(rendered.body);
  });

  return app;
}

/**
 * Start listening; bind failures are configuration errors
 */
export function startExposureServer(
  app: Express,
  address: ListenAddress,
): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server =
      address.host === undefined
        ? app.listen(address.port)
        : app.listen(address.port, address.host);
    const onError = (error: Error) => {
      reject(
        new ConfigError(
          `Cannot listen on ${address.host ?? ""}:${address.port}: ${error.message}`,
          { host: address.host, port: address.port },
          { cause: error },
        ),
      );
    };

    server.once("error", onError);
    server.once("listening", () => {
      server.removeListener("error", onError);
      server.on("error", (error: Error) => {
        logger.error("HTTP server error", error);
      });
      const info = server.address();
      const bound: AddressInfo | undefined =
        info && typeof info === "object" ? info : undefined;
      logger.info("Serving sample over HTTP", {
        host: bound?.address ?? address.host,
        port: bound?.port ?? address.port,
      });
      resolve(server);
    });
  });
}

export function stopExposureServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeAllConnections();
  });
}
