// backend/services/shared/bootstrap/startHttpService.ts
import type { Express } from "express";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  port: number; // allow 0 in tests for ephemeral port
  serviceName: string;
  logger: Logger;
  /** Runs after the server stops accepting connections, before exit. */
  onShutdown?: () => Promise<void>;
}

export interface StartedService {
  server: Server;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): StartedService {
  const { app, port, serviceName, logger, onShutdown } = opts;

  const server = app.listen(port, () => {
    const addr = server.address();
    const boundPort = isAddressInfo(addr) ? addr.port : port;
    logger.info({ service: serviceName, port: boundPort }, "service listening");
  });

  server.on("error", (err) => {
    logger.error({ err, service: serviceName }, "http server error");
    process.exit(1);
  });

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

  const shutdown = (signal: string) => {
    logger.info({ signal, service: serviceName }, "shutting down service");
    stop()
      .then(() => onShutdown?.())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logger.error({ err, service: serviceName }, "shutdown failed");
        process.exit(1);
      });
  };

  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  return { server, stop };
}

function isAddressInfo(addr: string | AddressInfo | null): addr is AddressInfo {
  return addr !== null && typeof addr === "object";
}
