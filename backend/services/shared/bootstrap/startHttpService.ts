// backend/services/shared/bootstrap/startHttpService.ts
import type { Express } from "express";
import type { Server } from "node:http";
import type { Logger } from "pino";

export interface StartHttpServiceOptions {
  app: Express;
  port: number; // allow 0 in tests for ephemeral port
  serviceName: string;
  logger: Logger;
  /** Release resources (DB handles etc.) after the server stops accepting. */
  onShutdown?: () => Promise<void> | void;
}

export interface StartedService {
  server: Server;
  boundPort: () => number;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): StartedService {
  const { app, port, serviceName, logger, onShutdown } = opts;

  const boundPort = (): number => {
    const addr = server.address();
    return addr && typeof addr === "object" ? addr.port : port;
  };

  const server = app.listen(port, () => {
    logger.info({ service: serviceName, port: boundPort() }, "service listening");
  });

  server.on("error", (err) => {
    logger.error({ err, service: serviceName }, "http server error");
    process.exit(1);
  });

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    }).then(() => onShutdown?.());

  const shutdown = (signal: string) => {
    logger.info({ signal, service: serviceName }, "shutting down service");
    stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error({ err, service: serviceName }, "shutdown failed");
        process.exit(1);
      }
    );
  };

  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));

  return { server, boundPort, stop };
}
