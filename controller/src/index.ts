import { serve } from "@hono/node-server";
import { loadConfig } from "./config";
import { createApp } from "./app";

const config = loadConfig();
const { app, container, injectWebSocket } = createApp(config);
const logger = container.getLogger();

const server = serve(
  {
    fetch: app.fetch,
    port: config.port,
    hostname: config.host,
  },
  (info) => {
    logger.info("EdgePulse controller starting", {
      port: info.port,
      host: config.host,
      corsOrigin: config.corsOrigin,
      logLevel: config.logLevel,
      tickIntervalMs: config.tickIntervalMs,
      seed: container.seed,
    });
    logger.info(`Server running on http://${config.host}:${info.port}`);
    logger.info(`WebSocket endpoint: ws://${config.host}:${info.port}/ws`);
    logger.info(`OpenAPI document: http://${config.host}:${info.port}/openapi.json`);
  }
);

injectWebSocket(server);
container.getClock().start();

// Graceful shutdown handling
const gracefulShutdown = (signal: string) => {
  logger.info(`Received ${signal}, starting graceful shutdown...`);
  container.shutdown();
  server.close((error) => {
    if (error) {
      logger.error("Server close failed", error);
      process.exit(1);
    }
    logger.info("Graceful shutdown completed");
    process.exit(0);
  });
};

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));
