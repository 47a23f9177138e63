import { randomInt, randomUUID } from "crypto";
import { OpenAPIHono } from "@hono/zod-openapi";
import { createNodeWebSocket } from "@hono/node-ws";
import { cors } from "hono/cors";
import { HTTPException } from "hono/http-exception";
import { logger as honoLogger } from "hono/logger";
import type { AppConfig } from "./config";
import { PinoLogger } from "./services/logger";
import type { Logger } from "./services/logger";
import { StateStore } from "./services/state-store";
import { BroadcastHub } from "./services/broadcast-hub";
import { SimulationClock } from "./services/simulation-clock";
import { InferencePipeline } from "./services/inference";
import { CommandRouter } from "./services/command-router";
import { TelemetryWebSocketHandler } from "./apis/websocket";
import type { WebSocketHandler } from "./apis/websocket";
import { TelemetryAPIHandler } from "./apis/telemetry";
import { registerTelemetryRoutes } from "./apis/openapi";
import { mulberry32, type RandomSource } from "./simulation/random";
import { EdgePulseError, httpStatusFor } from "./utils/errors";

export interface AppOverrides {
  logger?: Logger;
  random?: RandomSource;
}

// Dependency Injection Container
export class AppContainer {
  readonly seed: number;
  private logger: Logger;
  private store: StateStore;
  private hub: BroadcastHub;
  private clock: SimulationClock;
  private pipeline: InferencePipeline;
  private router: CommandRouter;
  private wsHandler: TelemetryWebSocketHandler;
  private telemetryHandler: TelemetryAPIHandler;

  constructor(config: Readonly<AppConfig>, overrides: AppOverrides = {}) {
    // Initialize logger first (needed by other services)
    this.logger = overrides.logger ?? new PinoLogger({ level: config.logLevel });

    this.seed = config.simulationSeed ?? randomInt(0, 2 ** 31);
    const random = overrides.random ?? mulberry32(this.seed);

    this.store = new StateStore({ random });
    this.hub = new BroadcastHub(this.logger);
    this.clock = new SimulationClock(this.store, this.hub, this.logger, {
      intervalMs: config.tickIntervalMs,
      alerts: config.alerts,
    });
    this.pipeline = new InferencePipeline(this.store, random, {
      minLatencyMs: config.inference.minLatencyMs,
      maxLatencyMs: config.inference.maxLatencyMs,
      confidenceThreshold: config.inference.confidenceThreshold,
    });
    this.router = new CommandRouter(this.store, this.hub, this.pipeline, this.logger, {
      maxWidth: config.inference.maxWidth,
      maxHeight: config.inference.maxHeight,
      timeoutMs: config.inference.timeoutMs,
    });
    this.wsHandler = new TelemetryWebSocketHandler(
      this.store,
      this.hub,
      this.router,
      this.logger
    );
    this.telemetryHandler = new TelemetryAPIHandler({
      store: this.store,
      router: this.router,
      logger: this.logger,
      alerts: config.alerts,
      connectedSessions: () => this.hub.size(),
    });
  }

  getLogger(): Logger {
    return this.logger;
  }

  getStore(): StateStore {
    return this.store;
  }

  getClock(): SimulationClock {
    return this.clock;
  }

  getWebSocketHandler(): WebSocketHandler {
    return this.wsHandler;
  }

  getTelemetryHandler(): TelemetryAPIHandler {
    return this.telemetryHandler;
  }

  shutdown(): void {
    this.clock.stop();
    this.wsHandler.shutdown();
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createApp(config: Readonly<AppConfig>, overrides: AppOverrides = {}) {
  const container = new AppContainer(config, overrides);
  const logger = container.getLogger();

  const app = new OpenAPIHono({
    defaultHook: (result, c) => {
      if (!result.success) {
        const message = result.error.issues
          .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
          .join("; ");
        return c.json({ success: false, message: `Invalid request: ${message}` }, 400);
      }
    },
  });

  const { injectWebSocket, upgradeWebSocket } = createNodeWebSocket({ app });

  // CORS middleware
  app.use(
    "/*",
    cors({
      origin: config.corsOrigin,
      allowHeaders: ["Content-Type"],
      allowMethods: ["GET", "POST", "OPTIONS"],
    })
  );

  // Logging middleware
  app.use(
    honoLogger((message) => {
      logger.info(message);
    })
  );

  // WebSocket endpoint for dashboard sessions
  app.get(
    "/ws",
    upgradeWebSocket(() => {
      const wsHandler = container.getWebSocketHandler();
      const sessionId = randomUUID();

      return {
        onOpen: (_evt, ws) => {
          wsHandler.handleConnection(sessionId, ws);
        },
        onMessage: (evt) => {
          wsHandler.handleMessage(sessionId, evt.data);
        },
        onClose: (evt) => {
          wsHandler.handleDisconnection(sessionId, evt.code, evt.reason);
        },
        onError: (evt) => {
          const error: unknown = "error" in evt ? evt.error : undefined;
          wsHandler.handleError(
            sessionId,
            error instanceof Error ? error : new Error("Unknown WebSocket error")
          );
        },
      };
    })
  );

  registerTelemetryRoutes(app, container.getTelemetryHandler());

  // Error handling middleware
  app.onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json({ success: false, message: err.message }, err.status);
    }

    const status = httpStatusFor(err);
    if (status === 500) {
      logger.error("Request error", err, {
        path: c.req.path,
        method: c.req.method,
      });
      return c.json({ success: false, message: "Internal server error" }, 500);
    }

    logger.warn("Request rejected", {
      path: c.req.path,
      method: c.req.method,
      code: err instanceof EdgePulseError ? err.code : undefined,
      error: errorMessage(err),
    });
    return c.json({ success: false, message: err.message }, status);
  });

  // 404 handler
  app.notFound((c) => {
    return c.json(
      { success: false, message: `Route ${c.req.method} ${c.req.path} not found` },
      404
    );
  });

  return { app, container, injectWebSocket };
}
