import pino from "pino";

export interface LogContext {
  requestId?: string;
  sessionId?: string;
  [key: string]: unknown;
}

// Logger Service Interface
export interface Logger {
  info(message: string, context?: Partial<LogContext>): void;
  warn(message: string, context?: Partial<LogContext>): void;
  error(message: string, error?: unknown, context?: Partial<LogContext>): void;
  debug(message: string, context?: Partial<LogContext>): void;
  child(additionalContext: Partial<LogContext>): Logger;

  // Specialized logging methods
  sessionConnected(sessionId: string, totalSessions: number): void;
  sessionDisconnected(sessionId: string, reason?: string): void;
  sessionError(sessionId: string, error: Error): void;
  commandReceived(sessionId: string, type: string): void;
  commandRejected(sessionId: string | undefined, error: Error): void;
  inferenceCompleted(
    requestId: string,
    duration: number,
    detections: number,
    context?: Partial<LogContext>
  ): void;
  inferenceFailed(
    requestId: string,
    error: Error,
    context?: Partial<LogContext>
  ): void;
  alertRaised(metric: string, value: number, threshold: number): void;
  alertCleared(metric: string, value: number): void;
}

export interface PinoLoggerOptions {
  level?: string;
  context?: LogContext;
  destination?: pino.DestinationStream;
}

function serializeError(error: Error) {
  return {
    message: error.message,
    stack: error.stack,
    name: error.name,
  };
}

// Pino Logger Implementation
export class PinoLogger implements Logger {
  private logger: pino.Logger;
  private context: LogContext;
  private destination?: pino.DestinationStream;

  constructor(options: PinoLoggerOptions = {}) {
    const pinoOptions: pino.LoggerOptions = {
      level: options.level || process.env.LOG_LEVEL || "info",
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label: string) => {
          return { level: label };
        },
      },
    };
    this.logger = options.destination
      ? pino(pinoOptions, options.destination)
      : pino(pinoOptions);
    this.destination = options.destination;
    this.context = options.context || {};
  }

  private enrichContext(additionalContext: Partial<LogContext> = {}): LogContext {
    return {
      ...this.context,
      ...additionalContext,
    };
  }

  private withError(
    error: unknown,
    context: Partial<LogContext>
  ): Partial<LogContext> {
    if (error instanceof Error) {
      return { ...context, error: serializeError(error) };
    }
    if (error !== undefined) {
      return { ...context, error };
    }
    return context;
  }

  info(message: string, context: Partial<LogContext> = {}): void {
    this.logger.info(this.enrichContext(context), message);
  }

  warn(message: string, context: Partial<LogContext> = {}): void {
    this.logger.warn(this.enrichContext(context), message);
  }

  error(message: string, error?: unknown, context: Partial<LogContext> = {}): void {
    this.logger.error(this.enrichContext(this.withError(error, context)), message);
  }

  debug(message: string, context: Partial<LogContext> = {}): void {
    this.logger.debug(this.enrichContext(context), message);
  }

  // Create a child logger with additional context
  child(additionalContext: Partial<LogContext>): Logger {
    return new PinoLogger({
      level: this.logger.level,
      context: this.enrichContext(additionalContext),
      destination: this.destination,
    });
  }

  // Session lifecycle
  sessionConnected(sessionId: string, totalSessions: number): void {
    this.info("Session connected", {
      sessionId,
      totalSessions,
      event: "session_connected",
    });
  }

  sessionDisconnected(sessionId: string, reason?: string): void {
    this.info("Session disconnected", {
      sessionId,
      reason,
      event: "session_disconnected",
    });
  }

  sessionError(sessionId: string, error: Error): void {
    this.error("Session error", error, {
      sessionId,
      event: "session_error",
    });
  }

  // Commands
  commandReceived(sessionId: string, type: string): void {
    this.debug("Command received", {
      sessionId,
      commandType: type,
      event: "command_received",
    });
  }

  commandRejected(sessionId: string | undefined, error: Error): void {
    this.warn("Command rejected", {
      sessionId,
      error: serializeError(error),
      event: "command_rejected",
    });
  }

  // Inference
  inferenceCompleted(
    requestId: string,
    duration: number,
    detections: number,
    context: Partial<LogContext> = {}
  ): void {
    this.info("Inference completed", {
      requestId,
      duration,
      detections,
      event: "inference_completed",
      ...context,
    });
  }

  inferenceFailed(
    requestId: string,
    error: Error,
    context: Partial<LogContext> = {}
  ): void {
    this.warn("Inference failed", {
      requestId,
      error: serializeError(error),
      event: "inference_failed",
      ...context,
    });
  }

  // Threshold alerts
  alertRaised(metric: string, value: number, threshold: number): void {
    this.warn("Alert raised", {
      metric,
      value,
      threshold,
      event: "alert_raised",
    });
  }

  alertCleared(metric: string, value: number): void {
    this.info("Alert cleared", {
      metric,
      value,
      event: "alert_cleared",
    });
  }
}
