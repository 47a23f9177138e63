import { z } from "zod";
import { MIN_DETECTION_CONFIDENCE } from "./services/inference";

export interface AlertThresholds {
  cpuTemperatureC: number;
  cpuUsagePct: number;
  memoryPressurePct: number;
}

export interface AppConfig {
  port: number;
  host: string;
  corsOrigin: string;
  logLevel: string;
  tickIntervalMs: number;
  simulationSeed?: number;
  inference: {
    minLatencyMs: number;
    maxLatencyMs: number;
    timeoutMs: number;
    maxWidth: number;
    maxHeight: number;
    confidenceThreshold: number;
  };
  alerts: AlertThresholds;
}

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z
  .object({
    PORT: z.coerce.number().int().min(1).max(65535).default(8080),
    HOST: z.string().min(1).default("0.0.0.0"),
    CORS_ORIGIN: z.string().min(1).default("*"),
    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    TICK_INTERVAL_MS: positiveInt(3000),
    SIMULATION_SEED: z.coerce.number().int().optional(),
    INFERENCE_MIN_LATENCY_MS: z.coerce.number().int().min(0).default(500),
    INFERENCE_MAX_LATENCY_MS: z.coerce.number().int().min(0).default(1500),
    INFERENCE_TIMEOUT_MS: positiveInt(30000),
    INFERENCE_MAX_WIDTH: positiveInt(800),
    INFERENCE_MAX_HEIGHT: positiveInt(600),
    // Above the confidence floor a run could filter out every detection
    CONFIDENCE_THRESHOLD: z.coerce
      .number()
      .min(0)
      .max(MIN_DETECTION_CONFIDENCE, {
        message: `must not exceed ${MIN_DETECTION_CONFIDENCE}`,
      })
      .default(0.5),
    ALERT_CPU_TEMPERATURE_C: z.coerce.number().default(75),
    ALERT_CPU_USAGE_PCT: z.coerce.number().min(0).max(100).default(80),
    ALERT_MEMORY_PRESSURE_PCT: z.coerce.number().min(0).max(100).default(80),
  })
  .refine((env) => env.INFERENCE_MIN_LATENCY_MS <= env.INFERENCE_MAX_LATENCY_MS, {
    message: "must not exceed INFERENCE_MAX_LATENCY_MS",
    path: ["INFERENCE_MIN_LATENCY_MS"],
  });

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * Reads the process configuration once. Empty variables count as unset.
 * The returned object is frozen.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): Readonly<AppConfig> {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join(".")} ${issue.message}`)
    );
  }

  const e = parsed.data;
  const config: AppConfig = {
    port: e.PORT,
    host: e.HOST,
    corsOrigin: e.CORS_ORIGIN,
    logLevel: e.LOG_LEVEL,
    tickIntervalMs: e.TICK_INTERVAL_MS,
    simulationSeed: e.SIMULATION_SEED,
    inference: Object.freeze({
      minLatencyMs: e.INFERENCE_MIN_LATENCY_MS,
      maxLatencyMs: e.INFERENCE_MAX_LATENCY_MS,
      timeoutMs: e.INFERENCE_TIMEOUT_MS,
      maxWidth: e.INFERENCE_MAX_WIDTH,
      maxHeight: e.INFERENCE_MAX_HEIGHT,
      confidenceThreshold: e.CONFIDENCE_THRESHOLD,
    }),
    alerts: Object.freeze({
      cpuTemperatureC: e.ALERT_CPU_TEMPERATURE_C,
      cpuUsagePct: e.ALERT_CPU_USAGE_PCT,
      memoryPressurePct: e.ALERT_MEMORY_PRESSURE_PCT,
    }),
  };
  return Object.freeze(config);
}
