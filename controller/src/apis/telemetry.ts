import type { FrequencyMode } from "@edgepulse/protocol";
import type { AlertThresholds } from "../config";
import type { CommandRouter } from "../services/command-router";
import type { InferenceOutcome } from "../services/inference";
import type { Logger } from "../services/logger";
import type { StateStore } from "../services/state-store";
import type {
  AiStatusResponse,
  CommandAck,
  CpuStatusResponse,
  DriversStatusResponse,
  HealthResponse,
  InferenceResponse,
  MemoryStatusResponse,
  SystemInfoResponse,
  SystemStatusResponse,
} from "./openapi-schemas";

export interface TelemetryAPIConfig {
  store: StateStore;
  router: CommandRouter;
  logger: Logger;
  alerts: AlertThresholds;
  connectedSessions: () => number;
}

const BOARD = {
  platform: "RK3588",
  architecture: "ARM64",
  cores: "4x Cortex-A76 + 4x Cortex-A55",
  npu: "6TOPS NPU",
  memory: "8GB LPDDR4",
  version: "StarryOS v1.0",
} as const;

/**
 * REST face of the control plane. Reads come straight from the store; writes
 * go through the same router the WebSocket sessions use, so every change is
 * also broadcast.
 */
export class TelemetryAPIHandler {
  private store: StateStore;
  private router: CommandRouter;
  private logger: Logger;
  private alerts: AlertThresholds;
  private connectedSessions: () => number;

  constructor(config: TelemetryAPIConfig) {
    this.store = config.store;
    this.router = config.router;
    this.logger = config.logger;
    this.alerts = config.alerts;
    this.connectedSessions = config.connectedSessions;
  }

  health(): HealthResponse {
    return {
      status: "healthy",
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      connected_sessions: this.connectedSessions(),
    };
  }

  systemStatus(): SystemStatusResponse {
    return { success: true, data: this.store.get() };
  }

  cpuStatus(): CpuStatusResponse {
    return { success: true, data: this.store.get().cpu };
  }

  memoryStatus(): MemoryStatusResponse {
    return { success: true, data: this.store.get().memory };
  }

  aiStatus(): AiStatusResponse {
    return { success: true, data: this.store.get().ai };
  }

  driversStatus(): DriversStatusResponse {
    return { success: true, data: this.store.get().drivers };
  }

  systemInfo(): SystemInfoResponse {
    return {
      success: true,
      data: {
        ...BOARD,
        uptime: process.uptime(),
        alertThresholds: { ...this.alerts },
      },
    };
  }

  controlInference(action: "start" | "stop"): CommandAck {
    const { seq } = this.router.execute({
      type: action === "start" ? "start_inference" : "stop_inference",
    });
    this.logger.info("Inference mode changed", { action, seq });
    return {
      success: true,
      message: `Inference ${action === "start" ? "started" : "stopped"}`,
      seq,
    };
  }

  setFrequency(mode: FrequencyMode): CommandAck {
    const { seq } = this.router.execute({ type: "adjust_frequency", mode });
    this.logger.info("Frequency mode changed", { mode, seq });
    return { success: true, message: `Frequency mode set to ${mode}`, seq };
  }

  defragment(): CommandAck {
    const { seq } = this.router.execute({ type: "defragment_memory" });
    return { success: true, message: "Memory defragmentation complete", seq };
  }

  /** Failures are rethrown for the app error handler to map to a status. */
  async inference(imageData: string, requestId: string): Promise<InferenceResponse> {
    let outcome: InferenceOutcome;
    try {
      outcome = await this.router.runInference(imageData);
    } catch (error) {
      if (error instanceof Error) {
        this.logger.inferenceFailed(requestId, error, { source: "rest" });
      }
      throw error;
    }
    this.logger.inferenceCompleted(
      requestId,
      outcome.inferenceTime,
      outcome.detections.length,
      { source: "rest" }
    );
    return { success: true, data: outcome };
  }
}
