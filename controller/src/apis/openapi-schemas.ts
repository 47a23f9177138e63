import { z } from "@hono/zod-openapi";
import {
  AiStateSchema,
  CpuStateSchema,
  DetectionSchema,
  DriverStatusSchema,
  FrequencyModeSchema,
  MemoryStateSchema,
  SystemStateSchema,
} from "@edgepulse/protocol";

// ============================================
// Common Schemas
// ============================================

/**
 * Error envelope returned by every failing route
 */
export const ErrorResponseSchema = z.object({
  success: z.literal(false),
  message: z.string().openapi({ description: "Error message" }),
});

export type ErrorResponse = z.infer<typeof ErrorResponseSchema>;

/**
 * Acknowledgement of a state command
 */
export const CommandAckSchema = z.object({
  success: z.literal(true),
  message: z.string().openapi({ description: "Human-readable outcome" }),
  seq: z.number().int().openapi({ description: "Sequence number of the snapshot broadcast for this change" }),
});

export type CommandAck = z.infer<typeof CommandAckSchema>;

const envelope = <T extends z.ZodTypeAny>(data: T) =>
  z.object({
    success: z.literal(true),
    data,
  });

// ============================================
// Telemetry
// ============================================

export const SystemStatusResponseSchema = envelope(SystemStateSchema);
export type SystemStatusResponse = z.infer<typeof SystemStatusResponseSchema>;

export const CpuStatusResponseSchema = envelope(CpuStateSchema);
export type CpuStatusResponse = z.infer<typeof CpuStatusResponseSchema>;

export const MemoryStatusResponseSchema = envelope(MemoryStateSchema);
export type MemoryStatusResponse = z.infer<typeof MemoryStatusResponseSchema>;

export const AiStatusResponseSchema = envelope(AiStateSchema);
export type AiStatusResponse = z.infer<typeof AiStatusResponseSchema>;

export const DriversStatusResponseSchema = envelope(z.record(DriverStatusSchema));
export type DriversStatusResponse = z.infer<typeof DriversStatusResponseSchema>;

/**
 * Static board descriptor
 */
export const SystemInfoSchema = z.object({
  platform: z.string().openapi({ example: "RK3588" }),
  architecture: z.string().openapi({ example: "ARM64" }),
  cores: z.string().openapi({ example: "4x Cortex-A76 + 4x Cortex-A55" }),
  npu: z.string().openapi({ example: "6TOPS NPU" }),
  memory: z.string().openapi({ example: "8GB LPDDR4" }),
  version: z.string().openapi({ example: "StarryOS v1.0" }),
  uptime: z.number().openapi({ description: "Process uptime in seconds" }),
  alertThresholds: z.object({
    cpuTemperatureC: z.number(),
    cpuUsagePct: z.number(),
    memoryPressurePct: z.number(),
  }),
});

export const SystemInfoResponseSchema = envelope(SystemInfoSchema);
export type SystemInfoResponse = z.infer<typeof SystemInfoResponseSchema>;

// ============================================
// Control
// ============================================

export const AiControlRequestSchema = z.object({
  action: z.enum(["start", "stop"]).openapi({ description: "Start or stop continuous inference" }),
});

export const FrequencyRequestSchema = z.object({
  mode: FrequencyModeSchema.openapi({ description: "CPU frequency mode" }),
});

export const InferenceRequestSchema = z.object({
  imageData: z.string().min(1).openapi({
    description: "Base64 image or data:image/*;base64 URL",
  }),
});

export const InferenceResponseSchema = envelope(
  z.object({
    detections: z.array(DetectionSchema),
    inferenceTime: z.number().openapi({ description: "Simulated model latency in milliseconds" }),
    width: z.number().int().openapi({ description: "Width after resizing" }),
    height: z.number().int().openapi({ description: "Height after resizing" }),
    timestamp: z.string(),
  })
);

export type InferenceResponse = z.infer<typeof InferenceResponseSchema>;

// ============================================
// Utility
// ============================================

export const HealthResponseSchema = z.object({
  status: z.literal("healthy").openapi({ description: "Health status" }),
  timestamp: z.string().openapi({ description: "Current timestamp" }),
  uptime: z.number().openapi({ description: "Server uptime in seconds" }),
  connected_sessions: z.number().openapi({ description: "Number of connected dashboard sessions" }),
});

export type HealthResponse = z.infer<typeof HealthResponseSchema>;
