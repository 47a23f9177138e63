import { z } from "zod";

// ============================================
// System State
// ============================================

const percent = () => z.number().min(0).max(100);
const unit = () => z.number().min(0).max(1);

export const FrequencyModeSchema = z.enum(["high", "normal", "low"]);

export type FrequencyMode = z.infer<typeof FrequencyModeSchema>;

export const CpuCoreSchema = z.object({
  usagePct: percent(),
  frequencyMHz: z.number().int().positive(),
  temperatureC: z.number(),
});

export type CpuCore = z.infer<typeof CpuCoreSchema>;

export const CpuStateSchema = z.object({
  cores: z.record(CpuCoreSchema),
  frequencyMode: FrequencyModeSchema,
});

export type CpuState = z.infer<typeof CpuStateSchema>;

export const MemoryStateSchema = z.object({
  totalMB: z.number().positive(),
  usedMB: z.number().min(0),
  pressurePct: percent(),
  fragmentationPct: percent(),
  allocationCount: z.number().int().min(0),
});

export type MemoryState = z.infer<typeof MemoryStateSchema>;

export const AiStateSchema = z.object({
  npuUsagePct: percent(),
  inferenceLatencyMs: z.number().positive(),
  batchSize: z.number().int().min(1),
  detectionCount: z.number().int().min(0),
  isRunning: z.boolean(),
});

export type AiState = z.infer<typeof AiStateSchema>;

export const DriverStatusSchema = z.enum(["connected", "active", "idle", "error"]);

export type DriverStatus = z.infer<typeof DriverStatusSchema>;

export const SystemStateSchema = z.object({
  cpu: CpuStateSchema,
  memory: MemoryStateSchema,
  ai: AiStateSchema,
  drivers: z.record(DriverStatusSchema),
});

export type SystemState = z.infer<typeof SystemStateSchema>;

// ============================================
// Inference
// ============================================

/**
 * One detected object. `bbox` is `[x, y, width, height]`, normalized to the
 * image dimensions.
 */
export const DetectionSchema = z.object({
  classId: z.number().int().min(0),
  className: z.string(),
  confidence: z.number().gt(0).max(1),
  bbox: z.tuple([unit(), unit(), unit(), unit()]),
});

export type Detection = z.infer<typeof DetectionSchema>;

export const InferenceResultSchema = z.object({
  detections: z.array(DetectionSchema),
  inferenceTime: z.number().min(0),
  requestId: z.string().optional(),
});

export type InferenceResultPayload = z.infer<typeof InferenceResultSchema>;

// ============================================
// Client -> Server
// ============================================

export const ClientCommandSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("start_inference") }),
  z.object({ type: z.literal("stop_inference") }),
  z.object({
    type: z.literal("adjust_frequency"),
    mode: FrequencyModeSchema,
  }),
  z.object({ type: z.literal("defragment_memory") }),
  z.object({
    type: z.literal("run_inference"),
    imageData: z.string().min(1),
    requestId: z.string().optional(),
  }),
]);

export type ClientCommand = z.infer<typeof ClientCommandSchema>;

// ============================================
// Server -> Client
// ============================================

export const ErrorCodeSchema = z.enum([
  "INVALID_INPUT",
  "TIMEOUT",
  "CONNECTION_LOST",
  "UNKNOWN_COMMAND",
  "MALFORMED_COMMAND",
  "CANCELLED",
]);

export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

export const StateSnapshotEventSchema = z.object({
  type: z.literal("system_status"),
  seq: z.number().int().min(0),
  data: SystemStateSchema,
});

export type StateSnapshotEvent = z.infer<typeof StateSnapshotEventSchema>;

export const InferenceResultEventSchema = z.object({
  type: z.literal("ai_inference_result"),
  data: InferenceResultSchema,
});

export const ErrorEventSchema = z.object({
  type: z.literal("error"),
  data: z.object({
    code: ErrorCodeSchema,
    message: z.string(),
  }),
});

export type ErrorEvent = z.infer<typeof ErrorEventSchema>;

export const ServerEventSchema = z.discriminatedUnion("type", [
  StateSnapshotEventSchema,
  InferenceResultEventSchema,
  ErrorEventSchema,
]);

export type ServerEvent = z.infer<typeof ServerEventSchema>;
