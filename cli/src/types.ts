import { z } from "zod";
import { DetectionSchema } from "@edgepulse/protocol";

export const HealthSchema = z.object({
  status: z.string(),
  timestamp: z.string(),
  uptime: z.number(),
  connected_sessions: z.number(),
});

export type Health = z.infer<typeof HealthSchema>;

export const SystemInfoSchema = z.object({
  platform: z.string(),
  architecture: z.string(),
  cores: z.string(),
  npu: z.string(),
  memory: z.string(),
  version: z.string(),
  uptime: z.number(),
  alertThresholds: z.object({
    cpuTemperatureC: z.number(),
    cpuUsagePct: z.number(),
    memoryPressurePct: z.number(),
  }),
});

export type SystemInfo = z.infer<typeof SystemInfoSchema>;

export const CommandAckSchema = z.object({
  success: z.literal(true),
  message: z.string(),
  seq: z.number(),
});

export type CommandAck = z.infer<typeof CommandAckSchema>;

export const InferenceReportSchema = z.object({
  detections: z.array(DetectionSchema),
  inferenceTime: z.number(),
  width: z.number(),
  height: z.number(),
  timestamp: z.string(),
});

export type InferenceReport = z.infer<typeof InferenceReportSchema>;

export const ErrorBodySchema = z.object({
  success: z.literal(false),
  message: z.string(),
});
