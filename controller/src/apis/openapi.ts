import { randomUUID } from "crypto";
import { createRoute, type OpenAPIHono, type z } from "@hono/zod-openapi";
import {
  AiControlRequestSchema,
  AiStatusResponseSchema,
  CommandAckSchema,
  CpuStatusResponseSchema,
  DriversStatusResponseSchema,
  ErrorResponseSchema,
  FrequencyRequestSchema,
  HealthResponseSchema,
  InferenceRequestSchema,
  InferenceResponseSchema,
  MemoryStatusResponseSchema,
  SystemInfoResponseSchema,
  SystemStatusResponseSchema,
} from "./openapi-schemas";
import type { TelemetryAPIHandler } from "./telemetry";

const json = <T extends z.ZodTypeAny>(schema: T, description: string) => ({
  description,
  content: { "application/json": { schema } },
});

const invalidRequest = json(ErrorResponseSchema, "Invalid request body");

const statusRoute = <T extends z.ZodTypeAny>(path: string, summary: string, schema: T) =>
  createRoute({
    method: "get",
    path,
    tags: ["Telemetry"],
    summary,
    responses: { 200: json(schema, summary) },
  });

// ============================================
// Telemetry Routes
// ============================================

export const SystemStatusRoute = statusRoute(
  "/api/system/status",
  "Full telemetry document",
  SystemStatusResponseSchema
);

export const CpuStatusRoute = statusRoute(
  "/api/cpu/status",
  "CPU cores and frequency mode",
  CpuStatusResponseSchema
);

export const MemoryStatusRoute = statusRoute(
  "/api/memory/status",
  "Memory usage and fragmentation",
  MemoryStatusResponseSchema
);

export const AiStatusRoute = statusRoute(
  "/api/ai/status",
  "NPU and inference state",
  AiStatusResponseSchema
);

export const DriversStatusRoute = statusRoute(
  "/api/drivers/status",
  "Peripheral driver status",
  DriversStatusResponseSchema
);

export const SystemInfoRoute = statusRoute(
  "/api/system/info",
  "Static board descriptor",
  SystemInfoResponseSchema
);

// ============================================
// Control Routes
// ============================================

/**
 * Start or stop continuous inference
 */
export const AiControlRoute = createRoute({
  method: "post",
  path: "/api/ai/control",
  tags: ["Control"],
  summary: "Start or stop continuous inference",
  request: {
    body: {
      content: { "application/json": { schema: AiControlRequestSchema } },
      required: true,
    },
  },
  responses: {
    200: json(CommandAckSchema, "Inference mode changed"),
    400: invalidRequest,
  },
});

/**
 * Switch the CPU frequency mode
 */
export const FrequencyRoute = createRoute({
  method: "post",
  path: "/api/cpu/frequency",
  tags: ["Control"],
  summary: "Switch the CPU frequency mode",
  request: {
    body: {
      content: { "application/json": { schema: FrequencyRequestSchema } },
      required: true,
    },
  },
  responses: {
    200: json(CommandAckSchema, "Frequency mode changed"),
    400: invalidRequest,
  },
});

export const DefragmentRoute = createRoute({
  method: "post",
  path: "/api/memory/defragment",
  tags: ["Control"],
  summary: "Defragment memory",
  responses: {
    200: json(CommandAckSchema, "Memory defragmented"),
  },
});

/**
 * One-shot inference on an uploaded image
 */
export const InferenceRoute = createRoute({
  method: "post",
  path: "/api/ai/inference",
  tags: ["Control"],
  summary: "Run object detection on an image",
  request: {
    body: {
      content: { "application/json": { schema: InferenceRequestSchema } },
      required: true,
    },
  },
  responses: {
    200: json(InferenceResponseSchema, "Detections"),
    400: invalidRequest,
    504: json(ErrorResponseSchema, "Inference timed out"),
  },
});

// ============================================
// Utility Routes
// ============================================

export const HealthRoute = createRoute({
  method: "get",
  path: "/health",
  tags: ["Utility"],
  summary: "Health check",
  responses: {
    200: json(HealthResponseSchema, "Service is healthy"),
  },
});

/**
 * OpenAPI specification info object
 */
export const OpenAPIInfo = {
  openapi: "3.0.0",
  info: {
    title: "EdgePulse Controller API",
    version: "1.0.0",
    description: "Telemetry and control plane for a simulated RK3588 board",
  },
  tags: [
    { name: "Telemetry", description: "Read-only views of the telemetry document" },
    { name: "Control", description: "Commands that change the simulated board" },
    { name: "Utility", description: "Health checks and API description" },
  ],
};

export function registerTelemetryRoutes(
  app: OpenAPIHono,
  handler: TelemetryAPIHandler
): void {
  app.openapi(HealthRoute, (c) => c.json(handler.health(), 200));

  app.openapi(SystemStatusRoute, (c) => c.json(handler.systemStatus(), 200));
  app.openapi(CpuStatusRoute, (c) => c.json(handler.cpuStatus(), 200));
  app.openapi(MemoryStatusRoute, (c) => c.json(handler.memoryStatus(), 200));
  app.openapi(AiStatusRoute, (c) => c.json(handler.aiStatus(), 200));
  app.openapi(DriversStatusRoute, (c) => c.json(handler.driversStatus(), 200));
  app.openapi(SystemInfoRoute, (c) => c.json(handler.systemInfo(), 200));

  app.openapi(AiControlRoute, (c) => {
    const { action } = c.req.valid("json");
    return c.json(handler.controlInference(action), 200);
  });

  app.openapi(FrequencyRoute, (c) => {
    const { mode } = c.req.valid("json");
    return c.json(handler.setFrequency(mode), 200);
  });

  app.openapi(DefragmentRoute, (c) => c.json(handler.defragment(), 200));

  app.openapi(InferenceRoute, async (c) => {
    const { imageData } = c.req.valid("json");
    return c.json(await handler.inference(imageData, randomUUID()), 200);
  });

  app.doc("/openapi.json", OpenAPIInfo);
}
