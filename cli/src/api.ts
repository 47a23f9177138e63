import { z } from "zod";
import {
  SystemStateSchema,
  type FrequencyMode,
  type SystemState,
} from "@edgepulse/protocol";
import {
  CommandAckSchema,
  ErrorBodySchema,
  HealthSchema,
  InferenceReportSchema,
  SystemInfoSchema,
  type CommandAck,
  type Health,
  type InferenceReport,
  type SystemInfo,
} from "./types.js";

export class ApiError extends Error {
  constructor(
    public readonly status: number,
    message: string
  ) {
    super(message);
    this.name = "ApiError";
  }
}

export function getBaseUrl(url: string): string {
  return url.replace(/\/$/, "");
}

/** `http(s)://host` becomes `ws(s)://host/ws`. */
export function getWebSocketUrl(url: string): string {
  return `${getBaseUrl(url).replace(/^http/, "ws")}/ws`;
}

function envelope<T extends z.ZodTypeAny>(data: T) {
  return z.object({ success: z.literal(true), data });
}

async function readError(res: Response): Promise<string> {
  const text = await res.text();
  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    return text || res.statusText;
  }
  const parsed = ErrorBodySchema.safeParse(body);
  return parsed.success ? parsed.data.message : text || res.statusText;
}

export async function request<T extends z.ZodTypeAny>(
  baseUrl: string,
  path: string,
  schema: T,
  options: RequestInit = {}
): Promise<z.infer<T>> {
  const url = `${baseUrl}${path}`;
  const res = await fetch(url, {
    ...options,
    headers: {
      "Content-Type": "application/json",
      ...options.headers,
    },
  });

  if (!res.ok) {
    throw new ApiError(res.status, `HTTP ${res.status}: ${await readError(res)}`);
  }

  const parsed = schema.safeParse(await res.json());
  if (!parsed.success) {
    throw new ApiError(res.status, `Unexpected response from ${path}`);
  }
  return parsed.data;
}

export async function checkHealth(url: string): Promise<Health> {
  return request(getBaseUrl(url), "/health", HealthSchema);
}

export async function fetchSystemInfo(url: string): Promise<SystemInfo> {
  const { data } = await request(
    getBaseUrl(url),
    "/api/system/info",
    envelope(SystemInfoSchema)
  );
  return data;
}

export async function fetchSystemStatus(url: string): Promise<SystemState> {
  const { data } = await request(
    getBaseUrl(url),
    "/api/system/status",
    envelope(SystemStateSchema)
  );
  return data;
}

export async function setFrequency(url: string, mode: FrequencyMode): Promise<CommandAck> {
  return request(getBaseUrl(url), "/api/cpu/frequency", CommandAckSchema, {
    method: "POST",
    body: JSON.stringify({ mode }),
  });
}

export async function defragment(url: string): Promise<CommandAck> {
  return request(getBaseUrl(url), "/api/memory/defragment", CommandAckSchema, {
    method: "POST",
  });
}

export async function controlInference(
  url: string,
  action: "start" | "stop"
): Promise<CommandAck> {
  return request(getBaseUrl(url), "/api/ai/control", CommandAckSchema, {
    method: "POST",
    body: JSON.stringify({ action }),
  });
}

export async function runInference(
  url: string,
  imageData: string
): Promise<InferenceReport> {
  const { data } = await request(
    getBaseUrl(url),
    "/api/ai/inference",
    envelope(InferenceReportSchema),
    {
      method: "POST",
      body: JSON.stringify({ imageData }),
    }
  );
  return data;
}
