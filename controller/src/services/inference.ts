import type { Detection } from "@edgepulse/protocol";
import { between, pickIndex, type RandomSource } from "../simulation/random";
import { preprocessImage, type ImageBounds } from "../utils/image";
import {
  InferenceCancelledError,
  InferenceTimeoutError,
} from "../utils/errors";
import type { StateStore } from "./state-store";

/** Synthetic confidences are drawn from [MIN_DETECTION_CONFIDENCE, 1]. */
export const MIN_DETECTION_CONFIDENCE = 0.7;

export const DETECTION_LABELS = [
  "person",
  "car",
  "bicycle",
  "dog",
  "cat",
  "tree",
  "building",
] as const;

const MAX_DETECTIONS = 8;

export interface InferencePipelineOptions {
  minLatencyMs: number;
  maxLatencyMs: number;
  confidenceThreshold: number;
}

export interface InferenceRunOptions extends ImageBounds {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface InferenceOutcome {
  detections: Detection[];
  /** Simulated model latency in milliseconds. */
  inferenceTime: number;
  width: number;
  height: number;
  timestamp: string;
}

function round(value: number, places: number): number {
  const factor = 10 ** places;
  return Math.round(value * factor) / factor;
}

function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error ? reason : new InferenceCancelledError();
}

function throwIfAborted(signal: AbortSignal): void {
  if (signal.aborted) {
    throw abortReason(signal);
  }
}

function delay(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Mock object detector. Images are really decoded and resized; the model
 * itself is a latency wait followed by synthesized detections.
 */
export class InferencePipeline {
  constructor(
    private store: StateStore,
    private random: RandomSource,
    private options: InferencePipelineOptions
  ) {}

  async run(image: Buffer, options: InferenceRunOptions): Promise<InferenceOutcome> {
    const deadline = new AbortController();
    const timer = setTimeout(() => {
      deadline.abort(new InferenceTimeoutError(options.timeoutMs));
    }, options.timeoutMs);

    const caller = options.signal;
    const onCallerAbort = () => {
      const reason: unknown = caller?.reason;
      deadline.abort(
        new InferenceCancelledError(typeof reason === "string" ? reason : undefined)
      );
    };
    if (caller?.aborted) {
      onCallerAbort();
    } else {
      caller?.addEventListener("abort", onCallerAbort, { once: true });
    }

    try {
      throwIfAborted(deadline.signal);
      const prepared = await preprocessImage(image, options);
      throwIfAborted(deadline.signal);

      const latency = between(
        this.random,
        this.options.minLatencyMs,
        this.options.maxLatencyMs
      );
      await delay(latency, deadline.signal);

      const detections = this.synthesize();
      throwIfAborted(deadline.signal);

      this.store.apply({ type: "recordDetections", count: detections.length });

      return {
        detections,
        inferenceTime: Math.round(latency),
        width: prepared.width,
        height: prepared.height,
        timestamp: new Date().toISOString(),
      };
    } finally {
      clearTimeout(timer);
      caller?.removeEventListener("abort", onCallerAbort);
    }
  }

  private synthesize(): Detection[] {
    const count = 1 + pickIndex(this.random, MAX_DETECTIONS);
    const detections: Detection[] = [];

    for (let i = 0; i < count; i++) {
      const classId = pickIndex(this.random, DETECTION_LABELS.length);
      const confidence = round(between(this.random, MIN_DETECTION_CONFIDENCE, 1), 2);
      const x = this.random() * 0.8;
      const y = this.random() * 0.8;
      const width = Math.min(between(this.random, 0.1, 0.3), 1 - x);
      const height = Math.min(between(this.random, 0.1, 0.3), 1 - y);

      detections.push({
        classId,
        className: DETECTION_LABELS[classId] ?? "object",
        confidence,
        bbox: [round(x, 4), round(y, 4), round(width, 4), round(height, 4)],
      });
    }

    return detections.filter(
      (detection) => detection.confidence >= this.options.confidenceThreshold
    );
  }
}
