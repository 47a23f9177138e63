import { randomUUID } from "crypto";
import type {
  ClientCommand,
  StateSnapshotEvent,
} from "@edgepulse/protocol";
import type { StateMutation } from "../simulation/mutations";
import { decodeImageData } from "../utils/image";
import { EdgePulseError } from "../utils/errors";
import type { BroadcastHub } from "./broadcast-hub";
import type { InferenceOutcome, InferencePipeline } from "./inference";
import type { Logger } from "./logger";
import type { StateStore } from "./state-store";

/** Commands that mutate the store directly. */
export type StateCommand = Exclude<ClientCommand, { type: "run_inference" }>;

export interface InferenceLimits {
  maxWidth: number;
  maxHeight: number;
  timeoutMs: number;
}

function toMutation(command: StateCommand): StateMutation {
  switch (command.type) {
    case "start_inference":
      return { type: "setRunning", running: true };
    case "stop_inference":
      return { type: "setRunning", running: false };
    case "adjust_frequency":
      return { type: "setFrequencyMode", mode: command.mode };
    case "defragment_memory":
      return { type: "defragment" };
  }
}

/**
 * Turns decoded client commands into store mutations and inference runs.
 * State commands answer every session with a fresh snapshot; inference
 * results only go back to the session that asked.
 */
export class CommandRouter {
  private inFlight = new Map<string, Set<AbortController>>();

  constructor(
    private store: StateStore,
    private hub: BroadcastHub,
    private pipeline: InferencePipeline,
    private logger: Logger,
    private limits: InferenceLimits
  ) {
    this.hub.on("disconnection", (sessionId: string) => {
      this.cancelSession(sessionId);
    });
  }

  handle(command: ClientCommand, sessionId: string): void {
    if (command.type === "run_inference") {
      void this.runForSession(sessionId, command.imageData, command.requestId);
      return;
    }
    this.execute(command);
  }

  execute(command: StateCommand): StateSnapshotEvent {
    this.store.apply(toMutation(command));
    const snapshot = this.store.snapshot();
    this.hub.broadcast(snapshot);
    return snapshot;
  }

  /** Decodes and runs one image. Rejects with an {@link EdgePulseError} on failure. */
  runInference(imageData: string, signal?: AbortSignal): Promise<InferenceOutcome> {
    return Promise.resolve().then(() =>
      this.pipeline.run(decodeImageData(imageData), { ...this.limits, signal })
    );
  }

  /** Aborts every inference the session still has in flight. */
  cancelSession(sessionId: string): number {
    const controllers = this.inFlight.get(sessionId);
    if (!controllers) return 0;
    this.inFlight.delete(sessionId);
    for (const controller of controllers) {
      controller.abort("session disconnected");
    }
    return controllers.size;
  }

  inFlightCount(sessionId: string): number {
    return this.inFlight.get(sessionId)?.size ?? 0;
  }

  // Never rejects: every outcome is unicast or logged.
  private async runForSession(
    sessionId: string,
    imageData: string,
    requestId: string = randomUUID()
  ): Promise<void> {
    const controller = new AbortController();
    const controllers = this.inFlight.get(sessionId) ?? new Set<AbortController>();
    controllers.add(controller);
    this.inFlight.set(sessionId, controllers);

    try {
      const outcome = await this.runInference(imageData, controller.signal);
      this.logger.inferenceCompleted(
        requestId,
        outcome.inferenceTime,
        outcome.detections.length,
        { sessionId }
      );
      this.hub.unicast(sessionId, {
        type: "ai_inference_result",
        data: {
          detections: outcome.detections,
          inferenceTime: outcome.inferenceTime,
          requestId,
        },
      });
    } catch (error) {
      const failure =
        error instanceof EdgePulseError
          ? error
          : new EdgePulseError(
              error instanceof Error ? error.message : String(error),
              "INVALID_INPUT"
            );
      this.logger.inferenceFailed(requestId, failure, { sessionId });
      if (failure.code !== "CANCELLED") {
        this.hub.unicast(sessionId, {
          type: "error",
          data: { code: failure.code, message: failure.message },
        });
      }
    } finally {
      controllers.delete(controller);
      if (controllers.size === 0 && this.inFlight.get(sessionId) === controllers) {
        this.inFlight.delete(sessionId);
      }
    }
  }
}
