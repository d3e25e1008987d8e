import {
  stageOrder,
  type StageName,
  type StageState,
  type StageStatus,
} from "../../core/entities/research";
import type {
  ClockPort,
  CompletionUpdate,
  ProgressSinkPort,
} from "../../core/ports/outboundPorts";
import { logger, toErrorDetails } from "../../shared/logger/logger";

export type StageProgress = (progress: number, message: string) => Promise<void>;

export const silentProgressSink: ProgressSinkPort = {
  notify: async () => {},
  complete: async () => {},
};

/**
 * Tracks per-stage state for one run and forwards updates to the sink.
 * Active progress never moves backwards within a stage; completed reports 100
 * and error reports 0. Sink failures are logged and dropped.
 */
export class ProgressReporter {
  private readonly states = new Map<StageName, StageState>();

  constructor(
    private readonly sink: ProgressSinkPort,
    private readonly clock: ClockPort,
  ) {
    const createdAt = clock.now();
    stageOrder.forEach((stage) => {
      this.states.set(stage, {
        stage,
        status: "pending",
        progress: 0,
        message: "",
        updatedAt: createdAt,
      });
    });
  }

  async update(
    stage: StageName,
    status: StageStatus,
    progress: number,
    message: string,
  ): Promise<void> {
    const state: StageState = {
      stage,
      status,
      progress: this.effectiveProgress(stage, status, progress),
      message,
      updatedAt: this.clock.now(),
    };
    this.states.set(stage, state);

    try {
      await this.sink.notify(stage, status, state.progress, message);
    } catch (error) {
      logger.warn(
        { stage, status, progress: state.progress, error: toErrorDetails(error) },
        "Progress delivery failed",
      );
    }
  }

  /**
   * Binds progress updates of an active stage to a callback for stage services.
   */
  forStage(stage: StageName): StageProgress {
    return (progress, message) =>
      this.update(stage, "active", progress, message);
  }

  async complete(update: CompletionUpdate): Promise<void> {
    try {
      await this.sink.complete(update);
    } catch (error) {
      logger.warn(
        { success: update.success, error: toErrorDetails(error) },
        "Completion delivery failed",
      );
    }
  }

  snapshot(): StageState[] {
    return stageOrder.flatMap((stage) => {
      const state = this.states.get(stage);
      return state ? [{ ...state }] : [];
    });
  }

  private effectiveProgress(
    stage: StageName,
    status: StageStatus,
    requested: number,
  ): number {
    if (status === "completed") {
      return 100;
    }

    if (status === "error") {
      return 0;
    }

    const bounded = Math.max(0, Math.min(100, Math.round(requested)));
    const previous = this.states.get(stage);
    if (status === "active" && previous?.status === "active") {
      return Math.max(previous.progress, bounded);
    }

    return bounded;
  }
}
