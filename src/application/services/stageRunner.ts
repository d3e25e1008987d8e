import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { StageName } from "../../core/entities/research";
import { sleep as defaultSleep, type SleepFn } from "../../shared/async/sleep";
import {
  logger,
  toErrorDetails,
  type ErrorDetails,
} from "../../shared/logger/logger";
import type { ProgressReporter, StageProgress } from "./progressReporter";

export type StageFailure = {
  stage: StageName;
  error: string;
  errorDetails: ErrorDetails;
  attempts: number;
};

export type StageFn<T> = (
  progress: StageProgress,
) => Promise<Result<T, AppBoundaryError>>;

const isBoundaryError = (value: unknown): value is AppBoundaryError =>
  typeof value === "object" &&
  value !== null &&
  "source" in value &&
  "code" in value &&
  "message" in value;

export const describeFailure = (failure: unknown): ErrorDetails => {
  if (isBoundaryError(failure)) {
    return {
      name: `${failure.source}:${failure.code}`,
      message: `${failure.provider}: ${failure.message}`,
    };
  }

  return toErrorDetails(failure);
};

/**
 * Runs one pipeline stage with its own retry budget. Exhaustion is returned
 * as a StageFailure value and never thrown.
 */
export class StageRunner {
  constructor(
    private readonly reporter: ProgressReporter,
    private readonly maxAttempts = 3,
    private readonly sleep: SleepFn = defaultSleep,
    private readonly backoffBaseMs = 1_000,
  ) {}

  async run<T>(
    stage: StageName,
    label: string,
    stageFn: StageFn<T>,
  ): Promise<Result<T, StageFailure>> {
    let lastFailure: unknown = new Error(`${label} did not run`);

    for (let attempt = 0; attempt < this.maxAttempts; attempt += 1) {
      logger.debug(
        { stage, attempt: attempt + 1, maxAttempts: this.maxAttempts },
        "Stage attempt started",
      );

      if (attempt > 0) {
        await this.reporter.update(
          stage,
          "active",
          0,
          `Retrying ${label} (attempt ${attempt + 1}/${this.maxAttempts})...`,
        );
        await this.sleep(this.backoffBaseMs * 2 ** attempt);
      }

      try {
        const result = await stageFn(this.reporter.forStage(stage));
        if (result.isOk()) {
          return ok(result.value);
        }

        lastFailure = result.error;
      } catch (error) {
        lastFailure = error;
      }

      logger.warn(
        {
          stage,
          attempt: attempt + 1,
          maxAttempts: this.maxAttempts,
          error: describeFailure(lastFailure),
        },
        "Stage attempt failed",
      );
    }

    const errorDetails = describeFailure(lastFailure);
    await this.reporter.update(
      stage,
      "error",
      0,
      `${label} failed after ${this.maxAttempts} attempts: ${errorDetails.message}`,
    );

    return err({
      stage,
      error: errorDetails.message,
      errorDetails,
      attempts: this.maxAttempts,
    });
  }
}
