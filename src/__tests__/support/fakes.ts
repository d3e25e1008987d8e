import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  StageName,
  StageStatus,
  VerifiedLink,
} from "../../core/entities/research";
import type {
  ClockPort,
  CompletionUpdate,
  GenerationOptions,
  LlmPort,
  LinkCheckerPort,
  ProgressSinkPort,
} from "../../core/ports/outboundPorts";

export type SinkEvent = {
  stage: StageName;
  status: StageStatus;
  progress: number;
  message: string;
};

export class RecordingSink implements ProgressSinkPort {
  readonly events: SinkEvent[] = [];
  readonly completions: CompletionUpdate[] = [];

  async notify(
    stage: StageName,
    status: StageStatus,
    progress: number,
    message: string,
  ): Promise<void> {
    this.events.push({ stage, status, progress, message });
  }

  async complete(update: CompletionUpdate): Promise<void> {
    this.completions.push(update);
  }

  statuses(stage: StageName): StageStatus[] {
    return this.events
      .filter((event) => event.stage === stage)
      .map((event) => event.status);
  }
}

export const fixedClock = (iso = "2026-03-02T09:00:00.000Z"): ClockPort => ({
  now: () => new Date(iso),
});

export const recordingSleep = () => {
  const waits: number[] = [];
  return {
    waits,
    sleep: async (ms: number) => {
      waits.push(ms);
    },
  };
};

export const llmFailure = (message = "upstream unavailable"): AppBoundaryError => ({
  source: "llm",
  code: "provider_error",
  provider: "fake-llm",
  message,
  retryable: true,
});

export type LlmCall = { prompt: string; options: GenerationOptions };

type ScriptedReply = string | AppBoundaryError | ((prompt: string) => string);

/**
 * Replies are consumed in order; the last one repeats once the script runs out.
 */
export class ScriptedLlm implements LlmPort {
  readonly calls: LlmCall[] = [];

  constructor(private readonly replies: ScriptedReply[]) {}

  async generate(
    prompt: string,
    options: GenerationOptions,
  ): Promise<Result<string, AppBoundaryError>> {
    this.calls.push({ prompt, options });
    const reply =
      this.replies[Math.min(this.calls.length - 1, this.replies.length - 1)];

    if (reply === undefined) {
      return err(llmFailure("no scripted reply"));
    }

    if (typeof reply === "string") {
      return ok(reply);
    }

    if (typeof reply === "function") {
      return ok(reply(prompt));
    }

    return err(reply);
  }
}

export class MapLinkChecker implements LinkCheckerPort {
  readonly checked: string[] = [];

  constructor(private readonly statuses: Record<string, number | "refused">) {}

  async check(url: string): Promise<VerifiedLink> {
    this.checked.push(url);
    const status = this.statuses[url] ?? 404;
    if (status === "refused") {
      return { url, status: "broken" };
    }

    return {
      url,
      status: status < 400 ? "working" : "broken",
      httpStatus: status,
    };
  }
}
