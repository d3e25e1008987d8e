import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";
import type {
  NewResearchReport,
  ResearchReportEntity,
  ResearchRequest,
  StageName,
  StageStatus,
  VerifiedLink,
} from "../entities/research";

export type ResearchJobPayload = {
  jobId: string;
  clientId: string;
  request: ResearchRequest;
  requestedAt: string;
};

export interface QueuePort {
  enqueue(payload: ResearchJobPayload): Promise<void>;
}

export type GenerationOptions = {
  temperature: number;
  maxTokens: number;
};

export interface LlmPort {
  generate(
    prompt: string,
    options: GenerationOptions,
  ): Promise<Result<string, AppBoundaryError>>;
}

export type CompletionUpdate =
  | { success: true; reportId: number; message: string }
  | { success: false; error: string; message: string };

/**
 * Fire-and-forget observer of pipeline progress.
 */
export interface ProgressSinkPort {
  notify(
    stage: StageName,
    status: StageStatus,
    progress: number,
    message: string,
  ): Promise<void>;
  complete(update: CompletionUpdate): Promise<void>;
}

export type SourceDocument = {
  path: string;
  fileName: string;
};

export interface DocumentSourcePort {
  listDocuments(): Promise<Result<SourceDocument[], AppBoundaryError>>;
  readPages(
    document: SourceDocument,
  ): Promise<Result<string[], AppBoundaryError>>;
}

export interface LinkCheckerPort {
  check(url: string): Promise<VerifiedLink>;
}

export interface ReportRepositoryPort {
  save(report: NewResearchReport): Promise<number>;
  findById(id: number): Promise<ResearchReportEntity | null>;
  listRecent(limit: number): Promise<ResearchReportEntity[]>;
}

export interface ClockPort {
  now(): Date;
}

export interface IdGeneratorPort {
  next(): string;
}
