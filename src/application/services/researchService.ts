import type {
  NewResearchReport,
  ResearchRequest,
  ResearchResult,
} from "../../core/entities/research";
import type {
  ProcessResearchOptions,
  ResearchProcessorPort,
} from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  IdGeneratorPort,
  ReportRepositoryPort,
} from "../../core/ports/outboundPorts";
import { logger, toErrorDetails } from "../../shared/logger/logger";
import { researchTarget } from "../prompts/researchPrompts";
import { silentProgressSink } from "./progressReporter";
import type {
  CompletedResearchContext,
  ResearchPipelineService,
} from "./researchPipelineService";

const TITLE_LIMIT = 50;

export const reportTitle = (request: ResearchRequest): string => {
  const prefix =
    request.kind === "feature" ? "Feature research" : "Product research";
  const title = `${prefix}: ${researchTarget(request)}`;
  return title.length > TITLE_LIMIT
    ? `${title.slice(0, TITLE_LIMIT)}...`
    : title;
};

export const estimateTokens = (content: string): number => {
  const words = content.split(/\s+/).filter(Boolean).length;
  return Math.round(words * 1.3);
};

/**
 * Entry point for hosts: runs the pipeline, persists the report and tells the
 * progress sink how the run ended. Failures come back as values.
 */
export class ResearchService implements ResearchProcessorPort {
  constructor(
    private readonly pipeline: ResearchPipelineService,
    private readonly reports: ReportRepositoryPort,
    private readonly clock: ClockPort,
    private readonly ids: IdGeneratorPort,
    private readonly aiModel: string,
  ) {}

  async processResearch(
    request: ResearchRequest,
    options: ProcessResearchOptions = {},
  ): Promise<ResearchResult> {
    const sessionId = options.sessionId ?? this.ids.next();
    const startedAt = this.clock.now();
    logger.info({ sessionId, kind: request.kind }, "Research started");

    const run = await this.pipeline.run(
      request,
      options.progress ?? silentProgressSink,
    );

    if (!run.success) {
      await run.reporter.complete({
        success: false,
        error: run.failure.error,
        message: `Research failed during ${run.failure.stage}`,
      });

      return {
        success: false,
        error: run.failure.error,
        stage: run.failure.stage,
        stages: run.reporter.snapshot(),
      };
    }

    const elapsedSeconds =
      (this.clock.now().getTime() - startedAt.getTime()) / 1000;

    let reportId: number;
    try {
      reportId = await this.reports.save(
        this.toNewReport(run.context, sessionId, elapsedSeconds),
      );
    } catch (error) {
      const details = toErrorDetails(error);
      logger.error({ sessionId, error: details }, "Report persistence failed");
      const message = `Failed to save report: ${details.message}`;
      await run.reporter.complete({
        success: false,
        error: message,
        message: "Report generated but could not be saved",
      });

      return { success: false, error: message, stages: run.reporter.snapshot() };
    }

    logger.info(
      { sessionId, reportId, elapsedSeconds, links: run.context.linkSummary },
      "Research completed",
    );
    await run.reporter.complete({
      success: true,
      reportId,
      message: "Research report is ready",
    });

    return {
      success: true,
      report: run.context.report,
      reportId,
      stages: run.reporter.snapshot(),
    };
  }

  private toNewReport(
    context: CompletedResearchContext,
    sessionId: string,
    elapsedSeconds: number,
  ): NewResearchReport {
    const { request } = context;
    return {
      title: reportTitle(request),
      content: context.report,
      kind: request.kind,
      productDescription: request.productDescription,
      segment: request.segment,
      researchElement: researchTarget(request),
      benchmarks: request.kind === "feature" ? request.benchmarks : "",
      requiredPlayers: request.requiredPlayers,
      requiredCountries: request.requiredCountries,
      sessionId,
      aiModel: this.aiModel,
      processingTimeSeconds: elapsedSeconds,
      tokensUsed: estimateTokens(context.report),
      createdAt: this.clock.now(),
    };
  }
}
