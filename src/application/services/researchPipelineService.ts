import type {
  CaseEntity,
  LinkVerificationSummary,
  LocalInsights,
  MarketData,
  ResearchContext,
  ResearchRequest,
  StageName,
} from "../../core/entities/research";
import type {
  ClockPort,
  ProgressSinkPort,
} from "../../core/ports/outboundPorts";
import { sleep as defaultSleep, type SleepFn } from "../../shared/async/sleep";
import { logger } from "../../shared/logger/logger";
import type { CaseAnalysisService } from "./caseAnalysisService";
import type { LocalInsightsService } from "./localInsightsService";
import type { MarketDataService } from "./marketDataService";
import { ProgressReporter } from "./progressReporter";
import type { ReportGenerationService } from "./reportGenerationService";
import { StageRunner, type StageFailure, type StageFn } from "./stageRunner";

export type ResearchStages = {
  marketData: MarketDataService;
  localInsights: LocalInsightsService;
  caseAnalysis: CaseAnalysisService;
  reportGeneration: ReportGenerationService;
};

export type CompletedResearchContext = ResearchContext & {
  marketData: MarketData;
  localInsights: LocalInsights;
  cases: CaseEntity[];
  report: string;
  linkSummary: LinkVerificationSummary;
};

export type PipelineRun =
  | {
      success: true;
      context: CompletedResearchContext;
      reporter: ProgressReporter;
    }
  | { success: false; failure: StageFailure; reporter: ProgressReporter };

export type PipelineOptions = {
  maxAttempts: number;
  sleep?: SleepFn;
};

const stageLabels: Record<StageName, string> = {
  data_collection: "Data collection",
  local_documents: "Local documents analysis",
  case_analysis: "Case analysis",
  report_generation: "Report generation",
};

/**
 * Runs the four stages in order. The context grows by one artifact per completed
 * stage and each stage reads its inputs from it. Each stage owns its
 * retry budget; the first exhausted stage halts the run.
 */
export class ResearchPipelineService {
  constructor(
    private readonly stages: ResearchStages,
    private readonly clock: ClockPort,
    private readonly options: PipelineOptions,
  ) {}

  async run(
    request: ResearchRequest,
    sink: ProgressSinkPort,
  ): Promise<PipelineRun> {
    const reporter = new ProgressReporter(sink, this.clock);
    const runner = new StageRunner(
      reporter,
      this.options.maxAttempts,
      this.options.sleep ?? defaultSleep,
    );

    const execute = async <T>(
      stage: StageName,
      stageFn: StageFn<T>,
    ): Promise<
      { ok: true; value: T } | { ok: false; failure: StageFailure }
    > => {
      const label = stageLabels[stage];
      await reporter.update(stage, "active", 0, `${label} started`);
      const result = await runner.run(stage, label, stageFn);

      if (result.isErr()) {
        logger.error(
          { stage, attempts: result.error.attempts, error: result.error.errorDetails },
          "Research stage exhausted retries",
        );
        return { ok: false, failure: result.error };
      }

      return { ok: true, value: result.value };
    };

    const initial: ResearchContext = { request };

    const marketData = await execute("data_collection", (progress) =>
      this.stages.marketData.collect(initial.request, progress),
    );
    if (!marketData.ok) {
      return { success: false, failure: marketData.failure, reporter };
    }

    const collected = { ...initial, marketData: marketData.value };
    await reporter.update(
      "data_collection",
      "completed",
      100,
      `Collected data on ${collected.marketData.totalFound} companies`,
    );

    const localInsights = await execute("local_documents", (progress) =>
      this.stages.localInsights.collect(collected.request, progress),
    );
    if (!localInsights.ok) {
      return { success: false, failure: localInsights.failure, reporter };
    }

    const informed = { ...collected, localInsights: localInsights.value };
    await reporter.update(
      "local_documents",
      "completed",
      100,
      informed.localInsights.degradedReason
        ? `Continuing without document insights: ${informed.localInsights.degradedReason}`
        : `Extracted ${informed.localInsights.insights.length} insights from ${informed.localInsights.files.length} documents`,
    );

    const cases = await execute("case_analysis", (progress) =>
      this.stages.caseAnalysis.analyze(
        informed.marketData,
        informed.localInsights.insights,
        informed.request,
        progress,
      ),
    );
    if (!cases.ok) {
      return { success: false, failure: cases.failure, reporter };
    }

    const analysed = { ...informed, cases: cases.value };
    await reporter.update(
      "case_analysis",
      "completed",
      100,
      `Analysed ${analysed.cases.length} cases`,
    );

    const report = await execute("report_generation", (progress) =>
      this.stages.reportGeneration.generate(
        analysed.cases,
        analysed.localInsights.insights,
        analysed.request,
        progress,
      ),
    );
    if (!report.ok) {
      return { success: false, failure: report.failure, reporter };
    }

    const context: CompletedResearchContext = {
      ...analysed,
      report: report.value.content,
      linkSummary: report.value.linkSummary,
    };
    await reporter.update(
      "report_generation",
      "completed",
      100,
      "Report ready",
    );

    return { success: true, context, reporter };
  }
}
