import { CaseAnalysisService } from "../services/caseAnalysisService";
import { LinkEnhancementService } from "../services/linkEnhancementService";
import { LinkVerificationService } from "../services/linkVerificationService";
import { LocalInsightsService } from "../services/localInsightsService";
import { MarketDataService } from "../services/marketDataService";
import { ReportGenerationService } from "../services/reportGenerationService";
import { ResearchPipelineService } from "../services/researchPipelineService";
import { ResearchService } from "../services/researchService";
import {
  configWarnings,
  documentsBaseUrl,
  env,
  type AppEnv,
} from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import { createDb } from "../../infra/db/client";
import { PostgresReportRepository } from "../../infra/db/repositories";
import { LocalDocumentSource } from "../../infra/documents/localDocumentSource";
import { readPdfPages } from "../../infra/documents/pdfPageReader";
import { HttpLinkChecker } from "../../infra/http/httpLinkChecker";
import { HuggingFaceLlm } from "../../infra/llm/huggingFaceLlm";
import {
  BullMqResearchQueue,
  redisConfigFromUrl,
} from "../../infra/queue/bullMqQueue";
import { SystemClock, UuidIdGenerator } from "../../infra/system/systemPorts";

// Per-document excerpt cap in characters.
const MAX_EXCERPT_CHARS = 20_000;

export const createLlm = (appEnv: AppEnv = env): HuggingFaceLlm =>
  new HuggingFaceLlm({
    baseUrl: appEnv.HF_API_URL,
    model: appEnv.HF_MODEL,
    apiToken: appEnv.HF_API_TOKEN,
    timeoutMs: appEnv.HF_TIMEOUT_MS,
    maxRetries: appEnv.HF_MAX_RETRIES,
    retryBaseMs: appEnv.HF_RETRY_BASE_MS,
    overloadDelayMs: appEnv.HF_OVERLOAD_DELAY_MS,
    maxOverloadWaits: appEnv.HF_MAX_OVERLOAD_WAITS,
  });

export const createResearchQueue = (
  appEnv: AppEnv = env,
): BullMqResearchQueue =>
  new BullMqResearchQueue(redisConfigFromUrl(appEnv.REDIS_URL));

/**
 * Centralizes runtime wiring so CLI and worker entry points share one composition root.
 */
export const createRuntime = (appEnv: AppEnv = env) => {
  configWarnings(appEnv).forEach((warning) => logger.warn(warning));

  const { db, sql } = createDb(appEnv.POSTGRES_URL);
  const clock = new SystemClock();
  const ids = new UuidIdGenerator();
  const reports = new PostgresReportRepository(db);
  const llm = createLlm(appEnv);

  const verification = new LinkVerificationService(
    new HttpLinkChecker(appEnv.LINK_CHECK_TIMEOUT_MS),
    {
      selfHostedPrefix: documentsBaseUrl(appEnv),
      maxCaseLinks: appEnv.MAX_CASE_LINKS,
    },
  );

  const pipeline = new ResearchPipelineService(
    {
      marketData: new MarketDataService(llm, clock, appEnv.REPORT_LANGUAGE),
      localInsights: new LocalInsightsService(
        llm,
        new LocalDocumentSource(appEnv.DATA_DIR, readPdfPages),
        {
          documentsBaseUrl: documentsBaseUrl(appEnv),
          maxExcerptChars: MAX_EXCERPT_CHARS,
        },
      ),
      caseAnalysis: new CaseAnalysisService(
        llm,
        verification,
        appEnv.REPORT_LANGUAGE,
      ),
      reportGeneration: new ReportGenerationService(
        llm,
        new LinkEnhancementService(llm),
        verification,
        appEnv.REPORT_LANGUAGE,
      ),
    },
    clock,
    { maxAttempts: appEnv.STAGE_MAX_ATTEMPTS },
  );

  const researchService = new ResearchService(
    pipeline,
    reports,
    clock,
    ids,
    appEnv.HF_MODEL,
  );

  return {
    clock,
    ids,
    reports,
    researchService,
    close: async () => {
      await sql.end();
    },
  };
};

export type Runtime = ReturnType<typeof createRuntime>;
