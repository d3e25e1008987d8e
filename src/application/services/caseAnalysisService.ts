import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  CaseEntity,
  InsightEntity,
  MarketData,
  ResearchRequest,
} from "../../core/entities/research";
import type { LlmPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { extractCases } from "../parsing/caseExtractor";
import { caseAnalysisPrompt } from "../prompts/researchPrompts";
import type { LinkVerificationService } from "./linkVerificationService";
import type { StageProgress } from "./progressReporter";

export class CaseAnalysisService {
  constructor(
    private readonly llm: LlmPort,
    private readonly verification: LinkVerificationService,
    private readonly language: string,
  ) {}

  async analyze(
    marketData: MarketData,
    insights: InsightEntity[],
    request: ResearchRequest,
    progress: StageProgress,
  ): Promise<Result<CaseEntity[], AppBoundaryError>> {
    await progress(10, "Preparing case analysis...");
    const prompt = caseAnalysisPrompt(
      marketData,
      insights,
      request,
      this.language,
    );

    await progress(30, "Analysing cases with the model...");
    const response = await this.llm.generate(prompt, {
      temperature: 0.5,
      maxTokens: 2048,
    });

    if (response.isErr()) {
      return err(response.error);
    }

    await progress(60, "Extracting cases...");
    const cases = extractCases(response.value);

    await progress(75, "Verifying case links...");
    const verified = await this.verification.verifyCases(cases);

    logger.info(
      {
        cases: verified.length,
        brokenLinks: verified.reduce(
          (total, entry) => total + (entry.brokenLinks?.length ?? 0),
          0,
        ),
      },
      "Cases analysed",
    );
    await progress(90, `Analysed ${verified.length} cases`);

    return ok(verified);
  }
}
