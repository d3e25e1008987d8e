import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  CaseEntity,
  InsightEntity,
  LinkVerificationSummary,
  ResearchRequest,
} from "../../core/entities/research";
import type { LlmPort } from "../../core/ports/outboundPorts";
import { cleanReportContent } from "../parsing/reportText";
import { reportGenerationPrompt } from "../prompts/researchPrompts";
import type { LinkEnhancementService } from "./linkEnhancementService";
import type { LinkVerificationService } from "./linkVerificationService";
import type { StageProgress } from "./progressReporter";

export type GeneratedReport = {
  content: string;
  linkSummary: LinkVerificationSummary;
};

/**
 * Final stage: draft, link enhancement, link verification, cleanup.
 */
export class ReportGenerationService {
  constructor(
    private readonly llm: LlmPort,
    private readonly enhancement: LinkEnhancementService,
    private readonly verification: LinkVerificationService,
    private readonly language: string,
  ) {}

  async generate(
    cases: CaseEntity[],
    insights: InsightEntity[],
    request: ResearchRequest,
    progress: StageProgress,
  ): Promise<Result<GeneratedReport, AppBoundaryError>> {
    await progress(10, "Preparing report...");
    const prompt = reportGenerationPrompt(
      cases,
      insights,
      request,
      this.language,
    );

    await progress(30, "Writing the report...");
    const response = await this.llm.generate(prompt, {
      temperature: 0.3,
      maxTokens: 4096,
    });

    if (response.isErr()) {
      return err(response.error);
    }

    const draft = cleanReportContent(response.value);
    if (!draft) {
      return err({
        source: "llm",
        code: "malformed_response",
        provider: "report-generation",
        message: "Model returned an empty report",
        retryable: true,
      });
    }

    await progress(60, "Adding verified links...");
    const enhanced = await this.enhancement.enhance(draft, cases);

    await progress(80, "Verifying report links...");
    const verified = await this.verification.verifyReport(enhanced);

    await progress(95, "Finalising report...");
    return ok({
      content: cleanReportContent(verified.content),
      linkSummary: verified.summary,
    });
  }
}
