import { ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  InsightEntity,
  LocalInsights,
  ResearchRequest,
} from "../../core/entities/research";
import type {
  DocumentSourcePort,
  LlmPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { parseInsights } from "../parsing/insightExtractor";
import {
  localDocumentsPrompt,
  type DocumentExcerpt,
} from "../prompts/researchPrompts";
import type { StageProgress } from "./progressReporter";

export type LocalInsightsOptions = {
  documentsBaseUrl: string;
  maxExcerptChars: number;
};

const degraded = (files: string[], reason: string): LocalInsights => ({
  insights: [],
  files,
  degradedReason: reason,
});

/**
 * Second stage. Reference documents are optional enrichment, so every failure
 * here resolves to an empty insight list with a degraded reason.
 */
export class LocalInsightsService {
  constructor(
    private readonly llm: LlmPort,
    private readonly documents: DocumentSourcePort,
    private readonly options: LocalInsightsOptions,
  ) {}

  async collect(
    request: ResearchRequest,
    progress: StageProgress,
  ): Promise<Result<LocalInsights, AppBoundaryError>> {
    await progress(5, "Looking for local documents...");
    const listed = await this.documents.listDocuments();
    if (listed.isErr()) {
      logger.warn(
        { code: listed.error.code, message: listed.error.message },
        "Local documents unavailable",
      );
      return ok(degraded([], listed.error.message));
    }

    const documents = listed.value;
    if (documents.length === 0) {
      return ok({ insights: [], files: [] });
    }

    const excerpts: DocumentExcerpt[] = [];
    for (const [index, document] of documents.entries()) {
      await progress(
        10 + Math.round((40 * index) / documents.length),
        `Reading ${document.fileName} (${index + 1}/${documents.length})...`,
      );

      const pages = await this.documents.readPages(document);
      if (pages.isErr()) {
        logger.warn(
          { file: document.fileName, message: pages.error.message },
          "Skipping unreadable document",
        );
        continue;
      }

      const text = pages.value.filter((page) => page.trim()).join("\n\n");
      if (text) {
        excerpts.push({
          file: document.fileName,
          excerpt: text.slice(0, this.options.maxExcerptChars),
        });
      }
    }

    const files = excerpts.map((excerpt) => excerpt.file);
    if (excerpts.length === 0) {
      return ok(degraded([], "No readable text in local documents"));
    }

    await progress(55, "Extracting facts from documents...");
    const response = await this.llm.generate(
      localDocumentsPrompt(excerpts, request),
      { temperature: 0.2, maxTokens: 1024 },
    );

    if (response.isErr()) {
      logger.warn(
        { code: response.error.code, message: response.error.message },
        "Insight extraction failed",
      );
      return ok(degraded(files, response.error.message));
    }

    await progress(70, "Structuring insights...");
    const outcome = parseInsights(response.value);
    logger.info(
      { tier: outcome.tier, insights: outcome.insights.length, files: files.length },
      "Local insights parsed",
    );

    await progress(90, `Extracted ${outcome.insights.length} insights`);
    return ok({
      insights: outcome.insights.map((insight) =>
        this.withDownloadLink(insight, files),
      ),
      files,
    });
  }

  private withDownloadLink(
    insight: InsightEntity,
    files: string[],
  ): InsightEntity {
    if (insight.downloadLink || !files.includes(insight.sourceFile)) {
      return insight;
    }

    return {
      ...insight,
      downloadLink: `${this.options.documentsBaseUrl}${encodeURIComponent(insight.sourceFile)}`,
    };
  }
}
