import type { CaseEntity } from "../../core/entities/research";
import type { LlmPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import {
  linkEnhancementPrompt,
  type LinkCandidate,
} from "../prompts/researchPrompts";

export const MAX_LINK_CANDIDATES = 20;
export const MAX_ENHANCEMENT_CHARS = 15_000;
export const TRUNCATION_MARKER = "\n\n[... report truncated ...]";

export const collectLinkCandidates = (cases: CaseEntity[]): LinkCandidate[] =>
  cases
    .flatMap((entry) =>
      (entry.verifiedLinks ?? [])
        .filter((link) => link.status === "working")
        .map((link) => ({
          url: link.url,
          company: entry.title || entry.company || "Unknown",
          context: entry.description,
        })),
    )
    .slice(0, MAX_LINK_CANDIDATES);

export const previewForEnhancement = (report: string): string =>
  report.length > MAX_ENHANCEMENT_CHARS
    ? `${report.slice(0, MAX_ENHANCEMENT_CHARS)}${TRUNCATION_MARKER}`
    : report;

/**
 * Asks the model to weave verified case links into the report. Any failure or
 * empty answer leaves the report as it was.
 */
export class LinkEnhancementService {
  constructor(private readonly llm: LlmPort) {}

  async enhance(report: string, cases: CaseEntity[]): Promise<string> {
    const candidates = collectLinkCandidates(cases);
    if (candidates.length === 0) {
      logger.debug("No verified case links; skipping link enhancement");
      return report;
    }

    const response = await this.llm.generate(
      linkEnhancementPrompt(previewForEnhancement(report), candidates),
      { temperature: 0.3, maxTokens: 4096 },
    );

    if (response.isErr()) {
      logger.warn(
        { code: response.error.code, message: response.error.message },
        "Link enhancement failed; keeping original report",
      );
      return report;
    }

    const enhanced = response.value.trim();
    if (!enhanced) {
      logger.warn("Link enhancement returned nothing; keeping original report");
      return report;
    }

    return enhanced;
  }
}
