import type {
  CaseEntity,
  LinkVerificationSummary,
  VerifiedLink,
} from "../../core/entities/research";
import type { LinkCheckerPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import {
  collapseBlankLines,
  extractMarkdownLinks,
  formatLinkSummary,
  removeSpans,
  summarizeLinks,
} from "../parsing/reportText";

export type LinkVerificationOptions = {
  selfHostedPrefix: string;
  maxCaseLinks: number;
};

export type VerifiedReport = {
  content: string;
  summary: LinkVerificationSummary;
};

/**
 * Checks links one at a time. Results are cached per URL for the lifetime of
 * one verification pass; counts are per occurrence.
 */
export class LinkVerificationService {
  constructor(
    private readonly checker: LinkCheckerPort,
    private readonly options: LinkVerificationOptions,
  ) {}

  /**
   * Removes every markdown link whose target is unreachable and appends the
   * verification summary block.
   */
  async verifyReport(content: string): Promise<VerifiedReport> {
    const links = extractMarkdownLinks(content);
    const cache = new Map<string, VerifiedLink>();
    const brokenSpans: string[] = [];
    let working = 0;

    for (const link of links) {
      const verified = await this.verify(link.url, cache);
      if (verified.status === "working") {
        working += 1;
      } else {
        brokenSpans.push(link.span);
      }
    }

    const summary = summarizeLinks(working, brokenSpans.length);
    logger.info(summary, "Report links verified");

    const cleaned = collapseBlankLines(removeSpans(content, brokenSpans));
    return {
      content: `${cleaned}${formatLinkSummary(summary)}`,
      summary,
    };
  }

  async verifyCases(cases: CaseEntity[]): Promise<CaseEntity[]> {
    const cache = new Map<string, VerifiedLink>();
    const verifiedCases: CaseEntity[] = [];

    for (const entry of cases) {
      const verifiedLinks: VerifiedLink[] = [];
      for (const url of entry.links.slice(0, this.options.maxCaseLinks)) {
        verifiedLinks.push(await this.verify(url, cache));
      }

      verifiedCases.push({
        ...entry,
        verifiedLinks,
        brokenLinks: verifiedLinks
          .filter((link) => link.status === "broken")
          .map((link) => link.url),
      });
    }

    return verifiedCases;
  }

  private async verify(
    url: string,
    cache: Map<string, VerifiedLink>,
  ): Promise<VerifiedLink> {
    if (url.startsWith(this.options.selfHostedPrefix)) {
      return { url, status: "working" };
    }

    const cached = cache.get(url);
    if (cached) {
      return cached;
    }

    const verified = await this.checker.check(url);
    cache.set(url, verified);
    logger.debug(
      { url, status: verified.status, httpStatus: verified.httpStatus },
      "Link checked",
    );
    return verified;
  }
}
