import type { LinkVerificationSummary } from "../../core/entities/research";

export type MarkdownLink = {
  text: string;
  url: string;
  span: string;
};

const markdownLinkPattern = /\[([^\]]+)\]\(([^)]+)\)/g;

export const extractMarkdownLinks = (content: string): MarkdownLink[] =>
  Array.from(content.matchAll(markdownLinkPattern), (match) => ({
    text: match[1] ?? "",
    url: match[2] ?? "",
    span: match[0],
  }));

/**
 * Deletes every occurrence of each span, link text included.
 */
export const removeSpans = (content: string, spans: string[]): string =>
  spans.reduce((text, span) => text.split(span).join(""), content);

/**
 * Collapses runs of blank lines to a single blank line and drops leading blank lines.
 */
export const collapseBlankLines = (content: string): string =>
  content.replace(/\n\s*\n\s*\n/g, "\n\n").replace(/^(?:[ \t]*\n)+/, "");

/**
 * Idempotent whitespace cleanup applied to the final report.
 */
export const cleanReportContent = (content: string): string =>
  collapseBlankLines(content.replace(/\r\n?/g, "\n")).trim();

export const summarizeLinks = (
  working: number,
  broken: number,
): LinkVerificationSummary => {
  const total = working + broken;
  return {
    total,
    working,
    broken,
    workingPercentage: total > 0 ? (working / total) * 100 : 0,
  };
};

export const formatLinkSummary = (summary: LinkVerificationSummary): string =>
  [
    "",
    "",
    "## Link verification summary",
    "",
    `- **Links checked:** ${summary.total}`,
    `- **Working links:** ${summary.working}`,
    `- **Broken links:** ${summary.broken}`,
    `- **Working share:** ${summary.workingPercentage.toFixed(1)}%`,
    "",
    "*Every link was checked for availability.*",
    "",
  ].join("\n");
