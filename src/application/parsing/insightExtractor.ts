import { z } from "zod";
import type { InsightEntity } from "../../core/entities/research";

export const UNKNOWN_SOURCE_FILE = "unknown.pdf";

const optionalText = z
  .union([z.string(), z.number()])
  .transform((value) => String(value))
  .nullish()
  .catch(null);

const insightItemSchema = z.object({
  source_file: optionalText,
  download_link: optionalText,
  section: optionalText,
  fact: optionalText,
  date: optionalText,
  metrics: z
    .union([z.string(), z.number(), z.record(z.string(), z.unknown())])
    .nullish()
    .catch(null),
  links: z.array(z.string()).nullish().catch(null),
});

export type InsightParseOutcome = {
  tier: "structured" | "fallback";
  insights: InsightEntity[];
};

const toInsight = (item: z.infer<typeof insightItemSchema>): InsightEntity => ({
  sourceFile: item.source_file || UNKNOWN_SOURCE_FILE,
  downloadLink: item.download_link || null,
  section: item.section ?? "",
  fact: item.fact ?? "",
  date: item.date || null,
  metrics: item.metrics === "" ? null : (item.metrics ?? null),
  links: item.links ?? [],
});

const lineInsight = (fact: string): InsightEntity => ({
  sourceFile: UNKNOWN_SOURCE_FILE,
  downloadLink: null,
  section: "",
  fact,
  date: null,
  metrics: null,
  links: [],
});

const isPlainObject = (value: unknown): boolean =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const parseStructured = (content: string): InsightEntity[] | null => {
  const unfenced = content.replace(/```(?:json)?/gi, "");
  const start = unfenced.indexOf("[");
  const end = unfenced.lastIndexOf("]");
  if (start === -1 || end <= start) {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(unfenced.slice(start, end + 1));
  } catch {
    return null;
  }

  if (!Array.isArray(parsed)) {
    return null;
  }

  // A bare `[]` means no facts; a bracketed aside in prose ("[2024]") is not an answer.
  if (parsed.length === 0 && unfenced.trim() === "[]") {
    return [];
  }
  if (!parsed.some(isPlainObject)) {
    return null;
  }

  const insights: InsightEntity[] = [];
  for (const item of parsed) {
    if (typeof item === "string") {
      if (item.trim()) {
        insights.push(lineInsight(item.trim()));
      }
      continue;
    }

    const normalized = insightItemSchema.safeParse(item);
    if (normalized.success) {
      insights.push(toInsight(normalized.data));
    }
  }

  return insights;
};

const parseLines = (content: string): InsightEntity[] =>
  content
    .split("\n")
    .map((line) => line.replace(/^[\s\-•*]+|[\s\-•*]+$/g, ""))
    .filter(Boolean)
    .map(lineInsight);

/**
 * Reads a JSON array of insights when the model produced one, otherwise
 * turns every non-empty line into a fact without source attribution.
 */
export const parseInsights = (content: string): InsightParseOutcome => {
  const structured = parseStructured(content);
  if (structured) {
    return { tier: "structured", insights: structured };
  }

  return { tier: "fallback", insights: parseLines(content) };
};
