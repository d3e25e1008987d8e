import type {
  CaseEntity,
  InsightEntity,
  MarketData,
  ResearchRequest,
} from "../../core/entities/research";

export type DocumentExcerpt = {
  file: string;
  excerpt: string;
};

export type LinkCandidate = {
  url: string;
  company: string;
  context: string;
};

/**
 * The feature under study, or the product characteristics for product research.
 */
export const researchTarget = (request: ResearchRequest): string =>
  request.kind === "feature"
    ? request.researchElement
    : request.productCharacteristics;

const parameterLines = (request: ResearchRequest): string[] => {
  const lines = [
    `- Product: ${request.productDescription}`,
    `- Segment: ${request.segment}`,
  ];

  if (request.kind === "feature") {
    lines.push(`- Feature: ${request.researchElement}`);
    lines.push(`- Benchmarks: ${request.benchmarks}`);
  } else {
    lines.push(`- Product characteristics: ${request.productCharacteristics}`);
  }

  lines.push(`- Required players: ${request.requiredPlayers}`);
  lines.push(`- Required countries: ${request.requiredCountries}`);
  return lines;
};

export const dataCollectionPrompt = (
  request: ResearchRequest,
  language: string,
): string => {
  const goal =
    request.kind === "feature"
      ? `Find companies whose products offer the feature "${request.researchElement}" and collect as much detail about them as possible.`
      : `Find competing products with the characteristics "${request.productCharacteristics}" and collect as much detail about them as possible.`;

  return [
    "You are an expert in fintech market research and data collection.",
    "",
    `GOAL: ${goal}`,
    "",
    "RESEARCH PARAMETERS:",
    ...parameterLines(request),
    "",
    "REQUIREMENTS:",
    "1. Find at least 15-20 distinct companies.",
    "2. For every company list at least 8-10 official source links: website, product pages, case studies, press releases, news, social profiles.",
    "3. Include every required player and cover every required country.",
    "4. Only list links you are confident exist.",
    "",
    "OUTPUT FORMAT (one block per company, blocks separated by a blank line):",
    "Company: <name>",
    "Website: <official website>",
    "Country: <country>",
    "Characteristics: <one-line summary of the relevant offering>",
    "<one source link per line, each starting with http>",
    "",
    `Write field values in ${language}; keep the field labels in English.`,
  ].join("\n");
};

export const localDocumentsPrompt = (
  documents: DocumentExcerpt[],
  request: ResearchRequest,
): string =>
  [
    "You extract verifiable facts from reference documents.",
    "",
    `Research topic: ${researchTarget(request)}`,
    `Segment: ${request.segment}`,
    "",
    "DOCUMENTS:",
    ...documents.map(
      (document) => `=== ${document.file} ===\n${document.excerpt}`,
    ),
    "",
    "TASK:",
    "Return ONLY a JSON array. Each element must be an object with the keys",
    '"source_file" (exact file name above), "section", "fact", "date", "metrics" and "links".',
    "Use null for unknown values and an empty array when there are no links.",
    "Only include facts relevant to the research topic.",
  ].join("\n");

const companyLines = (marketData: MarketData): string[] => {
  if (marketData.companies.length === 0) {
    return [marketData.rawContent.slice(0, 8_000)];
  }

  return marketData.companies.slice(0, 25).map((company, index) =>
    [
      `${index + 1}. ${company.name}`,
      company.website ? `   Website: ${company.website}` : "",
      company.country ? `   Country: ${company.country}` : "",
      company.characteristics
        ? `   Characteristics: ${company.characteristics}`
        : "",
      ...(company.links ?? []).slice(0, 10).map((link) => `   ${link}`),
    ]
      .filter(Boolean)
      .join("\n"),
  );
};

const insightLines = (insights: InsightEntity[]): string[] =>
  insights.length === 0
    ? ["- none"]
    : insights.slice(0, 40).map((insight) => {
        const source = insight.downloadLink
          ? `[${insight.sourceFile}](${insight.downloadLink})`
          : insight.sourceFile;
        const date = insight.date ? ` (${insight.date})` : "";
        return `- ${insight.fact}${date}; source: ${source}`;
      });

export const caseAnalysisPrompt = (
  marketData: MarketData,
  insights: InsightEntity[],
  request: ResearchRequest,
  language: string,
): string => {
  const marker = request.kind === "feature" ? "Case" : "Product";

  return [
    "You are a senior product analyst.",
    "",
    `Analyse how the companies below implement "${researchTarget(request)}".`,
    "",
    "RESEARCH PARAMETERS:",
    ...parameterLines(request),
    "",
    "COLLECTED MARKET DATA:",
    ...companyLines(marketData),
    "",
    "FACTS FROM REFERENCE DOCUMENTS:",
    ...insightLines(insights),
    "",
    "TASK:",
    "1. Produce at least 10 numbered cases, one per company or product.",
    `2. Start every case on its own line exactly as "**${marker} N: <company>**" with N counting from 1.`,
    "3. Under the heading give the lines Company:, Website: and Country:, then 4-5 sentences on the product and how it solves the task.",
    "4. Finish each case with its source links, one URL per line.",
    "",
    `Write the analysis in ${language}.`,
  ].join("\n");
};

const workingSources = (entry: CaseEntity): string[] =>
  entry.verifiedLinks
    ? entry.verifiedLinks
        .filter((link) => link.status === "working")
        .map((link) => link.url)
    : entry.links;

const caseSummary = (entry: CaseEntity): string =>
  [
    `${entry.number}. ${entry.title}`,
    entry.company ? `Company: ${entry.company}` : "",
    entry.website ? `Website: ${entry.website}` : "",
    entry.country ? `Country: ${entry.country}` : "",
    entry.description,
    ...workingSources(entry).map((url) => `Source: ${url}`),
  ]
    .filter(Boolean)
    .join("\n");

export const reportGenerationPrompt = (
  cases: CaseEntity[],
  insights: InsightEntity[],
  request: ResearchRequest,
  language: string,
): string =>
  [
    "You are a lead product researcher writing a decision-ready report.",
    "",
    "RESEARCH PARAMETERS:",
    ...parameterLines(request),
    "",
    "ANALYSED CASES:",
    ...(cases.length > 0 ? cases.map(caseSummary) : ["- none"]),
    "",
    "FACTS FROM REFERENCE DOCUMENTS:",
    ...insightLines(insights),
    "",
    "REPORT STRUCTURE (Markdown):",
    "1. Executive summary: conclusions first, then details.",
    "2. Overview table of all cases: company, country, key mechanics, source.",
    "3. Numbered cases: website, country, 4-5 sentences about the product, sources with publication dates.",
    "4. Applicability: how each finding maps to our product, segment and metrics.",
    "5. Implementation plan with priorities.",
    "6. Sources.",
    "",
    "RULES:",
    "- Use Markdown links [text](url) only for URLs listed above.",
    "- Cite reference-document facts with their document links.",
    "- Neutral business tone, short and to the point, no jargon.",
    "",
    `Write the report in ${language}.`,
  ].join("\n");

export const linkEnhancementPrompt = (
  reportPreview: string,
  candidates: LinkCandidate[],
): string =>
  [
    "You add relevant links to an existing report using verified sources.",
    "",
    "REPORT TO IMPROVE:",
    reportPreview,
    "",
    "VERIFIED LINKS:",
    JSON.stringify(candidates, null, 2),
    "",
    "TASK:",
    "1. Find mentions of companies, products or facts in the report.",
    "2. Attach relevant links from the verified list using the format [text](url).",
    "3. Do NOT change the structure or wording of the report; only add links.",
    "4. At most 3-5 links per paragraph.",
    "5. Priority: official websites > case studies > news.",
    "6. Return the FULL report with the links added; do not shorten it.",
  ].join("\n");
