import type {
  CompanyEntity,
  MarketData,
  ResearchKind,
} from "../../core/entities/research";
import { matchLabel, normalizeLabelLine, valueAfterColon } from "./lineText";

const nameLabels = [
  "company:",
  "компания:",
  "name:",
  "название:",
  "product:",
  "продукт:",
] as const;
const websiteLabels = ["website:", "сайт:", "url:"] as const;
const countryLabels = ["country:", "страна:"] as const;
const characteristicsLabels = ["characteristics:", "характеристики:"] as const;

/**
 * Line-oriented company parser. A blank line closes the current record;
 * lines it does not recognise are ignored.
 */
export const extractCompanies = (text: string): CompanyEntity[] => {
  const companies: CompanyEntity[] = [];
  let current: CompanyEntity | null = null;

  const flush = () => {
    if (current) {
      companies.push(current);
      current = null;
    }
  };

  for (const rawLine of text.split("\n")) {
    const line = normalizeLabelLine(rawLine);
    if (!line) {
      flush();
      continue;
    }

    if (matchLabel(line, nameLabels)) {
      flush();
      current = { name: valueAfterColon(line) };
      continue;
    }

    if (!current) {
      continue;
    }

    const company: CompanyEntity = current;
    if (matchLabel(line, websiteLabels)) {
      company.website = valueAfterColon(line);
    } else if (matchLabel(line, countryLabels)) {
      company.country = valueAfterColon(line);
    } else if (matchLabel(line, characteristicsLabels)) {
      company.characteristics = valueAfterColon(line);
    } else if (line.startsWith("http")) {
      company.links = [...(company.links ?? []), line];
    }
  }

  flush();
  return companies;
};

export const parseMarketData = (
  content: string,
  kind: ResearchKind,
  collectedAt: Date,
): MarketData => {
  const companies = extractCompanies(content);
  return {
    rawContent: content,
    companies,
    kind,
    collectedAt,
    totalFound: companies.length,
  };
};
