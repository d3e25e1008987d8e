import type { CaseEntity } from "../../core/entities/research";
import {
  findUrls,
  matchLabel,
  normalizeLabelLine,
  valueAfterColon,
} from "./lineText";

const markerWords = ["Кейс", "Продукт", "Case", "Product"] as const;

const companyLabels = ["company:", "компания:"] as const;
const websiteLabels = ["website:", "сайт:"] as const;
const countryLabels = ["country:", "страна:"] as const;
const descriptionLabels = ["description:", "описание:"] as const;

/**
 * True when the line opens case `expected`, e.g. `**Кейс 3`, `Продукт 3` or `### Case 3:`.
 * A following digit rules the match out so `Case 1` does not open on `Case 12`.
 */
export const isCaseMarker = (line: string, expected: number): boolean => {
  const candidate = line.replace(/^#+\s*/, "");

  return markerWords.some((word) =>
    [`**${word} ${expected}`, `${word} ${expected}`].some((prefix) => {
      if (!candidate.startsWith(prefix)) {
        return false;
      }

      const next = candidate.charAt(prefix.length);
      return !/\d/.test(next);
    }),
  );
};

const appendDescription = (entry: CaseEntity, text: string): void => {
  entry.description = entry.description ? `${entry.description}\n${text}` : text;
};

const addLinks = (entry: CaseEntity, line: string): void => {
  for (const url of findUrls(line)) {
    if (!entry.links.includes(url)) {
      entry.links.push(url);
    }
  }
};

/**
 * Splits the analysis text into numbered cases. Lines after a marker belong
 * to that case until the next marker; text before the first marker is dropped.
 */
export const extractCases = (text: string): CaseEntity[] => {
  const cases: CaseEntity[] = [];
  let current: CaseEntity | undefined;
  let expected = 1;

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    if (isCaseMarker(line, expected)) {
      if (current) {
        cases.push(current);
      }

      current = {
        number: expected,
        title: line.replace(/^#+\s*/, "").replace(/\*/g, "").trim(),
        description: "",
        links: [],
      };
      addLinks(current, line);
      expected += 1;
      continue;
    }

    if (!current) {
      continue;
    }

    addLinks(current, line);
    const labelled = normalizeLabelLine(line);

    if (matchLabel(labelled, companyLabels)) {
      current.company = valueAfterColon(labelled);
    } else if (matchLabel(labelled, websiteLabels)) {
      current.website = valueAfterColon(labelled);
    } else if (matchLabel(labelled, countryLabels)) {
      current.country = valueAfterColon(labelled);
    } else if (matchLabel(labelled, descriptionLabels)) {
      appendDescription(current, valueAfterColon(labelled));
    } else {
      appendDescription(current, line);
    }
  }

  if (current) {
    cases.push(current);
  }

  return cases;
};
