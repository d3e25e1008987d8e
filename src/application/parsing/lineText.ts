const listMarker = /^(?:[-*•]\s+|\d+[.)]\s+)/;
const urlPattern = /https?:\/\/[^\s<>"'`)\]]+/g;
const wrappedLabelLine = /^(\*\*|__)([^:*_]+:.*)\1$/;
const emphasizedLabel = /^(\*\*|__)([^:*_]+:)\1/;

/**
 * Drops list markers and the bold/underline emphasis around a leading label
 * (`**Company:** x` or `**Company: x**`) so label prefixes can be matched.
 * Emphasis characters inside values and URLs are kept.
 */
export const normalizeLabelLine = (line: string): string => {
  const unlisted = line.trim().replace(listMarker, "");
  const inner = wrappedLabelLine.exec(unlisted)?.[2] ?? unlisted;
  return inner.replace(emphasizedLabel, "$2").trim();
};

/**
 * Returns the matching label from `labels` when the line starts with it (case-insensitive).
 */
export const matchLabel = (
  line: string,
  labels: readonly string[],
): string | undefined => {
  const lowered = line.toLowerCase();
  return labels.find((label) => lowered.startsWith(label));
};

export const valueAfterColon = (line: string): string => {
  const index = line.indexOf(":");
  return index === -1 ? line : line.slice(index + 1).trim();
};

export const findUrls = (text: string): string[] =>
  Array.from(text.matchAll(urlPattern), (match) =>
    match[0].replace(/[.,;:!?]+$/, ""),
  );
