import { readFile } from "node:fs/promises";
import pdfParse from "pdf-parse";

/**
 * pdf-parse separates rendered pages with a blank line.
 */
export const readPdfPages = async (path: string): Promise<string[]> => {
  const data = await pdfParse(await readFile(path));
  return data.text.split("\n\n").map((page) => page.trim());
};
