import { readdir, readFile } from "node:fs/promises";
import { extname, join } from "node:path";
import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  DocumentSourcePort,
  SourceDocument,
} from "../../core/ports/outboundPorts";

export type PageReader = (path: string) => Promise<string[]>;

const textExtensions = new Set([".txt", ".md"]);

const readTextPage: PageReader = async (path) => [
  await readFile(path, "utf8"),
];

const readFailure = (message: string, cause: unknown): AppBoundaryError => ({
  source: "documents",
  code: "read_failed",
  provider: "local-files",
  message,
  retryable: false,
  cause,
});

/**
 * Reference documents from one flat directory: `.pdf` through the page reader,
 * `.txt` and `.md` as a single page.
 */
export class LocalDocumentSource implements DocumentSourcePort {
  constructor(
    private readonly directory: string,
    private readonly readPdfPages: PageReader,
  ) {}

  async listDocuments(): Promise<Result<SourceDocument[], AppBoundaryError>> {
    try {
      const entries = await readdir(this.directory, { withFileTypes: true });
      return ok(
        entries
          .filter((entry) => entry.isFile() && this.readerFor(entry.name))
          .map((entry) => ({
            path: join(this.directory, entry.name),
            fileName: entry.name,
          }))
          .sort((left, right) => left.fileName.localeCompare(right.fileName)),
      );
    } catch (error) {
      return err(
        readFailure(`Cannot list documents in ${this.directory}`, error),
      );
    }
  }

  async readPages(
    document: SourceDocument,
  ): Promise<Result<string[], AppBoundaryError>> {
    const reader = this.readerFor(document.fileName);
    if (!reader) {
      return err(
        readFailure(`Unsupported document type: ${document.fileName}`, null),
      );
    }

    try {
      return ok(await reader(document.path));
    } catch (error) {
      return err(readFailure(`Cannot read ${document.fileName}`, error));
    }
  }

  private readerFor(fileName: string): PageReader | undefined {
    const extension = extname(fileName).toLowerCase();
    if (extension === ".pdf") {
      return this.readPdfPages;
    }

    return textExtensions.has(extension) ? readTextPage : undefined;
  }
}
