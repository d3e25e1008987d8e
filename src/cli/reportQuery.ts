import { err, ok, type Result } from "neverthrow";
import { z } from "zod";

const positiveInt = z.coerce.number().int().positive();

export type ReportQuery =
  | { kind: "byId"; id: number }
  | { kind: "recent"; limit: number };

/**
 * Turns the `report` command's `--id` / `--limit` flags into a lookup.
 * `--id` wins when both are given.
 */
export const parseReportQuery = (opts: {
  id?: string;
  limit: string;
}): Result<ReportQuery, string> => {
  if (opts.id !== undefined) {
    const id = positiveInt.safeParse(opts.id);
    if (!id.success) {
      return err(`--id must be a positive integer, got "${opts.id}"`);
    }

    const query: ReportQuery = { kind: "byId", id: id.data };
    return ok(query);
  }

  const limit = positiveInt.safeParse(opts.limit);
  if (!limit.success) {
    return err(`--limit must be a positive integer, got "${opts.limit}"`);
  }

  const query: ReportQuery = { kind: "recent", limit: limit.data };
  return ok(query);
};
