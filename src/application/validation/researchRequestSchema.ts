import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { ResearchRequest } from "../../core/entities/research";

const text = z
  .string()
  .nullish()
  .transform((value) => value?.trim() ?? "");

const baseShape = {
  productDescription: text,
  segment: text,
  requiredPlayers: text,
  requiredCountries: text,
};

export const researchRequestSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("feature"),
    ...baseShape,
    researchElement: text,
    benchmarks: text,
  }),
  z.object({
    kind: z.literal("product"),
    ...baseShape,
    productCharacteristics: text,
  }),
]);

/**
 * Validates untrusted input (CLI flags, queue payloads) into a request.
 * Missing free-text fields become empty strings.
 */
export const parseResearchRequest = (
  input: unknown,
): Result<ResearchRequest, string> => {
  const parsed = researchRequestSchema.safeParse(input);
  if (!parsed.success) {
    return err(
      parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
        .join("; "),
    );
  }

  return ok(parsed.data);
};
