import { describe, expect, it } from "vitest";
import { parseResearchRequest } from "./researchRequestSchema";

describe("parseResearchRequest", () => {
  it("fills missing free-text fields with empty strings", () => {
    const parsed = parseResearchRequest({
      kind: "feature",
      researchElement: "  instant payouts ",
      segment: "SMB lending",
    });

    expect(parsed.isOk()).toBe(true);
    expect(parsed.unwrapOr(null)).toEqual({
      kind: "feature",
      productDescription: "",
      segment: "SMB lending",
      requiredPlayers: "",
      requiredCountries: "",
      researchElement: "instant payouts",
      benchmarks: "",
    });
  });

  it("accepts product research with null fields", () => {
    const parsed = parseResearchRequest({
      kind: "product",
      productCharacteristics: "virtual cards",
      segment: null,
    });

    expect(parsed.unwrapOr(null)).toEqual({
      kind: "product",
      productDescription: "",
      segment: "",
      requiredPlayers: "",
      requiredCountries: "",
      productCharacteristics: "virtual cards",
    });
  });

  it("rejects an unknown research kind", () => {
    const parsed = parseResearchRequest({ kind: "survey" });

    expect(parsed.isErr()).toBe(true);
    if (parsed.isOk()) {
      throw new Error("expected validation error");
    }

    expect(parsed.error.startsWith("kind: ")).toBe(true);
  });
});
