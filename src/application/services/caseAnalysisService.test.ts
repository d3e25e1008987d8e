import { describe, expect, it } from "vitest";
import {
  llmFailure,
  MapLinkChecker,
  ScriptedLlm,
} from "../../__tests__/support/fakes";
import type { MarketData, ResearchRequest } from "../../core/entities/research";
import { CaseAnalysisService } from "./caseAnalysisService";
import { LinkVerificationService } from "./linkVerificationService";

const request: ResearchRequest = {
  kind: "feature",
  productDescription: "Lending app",
  segment: "SMB lending",
  researchElement: "instant payouts",
  benchmarks: "Payout time",
  requiredPlayers: "",
  requiredCountries: "",
};

const marketData: MarketData = {
  rawContent: "Company: Alpha Pay",
  companies: [{ name: "Alpha Pay", website: "https://alpha.test" }],
  kind: "feature",
  collectedAt: new Date("2026-03-02T09:00:00.000Z"),
  totalFound: 1,
};

const analysis = [
  "Overview of the market.",
  "**Case 1: Alpha Pay**",
  "Company: Alpha Pay",
  "Website: https://alpha.test",
  "Pays sellers within minutes.",
  "**Case 2: Beta Bank**",
  "Source: https://beta.test/news",
].join("\n");

const verification = () =>
  new LinkVerificationService(
    new MapLinkChecker({ "https://alpha.test": 200, "https://beta.test/news": 404 }),
    { selfHostedPrefix: "http://localhost:8000/data/", maxCaseLinks: 10 },
  );

describe("CaseAnalysisService", () => {
  it("parses numbered cases and verifies their links", async () => {
    const llm = new ScriptedLlm([analysis]);
    const service = new CaseAnalysisService(llm, verification(), "English");

    const result = await service.analyze(marketData, [], request, async () => {});

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(llm.calls[0]?.options).toEqual({ temperature: 0.5, maxTokens: 2048 });
    expect(llm.calls[0]?.prompt).toContain("1. Alpha Pay\n   Website: https://alpha.test");
    expect(result.value.map((entry) => entry.title)).toEqual([
      "Case 1: Alpha Pay",
      "Case 2: Beta Bank",
    ]);
    expect(result.value[0]?.company).toBe("Alpha Pay");
    expect(result.value[0]?.description).toBe("Pays sellers within minutes.");
    expect(result.value[0]?.brokenLinks).toEqual([]);
    expect(result.value[1]?.brokenLinks).toEqual(["https://beta.test/news"]);
  });

  it("propagates model failures to the stage runner", async () => {
    const service = new CaseAnalysisService(
      new ScriptedLlm([llmFailure()]),
      verification(),
      "English",
    );

    const result = await service.analyze(marketData, [], request, async () => {});

    expect(result.isErr()).toBe(true);
  });
});
