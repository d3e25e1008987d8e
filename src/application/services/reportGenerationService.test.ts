import { describe, expect, it } from "vitest";
import {
  MapLinkChecker,
  ScriptedLlm,
} from "../../__tests__/support/fakes";
import type { CaseEntity, ResearchRequest } from "../../core/entities/research";
import { LinkEnhancementService } from "./linkEnhancementService";
import { LinkVerificationService } from "./linkVerificationService";
import { ReportGenerationService } from "./reportGenerationService";

const request: ResearchRequest = {
  kind: "product",
  productDescription: "Card issuing platform",
  segment: "Freelancers",
  productCharacteristics: "virtual cards",
  requiredPlayers: "",
  requiredCountries: "",
};

const cases: CaseEntity[] = [
  {
    number: 1,
    title: "Product 1: Alpha",
    description: "Issues virtual cards in seconds.",
    links: ["https://alpha.test"],
    verifiedLinks: [{ url: "https://alpha.test", status: "working", httpStatus: 200 }],
    brokenLinks: [],
  },
];

const build = (replies: string[]) => {
  const llm = new ScriptedLlm(replies);
  const verification = new LinkVerificationService(
    new MapLinkChecker({ "https://alpha.test": 200, "https://gone.test": 404 }),
    { selfHostedPrefix: "http://localhost:8000/data/", maxCaseLinks: 10 },
  );
  return {
    llm,
    service: new ReportGenerationService(
      llm,
      new LinkEnhancementService(llm),
      verification,
      "English",
    ),
  };
};

describe("ReportGenerationService", () => {
  it("drafts, enhances, verifies and cleans the report", async () => {
    const { llm, service } = build([
      "\n\n# Virtual cards\n\n\n\nAlpha leads.",
      "# Virtual cards\n\n[Alpha](https://alpha.test) leads. See [old](https://gone.test).",
    ]);

    const result = await service.generate(cases, [], request, async () => {});

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }

    expect(llm.calls.map((call) => call.options.temperature)).toEqual([0.3, 0.3]);
    expect(llm.calls[1]?.prompt).toContain("# Virtual cards\n\nAlpha leads.");
    expect(result.value.linkSummary).toEqual({
      total: 2,
      working: 1,
      broken: 1,
      workingPercentage: 50,
    });
    expect(result.value.content).toBe(
      [
        "# Virtual cards",
        "",
        "[Alpha](https://alpha.test) leads. See .",
        "",
        "## Link verification summary",
        "",
        "- **Links checked:** 2",
        "- **Working links:** 1",
        "- **Broken links:** 1",
        "- **Working share:** 50.0%",
        "",
        "*Every link was checked for availability.*",
      ].join("\n"),
    );
  });

  it("fails the attempt when the model returns an empty report", async () => {
    const { service } = build(["  \n\n  "]);

    const result = await service.generate(cases, [], request, async () => {});

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected empty report failure");
    }

    expect(result.error.code).toBe("malformed_response");
  });
});
