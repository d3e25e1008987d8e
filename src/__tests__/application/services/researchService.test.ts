import { ok } from "neverthrow";
import { describe, expect, it } from "vitest";
import { CaseAnalysisService } from "../../../application/services/caseAnalysisService";
import { LinkEnhancementService } from "../../../application/services/linkEnhancementService";
import { LinkVerificationService } from "../../../application/services/linkVerificationService";
import { LocalInsightsService } from "../../../application/services/localInsightsService";
import { MarketDataService } from "../../../application/services/marketDataService";
import { ReportGenerationService } from "../../../application/services/reportGenerationService";
import { ResearchPipelineService } from "../../../application/services/researchPipelineService";
import {
  estimateTokens,
  reportTitle,
  ResearchService,
} from "../../../application/services/researchService";
import { parseResearchRequest } from "../../../application/validation/researchRequestSchema";
import type {
  NewResearchReport,
  ResearchReportEntity,
  ResearchRequest,
} from "../../../core/entities/research";
import type {
  DocumentSourcePort,
  LlmPort,
  ReportRepositoryPort,
} from "../../../core/ports/outboundPorts";
import {
  fixedClock,
  llmFailure,
  MapLinkChecker,
  RecordingSink,
  recordingSleep,
  ScriptedLlm,
} from "../../support/fakes";

class InMemoryReportRepository implements ReportRepositoryPort {
  readonly saved: NewResearchReport[] = [];

  constructor(private readonly failWith?: Error) {}

  async save(report: NewResearchReport): Promise<number> {
    if (this.failWith) {
      throw this.failWith;
    }

    this.saved.push(report);
    return this.saved.length;
  }

  async findById(id: number): Promise<ResearchReportEntity | null> {
    const report = this.saved[id - 1];
    return report ? { id, ...report } : null;
  }

  async listRecent(limit: number): Promise<ResearchReportEntity[]> {
    return this.saved
      .map((report, index) => ({ id: index + 1, ...report }))
      .reverse()
      .slice(0, limit);
  }
}

const documents: DocumentSourcePort = {
  listDocuments: async () =>
    ok([{ path: "/docs/payouts.txt", fileName: "payouts.txt" }]),
  readPages: async () => ok(["Instant payouts reduce churn by 12%."]),
};

const replyTo = (prompt: string): string => {
  if (prompt.startsWith("You are an expert in fintech market research")) {
    return [
      "Company: Alpha Pay",
      "Website: https://alpha.test",
      "Country: Brazil",
      "",
      "Company: Beta Bank",
      "Website: https://beta.test",
    ].join("\n");
  }

  if (prompt.startsWith("You extract verifiable facts")) {
    return JSON.stringify([
      { source_file: "payouts.txt", fact: "Instant payouts reduce churn by 12%." },
    ]);
  }

  if (prompt.startsWith("You are a senior product analyst")) {
    return [
      "**Case 1: Alpha Pay**",
      "Website: https://alpha.test",
      "Pays SMB borrowers within minutes.",
      "**Case 2: Beta Bank**",
      "https://dead.test",
    ].join("\n");
  }

  if (prompt.startsWith("You are a lead product researcher")) {
    return "# Instant payouts\n\nAlpha Pay [site](https://alpha.test) and [dead](https://dead.test).";
  }

  return "# Instant payouts\n\nAlpha Pay [site](https://alpha.test) and [dead](https://dead.test).\n\nSee [Alpha Pay](https://alpha.test).";
};

const buildService = (
  llm: LlmPort,
  repository: ReportRepositoryPort,
  sleep: (ms: number) => Promise<void>,
) => {
  const clock = fixedClock();
  const verification = new LinkVerificationService(
    new MapLinkChecker({ "https://alpha.test": 200, "https://dead.test": 404 }),
    { selfHostedPrefix: "http://localhost:8000/data/", maxCaseLinks: 10 },
  );
  const pipeline = new ResearchPipelineService(
    {
      marketData: new MarketDataService(llm, clock, "English"),
      localInsights: new LocalInsightsService(llm, documents, {
        documentsBaseUrl: "http://localhost:8000/data/",
        maxExcerptChars: 20_000,
      }),
      caseAnalysis: new CaseAnalysisService(llm, verification, "English"),
      reportGeneration: new ReportGenerationService(
        llm,
        new LinkEnhancementService(llm),
        verification,
        "English",
      ),
    },
    clock,
    { maxAttempts: 3, sleep },
  );

  return new ResearchService(
    pipeline,
    repository,
    clock,
    { next: () => "session-1" },
    "acme/text-model",
  );
};

const featureRequest = (): ResearchRequest =>
  parseResearchRequest({
    kind: "feature",
    researchElement: "instant payouts",
    segment: "SMB lending",
  })._unsafeUnwrap();

describe("ResearchService", () => {
  it("produces, verifies and stores a report when every stage succeeds", async () => {
    const llm = new ScriptedLlm([replyTo]);
    const repository = new InMemoryReportRepository();
    const sink = new RecordingSink();
    const { sleep, waits } = recordingSleep();
    const service = buildService(llm, repository, sleep);

    const result = await service.processResearch(featureRequest(), {
      progress: sink,
    });

    expect(result.success).toBe(true);
    if (!result.success) {
      throw new Error(result.error);
    }

    expect(result.reportId).toBe(1);
    expect(waits).toEqual([]);
    expect(llm.calls).toHaveLength(5);
    expect(
      result.report.startsWith(
        "# Instant payouts\n\nAlpha Pay [site](https://alpha.test) and .\n\nSee [Alpha Pay](https://alpha.test).\n\n## Link verification summary",
      ),
    ).toBe(true);
    expect(result.report).toContain("- **Working share:** 66.7%");
    expect(result.stages.map((stage) => [stage.status, stage.progress])).toEqual([
      ["completed", 100],
      ["completed", 100],
      ["completed", 100],
      ["completed", 100],
    ]);

    const [saved] = repository.saved;
    expect(saved?.title).toBe("Feature research: instant payouts");
    expect(saved?.sessionId).toBe("session-1");
    expect(saved?.aiModel).toBe("acme/text-model");
    expect(saved?.segment).toBe("SMB lending");
    expect(saved?.processingTimeSeconds).toBe(0);
    expect(saved?.tokensUsed).toBe(estimateTokens(result.report));
    expect(sink.completions).toEqual([
      { success: true, reportId: 1, message: "Research report is ready" },
    ]);
  });

  it("feeds document insights with download links into the report prompt", async () => {
    const llm = new ScriptedLlm([replyTo]);
    const service = buildService(llm, new InMemoryReportRepository(), async () => {});

    await service.processResearch(featureRequest());

    const reportPrompt = llm.calls.find((call) =>
      call.prompt.startsWith("You are a lead product researcher"),
    );
    expect(reportPrompt?.prompt).toContain(
      "- Instant payouts reduce churn by 12%.; source: [payouts.txt](http://localhost:8000/data/payouts.txt)",
    );
  });

  it("returns a failure when data collection exhausts its retries", async () => {
    const llm = new ScriptedLlm([llmFailure()]);
    const repository = new InMemoryReportRepository();
    const sink = new RecordingSink();
    const { sleep, waits } = recordingSleep();
    const service = buildService(llm, repository, sleep);

    const result = await service.processResearch(featureRequest(), {
      progress: sink,
    });

    expect(result.success).toBe(false);
    if (result.success) {
      throw new Error("expected failure");
    }

    expect(result.error).toBe("fake-llm: upstream unavailable");
    expect(result.stage).toBe("data_collection");
    expect(llm.calls).toHaveLength(3);
    expect(waits).toEqual([2_000, 4_000]);
    expect(repository.saved).toEqual([]);
    expect(sink.statuses("data_collection").at(-1)).toBe("error");
    expect(sink.statuses("local_documents")).toEqual([]);
    expect(result.stages.map((stage) => stage.status)).toEqual([
      "error",
      "pending",
      "pending",
      "pending",
    ]);
    expect(sink.completions).toEqual([
      {
        success: false,
        error: "fake-llm: upstream unavailable",
        message: "Research failed during data_collection",
      },
    ]);
  });

  it("reports storage failures as values", async () => {
    const service = buildService(
      new ScriptedLlm([replyTo]),
      new InMemoryReportRepository(new Error("database unavailable")),
      async () => {},
    );

    const result = await service.processResearch(featureRequest());

    expect(result).toMatchObject({
      success: false,
      error: "Failed to save report: database unavailable",
    });
  });
});

describe("report metadata", () => {
  it("truncates long titles with an ellipsis", () => {
    const title = reportTitle({
      kind: "feature",
      productDescription: "",
      segment: "",
      researchElement: "a".repeat(40),
      benchmarks: "",
      requiredPlayers: "",
      requiredCountries: "",
    });

    expect(title).toBe(`Feature research: ${"a".repeat(32)}...`);
  });

  it("estimates tokens from the word count", () => {
    expect(estimateTokens("one two  three\nfour")).toBe(5);
  });
});
