import { describe, expect, it } from "vitest";
import { fixedClock, RecordingSink } from "../../__tests__/support/fakes";
import type { StageName } from "../../core/entities/research";
import type { ProgressSinkPort } from "../../core/ports/outboundPorts";
import { ProgressReporter } from "./progressReporter";

const stageState = (reporter: ProgressReporter, stage: StageName) =>
  reporter.snapshot().find((state) => state.stage === stage);

describe("ProgressReporter", () => {
  it("starts every stage as pending", () => {
    const reporter = new ProgressReporter(new RecordingSink(), fixedClock());

    expect(reporter.snapshot().map((state) => state.status)).toEqual([
      "pending",
      "pending",
      "pending",
      "pending",
    ]);
  });

  it("never lets active progress move backwards within a stage", async () => {
    const sink = new RecordingSink();
    const reporter = new ProgressReporter(sink, fixedClock());
    const progress = reporter.forStage("local_documents");

    await progress(40, "Reading file 2/3");
    await progress(25, "Reading file 1/3");
    await progress(55, "Sending excerpts");

    expect(sink.events.map((event) => event.progress)).toEqual([40, 40, 55]);
    expect(stageState(reporter, "local_documents")?.message).toBe("Sending excerpts");
  });

  it("pins completed to 100 and error to 0", async () => {
    const sink = new RecordingSink();
    const reporter = new ProgressReporter(sink, fixedClock());

    await reporter.update("case_analysis", "active", 70, "Parsing");
    await reporter.update("case_analysis", "completed", 12, "Done");
    await reporter.update("report_generation", "error", 90, "Failed");

    expect(sink.events.map((event) => event.progress)).toEqual([70, 100, 0]);
    expect(stageState(reporter, "case_analysis")?.status).toBe("completed");
  });

  it("keeps running when the sink rejects", async () => {
    const sink: ProgressSinkPort = {
      notify: async () => {
        throw new Error("socket closed");
      },
      complete: async () => {
        throw new Error("socket closed");
      },
    };
    const reporter = new ProgressReporter(sink, fixedClock());

    await reporter.update("data_collection", "active", 10, "Starting");
    await reporter.complete({ success: true, reportId: 1, message: "done" });

    expect(stageState(reporter, "data_collection")?.progress).toBe(10);
  });
});
