import { Command } from "commander";
import {
  createLlm,
  createResearchQueue,
  createRuntime,
} from "../application/bootstrap/runtimeFactory";
import { parseResearchRequest } from "../application/validation/researchRequestSchema";
import type {
  ResearchReportEntity,
  ResearchRequest,
} from "../core/entities/research";
import { LoggerProgressSink } from "../infra/progress/loggerProgressSink";
import { UuidIdGenerator } from "../infra/system/systemPorts";
import { configWarnings, env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import { parseReportQuery } from "./reportQuery";

type RequestOptions = {
  kind: string;
  product?: string;
  segment?: string;
  element?: string;
  benchmarks?: string;
  characteristics?: string;
  players?: string;
  countries?: string;
};

const withRequestOptions = (command: Command): Command =>
  command
    .requiredOption("--kind <kind>", "Research kind: feature or product")
    .option("--product <text>", "Description of our product")
    .option("--segment <text>", "Target customer segment")
    .option("--element <text>", "Feature under study (feature research)")
    .option("--benchmarks <text>", "Metrics to compare (feature research)")
    .option(
      "--characteristics <text>",
      "Product characteristics (product research)",
    )
    .option("--players <text>", "Companies that must be covered")
    .option("--countries <text>", "Countries that must be covered");

const requestFromOptions = (opts: RequestOptions): ResearchRequest => {
  const parsed = parseResearchRequest({
    kind: opts.kind,
    productDescription: opts.product,
    segment: opts.segment,
    researchElement: opts.element,
    benchmarks: opts.benchmarks,
    productCharacteristics: opts.characteristics,
    requiredPlayers: opts.players,
    requiredCountries: opts.countries,
  });

  if (parsed.isErr()) {
    throw new Error(`Invalid research request: ${parsed.error}`);
  }

  return parsed.value;
};

/**
 * Formats a stored report for the terminal.
 */
export const formatReport = (report: ResearchReportEntity): string =>
  [
    `#${report.id} ${report.title}`,
    `Created: ${report.createdAt.toISOString()}`,
    `Kind: ${report.kind}  Model: ${report.aiModel}`,
    `Processing: ${report.processingTimeSeconds.toFixed(1)}s  Tokens: ~${report.tokensUsed}`,
    "",
    report.content,
  ].join("\n");

export const buildCli = () => {
  const cli = new Command();
  cli
    .name("research-report-engine")
    .description("Staged research report generation");

  withRequestOptions(
    cli
      .command("enqueue")
      .description("Queue a research job for the worker")
      .option("--client-id <id>", "Progress channel id the client listens on"),
  ).action(async (opts: RequestOptions & { clientId?: string }) => {
    const request = requestFromOptions(opts);
    const ids = new UuidIdGenerator();
    const queue = createResearchQueue();
    const payload = {
      jobId: ids.next(),
      clientId: opts.clientId ?? ids.next(),
      request,
      requestedAt: new Date().toISOString(),
    };

    try {
      await queue.enqueue(payload);
    } finally {
      await queue.close();
    }

    logger.info(
      {
        jobId: payload.jobId,
        clientId: payload.clientId,
        kind: request.kind,
        progressUrl: `ws://localhost:${env.PROGRESS_WS_PORT}/ws/${payload.clientId}`,
      },
      "Enqueued research job",
    );
  });

  withRequestOptions(
    cli.command("run").description("Run the research pipeline in this process"),
  ).action(async (opts: RequestOptions) => {
    const request = requestFromOptions(opts);
    const runtime = createRuntime();

    try {
      const result = await runtime.researchService.processResearch(request, {
        progress: new LoggerProgressSink(),
      });

      if (!result.success) {
        logger.error(
          { stage: result.stage, error: result.error },
          "Research failed",
        );
        process.exitCode = 1;
        return;
      }

      console.log(result.report);
      logger.info({ reportId: result.reportId }, "Report saved");
    } finally {
      await runtime.close();
    }
  });

  cli
    .command("report")
    .description("Print a stored report, or list recent reports")
    .option("--id <id>", "Report id")
    .option("--limit <n>", "How many recent reports to list", "10")
    .action(async (opts: { id?: string; limit: string }) => {
      const query = parseReportQuery(opts);
      if (query.isErr()) {
        logger.error({ error: query.error }, "Invalid report query");
        process.exitCode = 1;
        return;
      }

      const runtime = createRuntime();

      try {
        if (query.value.kind === "byId") {
          const report = await runtime.reports.findById(query.value.id);
          if (!report) {
            logger.info({ id: query.value.id }, "No report found");
            return;
          }

          console.log(formatReport(report));
          return;
        }

        const reports = await runtime.reports.listRecent(query.value.limit);
        reports.forEach((report) => {
          console.log(
            `${report.id}\t${report.createdAt.toISOString()}\t${report.title}`,
          );
        });
      } finally {
        await runtime.close();
      }
    });

  cli
    .command("status")
    .description("Report configuration and queue backlog")
    .action(async () => {
      const queue = createResearchQueue();
      try {
        const queueCounts = await queue.getQueueCounts();
        logger.info(
          {
            model: env.HF_MODEL,
            inferenceUrl: env.HF_API_URL,
            tokenConfigured: env.HF_API_TOKEN.length > 0,
            dataDir: env.DATA_DIR,
            language: env.REPORT_LANGUAGE,
            redis: env.REDIS_URL,
            postgres: env.POSTGRES_URL,
            progressPort: env.PROGRESS_WS_PORT,
            queueCounts,
            warnings: configWarnings(env),
          },
          "Runtime status",
        );
      } finally {
        await queue.close();
      }
    });

  cli
    .command("probe")
    .description("Send a one-line prompt to the inference endpoint")
    .action(async () => {
      const startedAt = Date.now();
      const result = await createLlm().generate("Reply with OK only.", {
        temperature: 0.1,
        maxTokens: 16,
      });
      const durationMs = Date.now() - startedAt;

      if (result.isErr()) {
        logger.error(
          {
            model: env.HF_MODEL,
            durationMs,
            code: result.error.code,
            httpStatus: result.error.httpStatus,
            message: result.error.message,
          },
          "Inference probe failed",
        );
        process.exitCode = 1;
        return;
      }

      logger.info(
        {
          model: env.HF_MODEL,
          durationMs,
          bodyPreview: result.value.slice(0, 280),
        },
        "Inference probe succeeded",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
