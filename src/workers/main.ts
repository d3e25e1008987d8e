import { createRuntime } from "../application/bootstrap/runtimeFactory";
import { ConnectionRegistry } from "../infra/progress/connectionRegistry";
import { createProgressServer } from "../infra/progress/progressServer";
import { WebSocketProgressSink } from "../infra/progress/webSocketProgressSink";
import {
  createResearchWorker,
  redisConfigFromUrl,
} from "../infra/queue/bullMqQueue";
import { env } from "../shared/config/env";
import { logger, toErrorDetails } from "../shared/logger/logger";
import { createResearchJobHandler } from "./researchJobHandler";

const run = async (): Promise<void> => {
  const runtime = createRuntime();
  const registry = new ConnectionRegistry();
  const progressServer = createProgressServer(registry, env.PROGRESS_WS_PORT);
  const startedAtByJobId = new Map<string, number>();

  logger.info(
    {
      model: env.HF_MODEL,
      inferenceUrl: env.HF_API_URL,
      tokenConfigured: env.HF_API_TOKEN.length > 0,
      dataDir: env.DATA_DIR,
      progressPort: env.PROGRESS_WS_PORT,
      concurrency: env.QUEUE_CONCURRENCY_RESEARCH,
      redisUrl: env.REDIS_URL,
      postgresUrl: env.POSTGRES_URL,
    },
    "Worker runtime configuration",
  );

  const worker = createResearchWorker(
    redisConfigFromUrl(env.REDIS_URL),
    env.QUEUE_CONCURRENCY_RESEARCH,
    createResearchJobHandler({
      processor: runtime.researchService,
      progressFor: (clientId) =>
        new WebSocketProgressSink(registry, clientId, runtime.clock),
    }),
  );

  worker.on("active", (job) => {
    if (!job.id) {
      return;
    }

    startedAtByJobId.set(job.id, Date.now());
    logger.info(
      {
        jobId: job.id,
        clientId: job.data.clientId,
        kind: job.data.request.kind,
        requestedAt: job.data.requestedAt,
      },
      "Worker job started",
    );
  });

  worker.on("failed", (job, error) => {
    const startedAt = job?.id ? startedAtByJobId.get(job.id) : undefined;
    if (job?.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.error(
      {
        jobId: job?.id,
        clientId: job?.data.clientId,
        durationMs: startedAt ? Date.now() - startedAt : undefined,
        error: toErrorDetails(error),
      },
      "Worker job failed",
    );
  });

  worker.on("completed", (job) => {
    const startedAt = job.id ? startedAtByJobId.get(job.id) : undefined;
    if (job.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.info(
      {
        jobId: job.id,
        clientId: job.data.clientId,
        durationMs: startedAt ? Date.now() - startedAt : undefined,
      },
      "Worker job completed",
    );
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Worker shutting down");
    await worker.close();
    progressServer.close();
    await runtime.close();
    process.exit(0);
  };

  ["SIGINT", "SIGTERM"].forEach((signal) => {
    process.once(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
        process.exit(1);
      });
    });
  });

  logger.info("Worker online");
};

run().catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "Worker bootstrap failed");
  process.exit(1);
});
