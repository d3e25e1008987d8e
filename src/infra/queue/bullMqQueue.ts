import { Queue, type WorkerOptions, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import type {
  QueuePort,
  ResearchJobPayload,
} from "../../core/ports/outboundPorts";
import { RESEARCH_QUEUE } from "./queues";

export type QueueCounts = {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
  paused: number;
};

// Stage retries happen inside the pipeline; a job is never re-run as a whole.
export const defaultJobOptions = {
  attempts: 1,
  removeOnComplete: 250,
  removeOnFail: 500,
} as const;

export const redisConfigFromUrl = (url: string): RedisOptions => {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port || 6379),
    username: parsed.username || undefined,
    password: parsed.password || undefined,
  };
};

/**
 * Wraps BullMQ so application code depends on queue intent rather than queue vendor details.
 */
export class BullMqResearchQueue implements QueuePort {
  private readonly queue: Queue<ResearchJobPayload>;

  constructor(connection: RedisOptions) {
    this.queue = new Queue<ResearchJobPayload>(RESEARCH_QUEUE, {
      connection,
      defaultJobOptions,
    });
  }

  async enqueue(payload: ResearchJobPayload): Promise<void> {
    await this.queue.add(payload.request.kind, payload, {
      jobId: payload.jobId,
    });
  }

  async close(): Promise<void> {
    await this.queue.close();
  }

  async getQueueCounts(): Promise<QueueCounts> {
    const counts = await this.queue.getJobCounts(
      "waiting",
      "active",
      "completed",
      "failed",
      "delayed",
      "paused",
    );

    return {
      waiting: counts.waiting ?? 0,
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
      delayed: counts.delayed ?? 0,
      paused: counts.paused ?? 0,
    };
  }
}

export const createResearchWorker = (
  connection: RedisOptions,
  concurrency: number,
  processor: (payload: ResearchJobPayload) => Promise<void>,
) => {
  const options: WorkerOptions = {
    connection,
    concurrency,
  };

  return new Worker<ResearchJobPayload>(
    RESEARCH_QUEUE,
    async (job) => {
      await processor(job.data);
    },
    options,
  );
};
