import { parseResearchRequest } from "../application/validation/researchRequestSchema";
import type { ResearchProcessorPort } from "../core/ports/inboundPorts";
import type {
  ProgressSinkPort,
  ResearchJobPayload,
} from "../core/ports/outboundPorts";

/**
 * Job data as it comes back from Redis: the request has not been validated yet.
 */
export type IncomingResearchJob = Omit<ResearchJobPayload, "request"> & {
  request: unknown;
};

export type ResearchJobHandlerDeps = {
  processor: ResearchProcessorPort;
  progressFor: (clientId: string) => ProgressSinkPort;
};

/**
 * Builds the queue processor. A rejected payload still sends the client a
 * failed completion before the job fails.
 */
export const createResearchJobHandler =
  ({ processor, progressFor }: ResearchJobHandlerDeps) =>
  async (job: IncomingResearchJob): Promise<void> => {
    const progress = progressFor(job.clientId);
    const request = parseResearchRequest(job.request);
    if (request.isErr()) {
      const error = `Invalid research request: ${request.error}`;
      await progress.complete({
        success: false,
        error,
        message: "Research request rejected",
      });
      throw new Error(error);
    }

    const result = await processor.processResearch(request.value, {
      sessionId: job.jobId,
      progress,
    });

    if (!result.success) {
      throw new Error(result.error);
    }
  };
