import type {
  ResearchRequest,
  ResearchResult,
} from "../entities/research";
import type { ProgressSinkPort } from "./outboundPorts";

export type ProcessResearchOptions = {
  sessionId?: string;
  progress?: ProgressSinkPort;
};

/**
 * Single entry point the host application calls to produce and persist a report.
 */
export interface ResearchProcessorPort {
  processResearch(
    request: ResearchRequest,
    options?: ProcessResearchOptions,
  ): Promise<ResearchResult>;
}
