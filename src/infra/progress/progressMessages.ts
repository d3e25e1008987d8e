import type { StageName, StageStatus } from "../../core/entities/research";
import type { CompletionUpdate } from "../../core/ports/outboundPorts";

export type StageUpdateMessage = {
  type: "stage_update";
  stage: StageName;
  status: StageStatus;
  progress: number;
  message: string;
  timestamp: string;
};

export type CompletionMessage = {
  type: "completion";
  success: boolean;
  reportId?: number;
  error?: string;
  message: string;
  timestamp: string;
};

export type ProgressMessage = StageUpdateMessage | CompletionMessage;

export const completionMessage = (
  update: CompletionUpdate,
  timestamp: Date,
): CompletionMessage =>
  update.success
    ? {
        type: "completion",
        success: true,
        reportId: update.reportId,
        message: update.message,
        timestamp: timestamp.toISOString(),
      }
    : {
        type: "completion",
        success: false,
        error: update.error,
        message: update.message,
        timestamp: timestamp.toISOString(),
      };
