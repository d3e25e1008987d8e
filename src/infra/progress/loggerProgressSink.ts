import type { StageName, StageStatus } from "../../core/entities/research";
import type {
  CompletionUpdate,
  ProgressSinkPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";

export class LoggerProgressSink implements ProgressSinkPort {
  async notify(
    stage: StageName,
    status: StageStatus,
    progress: number,
    message: string,
  ): Promise<void> {
    logger.info({ stage, status, progress }, message);
  }

  async complete(update: CompletionUpdate): Promise<void> {
    if (update.success) {
      logger.info({ reportId: update.reportId }, update.message);
      return;
    }

    logger.error({ error: update.error }, update.message);
  }
}
