import type { StageName, StageStatus } from "../../core/entities/research";
import type {
  ClockPort,
  CompletionUpdate,
  ProgressSinkPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import type { ConnectionRegistry } from "./connectionRegistry";
import { completionMessage } from "./progressMessages";

/**
 * Delivers one run's progress to a single client through the registry.
 */
export class WebSocketProgressSink implements ProgressSinkPort {
  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly clientId: string,
    private readonly clock: ClockPort,
  ) {}

  async notify(
    stage: StageName,
    status: StageStatus,
    progress: number,
    message: string,
  ): Promise<void> {
    const delivered = await this.registry.send(this.clientId, {
      type: "stage_update",
      stage,
      status,
      progress,
      message,
      timestamp: this.clock.now().toISOString(),
    });

    if (!delivered) {
      logger.debug({ clientId: this.clientId, stage }, "Progress client not connected");
    }
  }

  async complete(update: CompletionUpdate): Promise<void> {
    await this.registry.send(
      this.clientId,
      completionMessage(update, this.clock.now()),
    );
  }
}
