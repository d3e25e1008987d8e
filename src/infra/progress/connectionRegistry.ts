import { logger } from "../../shared/logger/logger";
import type { ProgressMessage } from "./progressMessages";

export interface ProgressChannel {
  send(payload: string): Promise<void>;
}

/**
 * Client id to channel map owned by the process that accepts connections.
 * All mutation happens on the event loop thread.
 */
export class ConnectionRegistry {
  private readonly channels = new Map<string, ProgressChannel>();

  register(clientId: string, channel: ProgressChannel): void {
    this.channels.set(clientId, channel);
    logger.debug({ clientId, connections: this.channels.size }, "Progress client connected");
  }

  /**
   * Ignores the call when a newer channel has already replaced `channel`.
   */
  unregister(clientId: string, channel: ProgressChannel): void {
    if (this.channels.get(clientId) !== channel) {
      return;
    }

    this.channels.delete(clientId);
    logger.debug({ clientId, connections: this.channels.size }, "Progress client disconnected");
  }

  has(clientId: string): boolean {
    return this.channels.has(clientId);
  }

  get size(): number {
    return this.channels.size;
  }

  /**
   * Resolves false when the client is not connected.
   */
  async send(clientId: string, message: ProgressMessage): Promise<boolean> {
    const channel = this.channels.get(clientId);
    if (!channel) {
      return false;
    }

    await channel.send(JSON.stringify(message));
    return true;
  }
}
