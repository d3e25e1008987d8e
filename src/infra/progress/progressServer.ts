import type { IncomingMessage } from "node:http";
import { WebSocket, WebSocketServer } from "ws";
import { logger, toErrorDetails } from "../../shared/logger/logger";
import type { ConnectionRegistry, ProgressChannel } from "./connectionRegistry";

const clientPath = /^\/ws\/([A-Za-z0-9_-]+)\/?$/;

/**
 * Extracts the client id from `/ws/<clientId>`.
 */
export const clientIdFromPath = (url: string | undefined): string | null => {
  const path = (url ?? "").split("?")[0] ?? "";
  return clientPath.exec(path)?.[1] ?? null;
};

const socketChannel = (socket: WebSocket): ProgressChannel => ({
  send: (payload) =>
    new Promise<void>((resolve, reject) => {
      if (socket.readyState !== WebSocket.OPEN) {
        reject(new Error("Progress socket is not open"));
        return;
      }

      socket.send(payload, (error) => {
        if (error) {
          reject(error);
          return;
        }

        resolve();
      });
    }),
});

export const createProgressServer = (
  registry: ConnectionRegistry,
  port: number,
): WebSocketServer => {
  const server = new WebSocketServer({ port });

  server.on("connection", (socket: WebSocket, request: IncomingMessage) => {
    const clientId = clientIdFromPath(request.url);
    if (!clientId) {
      socket.close(1008, "Expected /ws/<clientId>");
      return;
    }

    const channel = socketChannel(socket);
    registry.register(clientId, channel);

    socket.on("close", () => registry.unregister(clientId, channel));
    socket.on("error", (error) => {
      logger.warn({ clientId, error: toErrorDetails(error) }, "Progress socket error");
    });
  });

  server.on("listening", () => {
    logger.info({ port }, "Progress server listening");
  });

  return server;
};
