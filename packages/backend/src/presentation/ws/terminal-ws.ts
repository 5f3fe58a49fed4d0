/**
 * Terminal WebSocket Handler
 * Each text frame is a request envelope; the answer goes back on the same
 * socket. Requests on one socket are handled concurrently.
 */

import type { RawData } from "ws";

import { createLogger, toError, type BackendMessage } from "@workshop-access/shared";

import type { TerminalUseCase } from "../../usecase/terminal-usecase.js";

const logger = createLogger("backend:terminal-ws");

/**
 * The part of a `ws` socket the handler uses.
 */
export interface TerminalSocket {
  send(data: string): void;
  on(event: "message", listener: (data: RawData) => void): unknown;
  on(event: "close", listener: () => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
}

function decodeFrame(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString("utf8");
  }
  if (Buffer.isBuffer(data)) {
    return data.toString("utf8");
  }
  return Buffer.from(data).toString("utf8");
}

export function handleTerminalWebSocket(
  ws: TerminalSocket,
  terminalUseCase: TerminalUseCase,
  terminalId?: string,
): void {
  const log = logger.child({ terminalId });
  log.info("Terminal WebSocket connection established");

  const reply = (message: BackendMessage): void => {
    try {
      ws.send(JSON.stringify(message));
    } catch (error) {
      log.warn("Could not send reply", { requestId: message.id, error: toError(error).message });
    }
  };

  ws.on("message", (data) => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(decodeFrame(data));
    } catch {
      reply({ type: "terminal-error", id: "", error: { code: "BAD_REQUEST", message: "Invalid JSON" } });
      return;
    }

    terminalUseCase
      .handle(parsed, terminalId)
      .then(reply)
      .catch((error: unknown) => {
        log.error("Error handling message", toError(error));
      });
  });

  ws.on("close", () => {
    log.info("Terminal WebSocket connection closed");
  });

  ws.on("error", (err) => {
    log.error("WebSocket error", err);
  });
}
