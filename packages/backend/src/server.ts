/**
 * Backend Server
 * HTTP routes through hono and the terminal WebSocket on the same port
 */

import { Server, type IncomingMessage } from "node:http";

import { serve } from "@hono/node-server";
import { Hono } from "hono";
import { WebSocketServer } from "ws";

import { createLogger } from "@workshop-access/shared";

import type { Backend } from "./backend.js";
import { createTagRoutes } from "./presentation/rest/tag-routes.js";
import { createTerminalRoutes, isAuthorized } from "./presentation/rest/terminal-routes.js";
import { handleTerminalWebSocket } from "./presentation/ws/terminal-ws.js";

const logger = createLogger("backend:server");

export const TERMINAL_WS_PATH = "/ws/terminal";

export interface ServerOptions {
  port: number;
  host: string;
  terminalToken?: string;
}

export interface RunningServer {
  server: Server;
  wss: WebSocketServer;
  /** Port actually bound; differs from the option when it was 0 */
  port: number;
  stop: () => Promise<void>;
}

export function createApp(backend: Backend, options: { terminalToken?: string } = {}): Hono {
  const app = new Hono();

  app.route("/", createTerminalRoutes(backend.terminalUseCase, options));
  app.route("/", createTagRoutes(backend.tagVerificationService));

  app.get("/health", (c) => c.json({ status: "ok" }));

  app.get("/stats", (c) => c.json(backend.getStats()));

  return app;
}

function headerValue(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

export async function startServer(backend: Backend, options: ServerOptions): Promise<RunningServer> {
  const app = createApp(backend, { terminalToken: options.terminalToken });

  await backend.start();

  const listening = serve({ fetch: app.fetch, port: options.port, hostname: options.host });
  if (!(listening instanceof Server)) {
    throw new Error("Expected an HTTP/1.1 server");
  }
  const server = listening;

  await new Promise<void>((resolve, reject) => {
    if (server.listening) {
      resolve();
      return;
    }
    server.once("listening", () => resolve());
    server.once("error", reject);
  });

  const wss = new WebSocketServer({ server, path: TERMINAL_WS_PATH });
  wss.on("connection", (ws, req) => {
    if (!isAuthorized(headerValue(req, "authorization"), options.terminalToken)) {
      ws.close(1008, "Unauthorized");
      return;
    }
    handleTerminalWebSocket(ws, backend.terminalUseCase, headerValue(req, "x-terminal-id"));
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : options.port;
  logger.info("Backend listening", { host: options.host, port });

  const stop = async (): Promise<void> => {
    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => wss.close(() => resolve()));
    await new Promise<void>((resolve, reject) =>
      server.close((err) => (err ? reject(err) : resolve())),
    );
    await backend.stop();
  };

  return { server, wss, port, stop };
}
