/**
 * Terminal REST Routes
 * POST /terminal/request carries one request envelope per call; the answer
 * is the response or error envelope.
 */

import { timingSafeEqual } from "node:crypto";

import { Hono } from "hono";

import type { BackendErrorCode, BackendMessage } from "@workshop-access/shared";

import type { TerminalUseCase } from "../../usecase/terminal-usecase.js";

export interface TerminalRouteOptions {
  /** Bearer token terminals must present; unset disables the check */
  terminalToken?: string;
}

type ErrorStatus = 400 | 401 | 404 | 500;

export function statusFor(code: BackendErrorCode): ErrorStatus {
  switch (code) {
    case "BAD_REQUEST":
    case "UNKNOWN_METHOD":
      return 400;
    case "UNAUTHORIZED":
      return 401;
    case "NOT_FOUND":
      return 404;
    case "INTERNAL_ERROR":
      return 500;
  }
}

function isErrorCode(code: string): code is BackendErrorCode {
  return ["BAD_REQUEST", "UNKNOWN_METHOD", "UNAUTHORIZED", "NOT_FOUND", "INTERNAL_ERROR"].includes(code);
}

/**
 * True when no token is configured or the header carries it.
 */
export function isAuthorized(header: string | undefined, terminalToken?: string): boolean {
  if (!terminalToken) {
    return true;
  }
  const match = (header ?? "").match(/^Bearer\s+(.+)$/i);
  if (match === null) {
    return false;
  }
  const presented = Buffer.from(match[1], "utf8");
  const expected = Buffer.from(terminalToken, "utf8");
  return presented.length === expected.length && timingSafeEqual(presented, expected);
}

export function createTerminalRoutes(
  terminalUseCase: TerminalUseCase,
  options: TerminalRouteOptions = {},
): Hono {
  const app = new Hono();

  app.post("/terminal/request", async (c) => {
    if (!isAuthorized(c.req.header("authorization"), options.terminalToken)) {
      const unauthorized: BackendMessage = {
        type: "terminal-error",
        id: "",
        error: { code: "UNAUTHORIZED", message: "Missing or invalid Authorization header" },
      };
      return c.json(unauthorized, 401);
    }

    const body: unknown = await c.req.json().catch(() => null);
    if (body === null) {
      const invalid: BackendMessage = {
        type: "terminal-error",
        id: "",
        error: { code: "BAD_REQUEST", message: "Invalid request body" },
      };
      return c.json(invalid, 400);
    }

    const message = await terminalUseCase.handle(body, c.req.header("x-terminal-id"));
    if (message.type === "terminal-error" && isErrorCode(message.error.code)) {
      return c.json(message, statusFor(message.error.code));
    }
    return c.json(message, 200);
  });

  return app;
}
