/**
 * Terminal Use Case
 * Decodes terminal request envelopes, dispatches them to the services and
 * wraps the outcome in a response or error envelope.
 */

import type { z } from "zod";

import {
  authenticateNewSessionRequestSchema,
  completeAuthenticationRequestSchema,
  createLogger,
  isTerminalMethod,
  startSessionRequestSchema,
  terminalRequestSchema,
  toError,
  uploadUsageRequestSchema,
  type BackendErrorCode,
  type BackendMessage,
  type TerminalMethod,
  type TerminalRequestEnvelope,
} from "@workshop-access/shared";

import type { SessionService } from "../service/session-service.js";
import type { UsageService } from "../service/usage-service.js";
import { BackendError } from "../shared/errors.js";

const logger = createLogger("backend:terminal-usecase");

function errorEnvelope(id: string, code: BackendErrorCode, message: string): BackendMessage {
  return { type: "terminal-error", id, error: { code, message } };
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function requestIdOf(raw: unknown): string {
  if (typeof raw === "object" && raw !== null && "id" in raw && typeof raw.id === "string") {
    return raw.id;
  }
  return "";
}

export class TerminalUseCase {
  constructor(
    private sessionService: SessionService,
    private usageService: UsageService,
  ) {}

  /**
   * Handle one decoded JSON envelope. Never rejects.
   */
  async handle(raw: unknown, terminalId?: string): Promise<BackendMessage> {
    const envelope = terminalRequestSchema.safeParse(raw);
    if (!envelope.success) {
      return errorEnvelope(requestIdOf(raw), "BAD_REQUEST", describeIssues(envelope.error));
    }
    const request = envelope.data;
    const log = logger.child({ requestId: request.id, method: request.method, terminalId });

    if (!isTerminalMethod(request.method)) {
      log.warn("Unknown method");
      return errorEnvelope(request.id, "UNKNOWN_METHOD", `Unknown method: ${request.method}`);
    }

    try {
      const payload = this.dispatch(request.method, request);
      log.debug("Request handled");
      return { type: "terminal-response", id: request.id, payload };
    } catch (error) {
      if (error instanceof BackendError) {
        log.info("Request refused", { code: error.code, reason: error.message });
        return errorEnvelope(request.id, error.code, error.message);
      }
      const err = toError(error);
      log.error("Request failed", err);
      return errorEnvelope(request.id, "INTERNAL_ERROR", err.message);
    }
  }

  private dispatch(method: TerminalMethod, request: TerminalRequestEnvelope): unknown {
    switch (method) {
      case "startSession":
        return this.sessionService.startSession(parsePayload(startSessionRequestSchema, request));
      case "authenticateNewSession":
        return this.sessionService.authenticateNewSession(
          parsePayload(authenticateNewSessionRequestSchema, request),
        );
      case "completeAuthentication":
        return this.sessionService.completeAuthentication(
          parsePayload(completeAuthenticationRequestSchema, request),
        );
      case "uploadUsage":
        return this.usageService.upload(parsePayload(uploadUsageRequestSchema, request));
    }
  }
}

function parsePayload<S extends z.ZodTypeAny>(schema: S, request: TerminalRequestEnvelope): z.output<S> {
  const result = schema.safeParse(request.payload);
  if (!result.success) {
    throw new BackendError(
      "BAD_REQUEST",
      `Invalid ${request.method} payload: ${describeIssues(result.error)}`,
    );
  }
  return result.data;
}
