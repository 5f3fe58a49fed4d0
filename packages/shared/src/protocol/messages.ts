/**
 * Envelopes exchanged between terminals and the backend, over WebSocket frames
 * or HTTP bodies. The same JSON is used for both.
 */

import { z } from "zod";

import type {
  AuthenticateNewSessionRequest,
  AuthenticateNewSessionResponse,
  CompleteAuthenticationRequest,
  CompleteAuthenticationResponse,
  StartSessionRequest,
  StartSessionResponse,
  UploadUsageRequest,
  UploadUsageResponse,
} from "./schemas.js";

export const TERMINAL_METHODS = [
  "startSession",
  "authenticateNewSession",
  "completeAuthentication",
  "uploadUsage",
] as const;

export type TerminalMethod = (typeof TERMINAL_METHODS)[number];

/**
 * Request and response payloads per method.
 */
export interface TerminalMethodMap {
  startSession: { request: StartSessionRequest; response: StartSessionResponse };
  authenticateNewSession: {
    request: AuthenticateNewSessionRequest;
    response: AuthenticateNewSessionResponse;
  };
  completeAuthentication: {
    request: CompleteAuthenticationRequest;
    response: CompleteAuthenticationResponse;
  };
  uploadUsage: { request: UploadUsageRequest; response: UploadUsageResponse };
}

export type BackendErrorCode =
  | "BAD_REQUEST"
  | "UNKNOWN_METHOD"
  | "UNAUTHORIZED"
  | "NOT_FOUND"
  | "INTERNAL_ERROR";

export const terminalRequestSchema = z.object({
  type: z.literal("terminal-request"),
  id: z.string().min(1),
  method: z.string().min(1),
  payload: z.unknown(),
});
export type TerminalRequestEnvelope = z.infer<typeof terminalRequestSchema>;

export const terminalResponseSchema = z.object({
  type: z.literal("terminal-response"),
  id: z.string().min(1),
  payload: z.unknown(),
});
export type TerminalResponseEnvelope = z.infer<typeof terminalResponseSchema>;

export const terminalErrorSchema = z.object({
  type: z.literal("terminal-error"),
  id: z.string(),
  error: z.object({
    code: z.string(),
    message: z.string(),
  }),
});
export type TerminalErrorEnvelope = z.infer<typeof terminalErrorSchema>;

export const backendMessageSchema = z.discriminatedUnion("type", [
  terminalResponseSchema,
  terminalErrorSchema,
]);
export type BackendMessage = z.infer<typeof backendMessageSchema>;

export function isTerminalMethod(value: string): value is TerminalMethod {
  return (TERMINAL_METHODS as readonly string[]).includes(value);
}
