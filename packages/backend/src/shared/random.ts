/**
 * Backend-local random helpers
 */

import { randomBytes } from "node:crypto";

import { toBase64Url } from "@workshop-access/shared";

export function generateRandomBase64Url(bytes: number): string {
  return toBase64Url(new Uint8Array(randomBytes(bytes)));
}

export function generateSessionId(): string {
  return `sess_${generateRandomBase64Url(18)}`;
}
