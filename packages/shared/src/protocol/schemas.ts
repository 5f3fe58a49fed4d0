/**
 * Wire schemas for terminal ↔ backend traffic.
 * Bytes are lowercase hex strings; times are epoch milliseconds unless named otherwise.
 */

import { z } from "zod";

import { CHECKOUT_REASONS } from "../types/index.js";

export function hexBytes(length: number) {
  return z
    .string()
    .regex(new RegExp(`^[0-9a-fA-F]{${length * 2}}$`), `expected ${length} bytes of hex`)
    .transform((s) => s.toLowerCase());
}

export const tokenSessionRecordSchema = z.object({
  tagUid: hexBytes(7),
  sessionId: z.string().min(1),
  expirationUnixSeconds: z.number().int().nonnegative(),
  userId: z.string().min(1),
  userLabel: z.string(),
  permissions: z.array(z.string()),
});
export type TokenSessionRecord = z.infer<typeof tokenSessionRecordSchema>;

export const startSessionRequestSchema = z.object({
  tagUid: hexBytes(7),
});
export type StartSessionRequest = z.infer<typeof startSessionRequestSchema>;

export const startSessionResponseSchema = z.object({
  result: z.discriminatedUnion("type", [
    z.object({ type: z.literal("existingSession"), session: tokenSessionRecordSchema }),
    z.object({ type: z.literal("authRequired") }),
    z.object({ type: z.literal("rejected"), message: z.string() }),
  ]),
});
export type StartSessionResponse = z.infer<typeof startSessionResponseSchema>;

export const authenticateNewSessionRequestSchema = z.object({
  tagUid: hexBytes(7),
  tagChallenge: hexBytes(16),
});
export type AuthenticateNewSessionRequest = z.infer<typeof authenticateNewSessionRequestSchema>;

export const authenticateNewSessionResponseSchema = z.object({
  sessionId: z.string().min(1),
  cloudChallenge: hexBytes(32),
});
export type AuthenticateNewSessionResponse = z.infer<typeof authenticateNewSessionResponseSchema>;

export const completeAuthenticationRequestSchema = z.object({
  sessionId: z.string().min(1),
  encryptedTagResponse: hexBytes(32),
});
export type CompleteAuthenticationRequest = z.infer<typeof completeAuthenticationRequestSchema>;

export const completeAuthenticationResponseSchema = z.object({
  result: z.discriminatedUnion("type", [
    z.object({ type: z.literal("newSession"), session: tokenSessionRecordSchema }),
    z.object({ type: z.literal("rejected"), message: z.string() }),
  ]),
});
export type CompleteAuthenticationResponse = z.infer<typeof completeAuthenticationResponseSchema>;

const checkoutReasonSchema = z.enum(CHECKOUT_REASONS);

export const usageHistoryRecordSchema = z.object({
  machineId: z.string().min(1),
  tagUid: hexBytes(7),
  sessionId: z.string().min(1),
  userId: z.string().min(1),
  checkInTime: z.number().int().nonnegative(),
  checkOutTime: z.number().int().nonnegative().optional(),
  checkoutReason: checkoutReasonSchema.optional(),
});
export type UsageHistoryRecord = z.infer<typeof usageHistoryRecordSchema>;

export const usageHistorySchema = z.object({
  machineId: z.string().min(1),
  records: z.array(usageHistoryRecordSchema),
});
export type UsageHistory = z.infer<typeof usageHistorySchema>;

export const uploadUsageRequestSchema = z.object({
  history: usageHistorySchema,
});
export type UploadUsageRequest = z.infer<typeof uploadUsageRequestSchema>;

export const uploadUsageResponseSchema = z.object({
  accepted: z.number().int().nonnegative(),
});
export type UploadUsageResponse = z.infer<typeof uploadUsageResponseSchema>;

/** A tag tap read from its SUN URL: encrypted PICC data and the truncated MAC */
export const verifyTagRequestSchema = z.object({
  picc: hexBytes(16),
  cmac: hexBytes(8),
});
export type VerifyTagRequest = z.infer<typeof verifyTagRequestSchema>;

export const verifyTagResponseSchema = z.object({
  tagUid: hexBytes(7),
  userId: z.string().min(1),
  userLabel: z.string(),
  readCounter: z.number().int().nonnegative(),
});
export type VerifyTagResponse = z.infer<typeof verifyTagResponseSchema>;
