/**
 * Shared type definitions for the workshop access system
 */

import { bytesToHex, parseFixedHex } from "../utils/hex.js";

export const TAG_UID_LENGTH = 7;

/**
 * 7-byte NFC tag identifier. Lowercase hex when used as a key or on the wire.
 */
export type TagUid = Uint8Array;

export function tagUidToHex(uid: TagUid): string {
  if (uid.length !== TAG_UID_LENGTH) {
    throw new RangeError(`Tag UID must be ${TAG_UID_LENGTH} bytes, got ${uid.length}`);
  }
  return bytesToHex(uid);
}

export function parseTagUid(hex: string): TagUid {
  return parseFixedHex(hex, TAG_UID_LENGTH, "Tag UID");
}

/**
 * Why a terminal-side operation failed. A backend refusal is not one of these:
 * it is reported as a rejection with a message.
 */
export type ErrorKind =
  | "Timeout"
  | "MalformedResponse"
  | "NtagFailed"
  | "Aborted"
  | "Unspecified";

export class TerminalError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "TerminalError";
  }
}

export const CHECKOUT_REASONS = [
  "uiRequested",
  "otherTagCheckedIn",
  "otherMachineCheckedIn",
  "timedOut",
  "selfCheckout",
] as const;

export type CheckoutReason = (typeof CHECKOUT_REASONS)[number];

/**
 * Source of "now" in epoch milliseconds. Injected so state machines are testable.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
