/**
 * Unit tests for TagVerificationService
 */

import { describe, it, expect, beforeEach } from "vitest";

import { aesCbcEncrypt, bytesToHex, parseHexToBytes } from "@workshop-access/shared";

import type { Backend } from "../src/backend.js";
import { BackendError } from "../src/shared/errors.js";
import {
  ADA_TAG,
  BOB_TAG,
  createTestBackend,
  DEACTIVATED_TAG,
  SDM_META_READ_KEY_HEX,
  tapMessage,
  UNKNOWN_TAG,
} from "./helpers/backend-fixture.js";

function refusal(call: () => unknown): { code: string; message: string } {
  try {
    call();
  } catch (error) {
    if (error instanceof BackendError) {
      return { code: error.code, message: error.message };
    }
    throw error;
  }
  throw new Error("Expected a refusal");
}

describe("TagVerificationService", () => {
  let backend: Backend;

  beforeEach(() => {
    ({ backend } = createTestBackend());
  });

  it("should name the owner of a tapped tag", () => {
    const result = backend.tagVerificationService.verify(tapMessage(ADA_TAG, 5));

    expect(result).toEqual({ tagUid: ADA_TAG, userId: "user-ada", userLabel: "Ada Example", readCounter: 5 });
  });

  it("should refuse a read counter that was already used", () => {
    backend.tagVerificationService.verify(tapMessage(ADA_TAG, 5));

    expect(refusal(() => backend.tagVerificationService.verify(tapMessage(ADA_TAG, 5)))).toEqual({
      code: "UNAUTHORIZED",
      message: "Read counter 5 was already used",
    });
    expect(refusal(() => backend.tagVerificationService.verify(tapMessage(ADA_TAG, 4)))).toEqual({
      code: "UNAUTHORIZED",
      message: "Read counter 4 was already used",
    });
    expect(backend.tagVerificationService.verify(tapMessage(ADA_TAG, 6)).readCounter).toBe(6);
  });

  it("should track read counters per tag", () => {
    backend.tagVerificationService.verify(tapMessage(ADA_TAG, 9));

    expect(backend.tagVerificationService.verify(tapMessage(BOB_TAG, 1)).userId).toBe("user-bob");
  });

  it("should refuse a MAC made with another tag's key", () => {
    const ada = tapMessage(ADA_TAG, 3);
    const bob = tapMessage(BOB_TAG, 3);

    expect(refusal(() => backend.tagVerificationService.verify({ picc: ada.picc, cmac: bob.cmac }))).toEqual({
      code: "UNAUTHORIZED",
      message: "Invalid SDM MAC",
    });
  });

  it("should not let a forged tap consume the read counter", () => {
    const tap = tapMessage(ADA_TAG, 3);
    refusal(() => backend.tagVerificationService.verify({ picc: tap.picc, cmac: "00".repeat(8) }));

    expect(backend.tagVerificationService.verify(tap).readCounter).toBe(3);
  });

  it("should refuse unknown and deactivated tokens", () => {
    expect(refusal(() => backend.tagVerificationService.verify(tapMessage(UNKNOWN_TAG, 1)))).toEqual({
      code: "NOT_FOUND",
      message: `Token ${UNKNOWN_TAG} is not registered`,
    });
    expect(refusal(() => backend.tagVerificationService.verify(tapMessage(DEACTIVATED_TAG, 1)))).toEqual({
      code: "UNAUTHORIZED",
      message: `Token ${DEACTIVATED_TAG} has been deactivated`,
    });
  });

  it("should refuse PICC data without UID and counter", () => {
    const plain = parseHexToBytes("87" + ADA_TAG + "010000" + "0000000000");
    const picc = bytesToHex(aesCbcEncrypt(parseHexToBytes(SDM_META_READ_KEY_HEX), plain));

    expect(refusal(() => backend.tagVerificationService.verify({ picc, cmac: "00".repeat(8) }))).toEqual({
      code: "BAD_REQUEST",
      message: "PICC decryption failed: Unsupported PICC data tag 87",
    });
  });

  it("should refuse every tap when no meta read key is configured", () => {
    ({ backend } = createTestBackend({ sdmMetaReadKey: undefined }));

    expect(refusal(() => backend.tagVerificationService.verify(tapMessage(ADA_TAG, 1)))).toEqual({
      code: "NOT_FOUND",
      message: "Tag verification is not configured",
    });
  });
});
