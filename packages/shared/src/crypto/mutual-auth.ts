import { randomBytes } from "node:crypto";

import { bytesEqual, concatBytes } from "../utils/encoding.js";
import { AES_BLOCK_SIZE, aesCbcDecrypt, aesCbcEncrypt } from "./aes.js";

/**
 * Backend half of the EV2First three-pass mutual authentication.
 *
 * 1. Tag sends E(K, RndB).
 * 2. Backend answers E(K, RndA || rotl(RndB)).
 * 3. Tag answers E(K, TI || rotl(RndA) || PDcap2 || PCDcap2); backend checks rotl(RndA).
 */

export type RandomSource = (length: number) => Uint8Array;

export const secureRandom: RandomSource = (length) => new Uint8Array(randomBytes(length));

export class MutualAuthenticationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MutualAuthenticationError";
  }
}

export interface MutualAuthenticationChallenge {
  rndA: Uint8Array;
  rndB: Uint8Array;
  /** E(K, RndA || rotl(RndB)), 32 bytes */
  cloudChallenge: Uint8Array;
}

export interface MutualAuthenticationResult {
  transactionId: Uint8Array;
  pdCap2: Uint8Array;
  pcdCap2: Uint8Array;
}

export const ENCRYPTED_TAG_CHALLENGE_LENGTH = AES_BLOCK_SIZE;
export const CLOUD_CHALLENGE_LENGTH = 2 * AES_BLOCK_SIZE;
export const ENCRYPTED_TAG_RESPONSE_LENGTH = 2 * AES_BLOCK_SIZE;

/**
 * Rotate left by one byte.
 */
export function rotateLeft(bytes: Uint8Array): Uint8Array {
  if (bytes.length === 0) {
    return new Uint8Array(0);
  }
  return concatBytes(bytes.subarray(1), bytes.subarray(0, 1));
}

export function beginMutualAuthentication(
  encryptedRndB: Uint8Array,
  authKey: Uint8Array,
  random: RandomSource = secureRandom,
): MutualAuthenticationChallenge {
  if (encryptedRndB.length !== ENCRYPTED_TAG_CHALLENGE_LENGTH) {
    throw new RangeError(
      `Tag challenge must be ${ENCRYPTED_TAG_CHALLENGE_LENGTH} bytes, got ${encryptedRndB.length}`,
    );
  }
  const rndB = aesCbcDecrypt(authKey, encryptedRndB);
  const rndA = random(AES_BLOCK_SIZE);
  if (rndA.length !== AES_BLOCK_SIZE) {
    throw new RangeError("Random source returned the wrong length");
  }
  const cloudChallenge = aesCbcEncrypt(authKey, concatBytes(rndA, rotateLeft(rndB)));
  return { rndA, rndB, cloudChallenge };
}

export function completeMutualAuthentication(
  encryptedTagResponse: Uint8Array,
  authKey: Uint8Array,
  rndA: Uint8Array,
): MutualAuthenticationResult {
  if (encryptedTagResponse.length !== ENCRYPTED_TAG_RESPONSE_LENGTH) {
    throw new RangeError(
      `Tag response must be ${ENCRYPTED_TAG_RESPONSE_LENGTH} bytes, got ${encryptedTagResponse.length}`,
    );
  }
  const plain = aesCbcDecrypt(authKey, encryptedTagResponse);
  const rotatedRndA = plain.slice(4, 20);
  if (!bytesEqual(rotatedRndA, rotateLeft(rndA))) {
    plain.fill(0);
    throw new MutualAuthenticationError("Tag response does not match RndA");
  }
  const result = {
    transactionId: plain.slice(0, 4),
    pdCap2: plain.slice(20, 26),
    pcdCap2: plain.slice(26, 32),
  };
  plain.fill(0);
  return result;
}
