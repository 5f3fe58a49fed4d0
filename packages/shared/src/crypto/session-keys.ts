import { AES_BLOCK_SIZE } from "./aes.js";
import { aesCmac } from "./cmac.js";

/**
 * Session key derivation for an EV2 authentication round.
 */

export interface SessionKeys {
  encKey: Uint8Array;
  macKey: Uint8Array;
}

const SV1_PREFIX = Uint8Array.of(0xa5, 0x5a);
const SV2_PREFIX = Uint8Array.of(0x5a, 0xa5);
const SV_FIXED = Uint8Array.of(0x00, 0x01, 0x00, 0x80);
const SV_LENGTH = 32;

/**
 * prefix || 00 01 00 80 || RndA[0..1] || (RndA[2..7] ^ RndB[0..5]) || RndB[6..15] || RndA[8..15]
 */
export function buildSessionVector(
  prefix: Uint8Array,
  rndA: Uint8Array,
  rndB: Uint8Array,
): Uint8Array {
  if (rndA.length !== AES_BLOCK_SIZE || rndB.length !== AES_BLOCK_SIZE) {
    throw new RangeError("RndA and RndB must be 16 bytes each");
  }
  const sv = new Uint8Array(SV_LENGTH);
  sv.set(prefix, 0);
  sv.set(SV_FIXED, 2);
  sv.set(rndA.subarray(0, 2), 6);
  for (let i = 0; i < 6; i++) {
    sv[8 + i] = rndA[2 + i] ^ rndB[i];
  }
  sv.set(rndB.subarray(6, 16), 14);
  sv.set(rndA.subarray(8, 16), 24);
  return sv;
}

export function deriveSessionKeys(
  authKey: Uint8Array,
  rndA: Uint8Array,
  rndB: Uint8Array,
): SessionKeys {
  const sv1 = buildSessionVector(SV1_PREFIX, rndA, rndB);
  const sv2 = buildSessionVector(SV2_PREFIX, rndA, rndB);
  const keys = {
    encKey: aesCmac(authKey, sv1),
    macKey: aesCmac(authKey, sv2),
  };
  sv1.fill(0);
  sv2.fill(0);
  return keys;
}
