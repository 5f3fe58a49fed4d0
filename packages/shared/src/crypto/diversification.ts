/**
 * AES-128 key diversification (NXP AN10922)
 *
 * Each tag key is derived from the master secret, the tag UID, a fixed key id
 * per purpose and the installation's system name. Nothing about the result is
 * stored; the backend recomputes it for every authentication.
 */

import { TAG_UID_LENGTH } from "../types/index.js";
import { concatBytes, toUtf8 } from "../utils/encoding.js";
import { AES_BLOCK_SIZE, AES_KEY_SIZE } from "./aes.js";
import { generateSubkeys, macOverPrepared, padIso9797M2, xorLastBlock } from "./cmac.js";

export type KeyPurpose = "application" | "authorization" | "reserved1" | "reserved2";

export const KEY_PURPOSES: readonly KeyPurpose[] = [
  "application",
  "authorization",
  "reserved1",
  "reserved2",
];

const KEY_IDS: Record<KeyPurpose, Uint8Array> = {
  application: Uint8Array.of(0x00, 0x00, 0x01),
  authorization: Uint8Array.of(0x00, 0x00, 0x02),
  reserved1: Uint8Array.of(0x00, 0x00, 0x03),
  reserved2: Uint8Array.of(0x00, 0x00, 0x04),
};

export const KEY_ID_LENGTH = 3;
const DIVERSIFICATION_CONSTANT = 0x01;
const DIVERSIFIED_BLOCK_LENGTH = 2 * AES_BLOCK_SIZE;
export const MAX_DIVERSIFICATION_INPUT = DIVERSIFIED_BLOCK_LENGTH - 1;

export function keyIdFor(purpose: KeyPurpose): Uint8Array {
  return KEY_IDS[purpose].slice();
}

/**
 * Diversify `masterKey` over an arbitrary input of 1..31 bytes.
 * The constant 0x01 is prepended; the result is padded to 32 bytes unless it
 * already is 32 bytes long.
 */
export function diversifyAes128(masterKey: Uint8Array, input: Uint8Array): Uint8Array {
  if (masterKey.length !== AES_KEY_SIZE) {
    throw new RangeError(`Master key must be ${AES_KEY_SIZE} bytes, got ${masterKey.length}`);
  }
  if (input.length < 1 || input.length > MAX_DIVERSIFICATION_INPUT) {
    throw new RangeError(
      `Diversification input must be 1..${MAX_DIVERSIFICATION_INPUT} bytes, got ${input.length}`,
    );
  }

  const { k1, k2 } = generateSubkeys(masterKey);
  const block = concatBytes(Uint8Array.of(DIVERSIFICATION_CONSTANT), input);
  const padded = block.length < DIVERSIFIED_BLOCK_LENGTH;
  const prepared = padded ? padIso9797M2(block, DIVERSIFIED_BLOCK_LENGTH) : block;
  xorLastBlock(prepared, padded ? k2 : k1);

  const key = macOverPrepared(masterKey, prepared);
  k1.fill(0);
  k2.fill(0);
  prepared.fill(0);
  return key;
}

export function diversifyKey(
  masterKey: Uint8Array,
  systemName: string,
  tagUid: Uint8Array,
  purpose: KeyPurpose,
): Uint8Array {
  if (tagUid.length !== TAG_UID_LENGTH) {
    throw new RangeError(`Tag UID must be ${TAG_UID_LENGTH} bytes, got ${tagUid.length}`);
  }
  return diversifyAes128(masterKey, concatBytes(tagUid, KEY_IDS[purpose], toUtf8(systemName)));
}

export type DiversifiedKeys = Record<KeyPurpose, Uint8Array>;

/**
 * All keys for personalizing one tag.
 */
export function diversifyKeys(
  masterKey: Uint8Array,
  systemName: string,
  tagUid: Uint8Array,
): DiversifiedKeys {
  return {
    application: diversifyKey(masterKey, systemName, tagUid, "application"),
    authorization: diversifyKey(masterKey, systemName, tagUid, "authorization"),
    reserved1: diversifyKey(masterKey, systemName, tagUid, "reserved1"),
    reserved2: diversifyKey(masterKey, systemName, tagUid, "reserved2"),
  };
}

export function isKeyPurpose(value: string): value is KeyPurpose {
  return (KEY_PURPOSES as readonly string[]).includes(value);
}
