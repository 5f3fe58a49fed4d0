import { bytesEqual, concatBytes } from "../utils/encoding.js";
import { AES_BLOCK_SIZE, aesCbcDecrypt, zeroize } from "./aes.js";
import { aesCmac } from "./cmac.js";
import { TAG_UID_LENGTH } from "../types/index.js";

/**
 * Secure Dynamic Messaging (SUN) verification for NTAG 424 DNA.
 *
 * A tapped tag emits encrypted PICC data (UID and read counter) and a MAC
 * computed with a session key that depends on both. The backend decrypts the
 * PICC data with the meta read key and checks the MAC with the tag's file
 * read key.
 */

export const SDM_MAC_LENGTH = 8;
export const READ_COUNTER_LENGTH = 3;

/** UID mirrored, counter mirrored, 7-byte UID */
export const PICC_DATA_TAG = 0xc7;

const SV2_PREFIX = Uint8Array.of(0x3c, 0xc3, 0x00, 0x01, 0x00, 0x80);

export interface PiccData {
  tagUid: Uint8Array;
  readCounter: number;
}

export class SdmError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SdmError";
  }
}

function encodeReadCounter(readCounter: number): Uint8Array {
  if (!Number.isInteger(readCounter) || readCounter < 0 || readCounter > 0xffffff) {
    throw new RangeError(`Read counter must fit in 24 bits, got ${readCounter}`);
  }
  return Uint8Array.of(readCounter & 0xff, (readCounter >> 8) & 0xff, (readCounter >> 16) & 0xff);
}

/**
 * Decrypt the 16-byte PICC data block (AES-CBC, zero IV).
 */
export function decryptPiccData(metaReadKey: Uint8Array, encrypted: Uint8Array): PiccData {
  if (encrypted.length !== AES_BLOCK_SIZE) {
    throw new SdmError(`PICC data must be ${AES_BLOCK_SIZE} bytes, got ${encrypted.length}`);
  }
  const plain = aesCbcDecrypt(metaReadKey, encrypted);
  try {
    if (plain[0] !== PICC_DATA_TAG) {
      throw new SdmError(`Unsupported PICC data tag ${plain[0].toString(16).padStart(2, "0")}`);
    }
    const counter = plain.subarray(1 + TAG_UID_LENGTH, 1 + TAG_UID_LENGTH + READ_COUNTER_LENGTH);
    return {
      tagUid: plain.slice(1, 1 + TAG_UID_LENGTH),
      readCounter: counter[0] | (counter[1] << 8) | (counter[2] << 16),
    };
  } finally {
    zeroize(plain);
  }
}

/**
 * SesSDMFileReadMACKey = CMAC(fileReadKey, 3C C3 00 01 00 80 || UID || counter LSB first)
 */
export function deriveSdmMacKey(fileReadKey: Uint8Array, picc: PiccData): Uint8Array {
  if (picc.tagUid.length !== TAG_UID_LENGTH) {
    throw new RangeError(`Tag UID must be ${TAG_UID_LENGTH} bytes, got ${picc.tagUid.length}`);
  }
  const sv2 = concatBytes(SV2_PREFIX, picc.tagUid, encodeReadCounter(picc.readCounter));
  const key = aesCmac(fileReadKey, sv2);
  sv2.fill(0);
  return key;
}

/**
 * The tag sends the odd-indexed bytes of the full CMAC.
 */
export function truncateMac(mac: Uint8Array): Uint8Array {
  const out = new Uint8Array(mac.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = mac[2 * i + 1];
  }
  return out;
}

/**
 * MAC over `macInput`, the mirrored data between the MAC input offset and the
 * MAC itself. Empty when only PICC data and MAC are mirrored.
 */
export function computeSdmMac(
  fileReadKey: Uint8Array,
  picc: PiccData,
  macInput: Uint8Array = new Uint8Array(0),
): Uint8Array {
  const sessionKey = deriveSdmMacKey(fileReadKey, picc);
  const mac = aesCmac(sessionKey, macInput);
  const truncated = truncateMac(mac);
  zeroize(sessionKey, mac);
  return truncated;
}

export function verifySdmMac(
  fileReadKey: Uint8Array,
  picc: PiccData,
  mac: Uint8Array,
  macInput?: Uint8Array,
): boolean {
  if (mac.length !== SDM_MAC_LENGTH) {
    throw new SdmError(`SDM MAC must be ${SDM_MAC_LENGTH} bytes, got ${mac.length}`);
  }
  return bytesEqual(computeSdmMac(fileReadKey, picc, macInput), mac);
}
