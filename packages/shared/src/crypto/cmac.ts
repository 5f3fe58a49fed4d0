import { AES_BLOCK_SIZE, aesCbcEncrypt, aesEncryptBlock } from "./aes.js";

/**
 * AES-CMAC (RFC 4493)
 */

const RB = 0x87;

export interface CmacSubkeys {
  k1: Uint8Array;
  k2: Uint8Array;
}

/**
 * Shift a block left by one bit, reducing with Rb when the MSB falls off.
 */
function doubleBlock(input: Uint8Array): Uint8Array {
  const out = new Uint8Array(input.length);
  let carry = 0;
  for (let i = input.length - 1; i >= 0; i--) {
    out[i] = ((input[i] << 1) | carry) & 0xff;
    carry = input[i] >> 7;
  }
  if (carry) {
    out[out.length - 1] ^= RB;
  }
  return out;
}

export function generateSubkeys(key: Uint8Array): CmacSubkeys {
  const l = aesEncryptBlock(key, new Uint8Array(AES_BLOCK_SIZE));
  const k1 = doubleBlock(l);
  const k2 = doubleBlock(k1);
  l.fill(0);
  return { k1, k2 };
}

/**
 * Append 0x80 then zeros up to `length`.
 */
export function padIso9797M2(data: Uint8Array, length: number): Uint8Array {
  if (data.length >= length) {
    throw new RangeError(`Cannot pad ${data.length} bytes to ${length}`);
  }
  const out = new Uint8Array(length);
  out.set(data);
  out[data.length] = 0x80;
  return out;
}

/**
 * CBC-MAC over `prepared` (whose last block already carries the subkey XOR).
 */
export function macOverPrepared(key: Uint8Array, prepared: Uint8Array): Uint8Array {
  const encrypted = aesCbcEncrypt(key, prepared);
  return encrypted.slice(encrypted.length - AES_BLOCK_SIZE);
}

export function xorLastBlock(data: Uint8Array, subkey: Uint8Array): void {
  const offset = data.length - AES_BLOCK_SIZE;
  for (let i = 0; i < AES_BLOCK_SIZE; i++) {
    data[offset + i] ^= subkey[i];
  }
}

export function aesCmac(key: Uint8Array, message: Uint8Array): Uint8Array {
  const { k1, k2 } = generateSubkeys(key);
  const complete = message.length > 0 && message.length % AES_BLOCK_SIZE === 0;

  let prepared: Uint8Array;
  if (complete) {
    prepared = message.slice();
    xorLastBlock(prepared, k1);
  } else {
    const blocks = Math.floor(message.length / AES_BLOCK_SIZE) + 1;
    prepared = padIso9797M2(message, blocks * AES_BLOCK_SIZE);
    xorLastBlock(prepared, k2);
  }

  const tag = macOverPrepared(key, prepared);
  k1.fill(0);
  k2.fill(0);
  return tag;
}
