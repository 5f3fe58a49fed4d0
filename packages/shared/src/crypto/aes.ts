import { createCipheriv, createDecipheriv } from "node:crypto";

/**
 * AES-128 primitives without padding.
 * Every mode here works on whole 16-byte blocks.
 */

export const AES_BLOCK_SIZE = 16;
export const AES_KEY_SIZE = 16;

function assertKey(key: Uint8Array): void {
  if (key.length !== AES_KEY_SIZE) {
    throw new RangeError(`AES-128 key must be ${AES_KEY_SIZE} bytes, got ${key.length}`);
  }
}

function assertBlocks(data: Uint8Array): void {
  if (data.length % AES_BLOCK_SIZE !== 0) {
    throw new RangeError(`Data length must be a multiple of ${AES_BLOCK_SIZE}, got ${data.length}`);
  }
}

function resolveIv(iv: Uint8Array | undefined): Uint8Array {
  const useIv = iv ?? new Uint8Array(AES_BLOCK_SIZE);
  if (useIv.length !== AES_BLOCK_SIZE) {
    throw new RangeError(`IV must be ${AES_BLOCK_SIZE} bytes, got ${useIv.length}`);
  }
  return useIv;
}

/**
 * Encrypt a single block (ECB).
 */
export function aesEncryptBlock(key: Uint8Array, block: Uint8Array): Uint8Array {
  assertKey(key);
  if (block.length !== AES_BLOCK_SIZE) {
    throw new RangeError(`Block must be ${AES_BLOCK_SIZE} bytes, got ${block.length}`);
  }
  const cipher = createCipheriv("aes-128-ecb", key, null);
  cipher.setAutoPadding(false);
  return new Uint8Array(Buffer.concat([cipher.update(block), cipher.final()]));
}

/**
 * AES-128-CBC encryption, IV defaults to all zeros.
 */
export function aesCbcEncrypt(key: Uint8Array, data: Uint8Array, iv?: Uint8Array): Uint8Array {
  assertKey(key);
  assertBlocks(data);
  const cipher = createCipheriv("aes-128-cbc", key, resolveIv(iv));
  cipher.setAutoPadding(false);
  return new Uint8Array(Buffer.concat([cipher.update(data), cipher.final()]));
}

/**
 * AES-128-CBC decryption, IV defaults to all zeros.
 */
export function aesCbcDecrypt(key: Uint8Array, data: Uint8Array, iv?: Uint8Array): Uint8Array {
  assertKey(key);
  assertBlocks(data);
  const decipher = createDecipheriv("aes-128-cbc", key, resolveIv(iv));
  decipher.setAutoPadding(false);
  return new Uint8Array(Buffer.concat([decipher.update(data), decipher.final()]));
}

/**
 * Overwrite key material in place.
 */
export function zeroize(...buffers: Uint8Array[]): void {
  for (const buffer of buffers) {
    buffer.fill(0);
  }
}
