/**
 * Hex utilities
 *
 * Bytes travel as lowercase hex on the wire and act as map keys (tag UIDs).
 */

/**
 * Remove whitespace from a hex string.
 */
export function cleanHex(input: string): string {
  return input.replace(/\s+/g, "");
}

/**
 * Validate that a string contains only hex characters and has even length.
 */
export function isValidEvenHex(hex: string): boolean {
  return /^[0-9a-fA-F]*$/.test(hex) && hex.length % 2 === 0;
}

/**
 * Parse a hex string (whitespace allowed) into bytes.
 * Throws on invalid format.
 */
export function parseHexToBytes(input: string): Uint8Array {
  const hex = cleanHex(input);
  if (!isValidEvenHex(hex)) {
    throw new Error("Invalid hex format (must be even-length hex)");
  }
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < hex.length; i += 2) {
    out[i / 2] = parseInt(hex.slice(i, i + 2), 16);
  }
  return out;
}

/**
 * Parse hex and require an exact byte length.
 */
export function parseFixedHex(input: string, length: number, label = "value"): Uint8Array {
  const bytes = parseHexToBytes(input);
  if (bytes.length !== length) {
    throw new Error(`${label} must be ${length} bytes, got ${bytes.length}`);
  }
  return bytes;
}

export function bytesToHex(bytes: Uint8Array): string {
  let out = "";
  for (const b of bytes) {
    out += b.toString(16).padStart(2, "0");
  }
  return out;
}
