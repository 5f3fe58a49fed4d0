import { describe, it, expect } from "vitest";

import {
  aesCbcDecrypt,
  aesCbcEncrypt,
  beginMutualAuthentication,
  bytesToHex,
  completeMutualAuthentication,
  concatBytes,
  MutualAuthenticationError,
  parseHexToBytes,
  rotateLeft,
} from "@workshop-access/shared";

const authKey = parseHexToBytes("2b7e151628aed2a6abf7158809cf4f3c");
const rndA = parseHexToBytes("a0a1a2a3a4a5a6a7a8a9aaabacadaeaf");
const rndB = parseHexToBytes("b0b1b2b3b4b5b6b7b8b9babbbcbdbebf");
const fixedRandom = () => rndA.slice();

describe("mutual authentication", () => {
  it("rotates left by one byte", () => {
    expect(bytesToHex(rotateLeft(Uint8Array.of(1, 2, 3)))).toBe("020301");
    expect(rotateLeft(new Uint8Array(0))).toHaveLength(0);
  });

  it("answers the tag challenge with RndA || rotl(RndB)", () => {
    const challenge = beginMutualAuthentication(aesCbcEncrypt(authKey, rndB), authKey, fixedRandom);

    expect(bytesToHex(challenge.rndB)).toBe(bytesToHex(rndB));
    expect(bytesToHex(challenge.rndA)).toBe(bytesToHex(rndA));
    expect(bytesToHex(aesCbcDecrypt(authKey, challenge.cloudChallenge))).toBe(
      "a0a1a2a3a4a5a6a7a8a9aaabacadaeaf" + "b1b2b3b4b5b6b7b8b9babbbcbdbebfb0",
    );
  });

  it("accepts a tag response carrying rotl(RndA)", () => {
    const plain = concatBytes(
      parseHexToBytes("01020304"),
      rotateLeft(rndA),
      parseHexToBytes("000000000000"),
      parseHexToBytes("111111111111"),
    );
    const result = completeMutualAuthentication(aesCbcEncrypt(authKey, plain), authKey, rndA);

    expect(bytesToHex(result.transactionId)).toBe("01020304");
    expect(bytesToHex(result.pcdCap2)).toBe("111111111111");
  });

  it("refuses a response for a different RndA", () => {
    const plain = concatBytes(new Uint8Array(4), rndA, new Uint8Array(12));
    expect(() =>
      completeMutualAuthentication(aesCbcEncrypt(authKey, plain), authKey, rndA),
    ).toThrow(MutualAuthenticationError);
  });

  it("checks frame lengths", () => {
    expect(() => beginMutualAuthentication(new Uint8Array(8), authKey)).toThrow(RangeError);
    expect(() => completeMutualAuthentication(new Uint8Array(16), authKey, rndA)).toThrow(RangeError);
  });
});
