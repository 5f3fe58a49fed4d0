/**
 * Simulated NTAG424 tag for testing
 * Answers the two AuthenticateEV2First frames with real crypto, so a full
 * handshake against the backend can run without a reader.
 */

import {
  aesCbcDecrypt,
  aesCbcEncrypt,
  bytesEqual,
  concatBytes,
  deriveSessionKeys,
  parseFixedHex,
  parseTagUid,
  rotateLeft,
  secureRandom,
  type RandomSource,
  type SessionKeys,
  type TagUid,
} from "@workshop-access/shared";

import type { NfcTransceiver } from "./tag-auth-relay.js";

const SW_ADDITIONAL_FRAME = Uint8Array.of(0x91, 0xaf);
const SW_OK = Uint8Array.of(0x91, 0x00);
const SW_AUTHENTICATION_DELAY = Uint8Array.of(0x91, 0xad);
const SW_AUTHENTICATION_ERROR = Uint8Array.of(0x91, 0xae);
const SW_NO_SUCH_KEY = Uint8Array.of(0x91, 0x40);
const SW_LENGTH_ERROR = Uint8Array.of(0x91, 0x7e);
const SW_ILLEGAL_COMMAND = Uint8Array.of(0x91, 0x1c);

export interface SimulatedTagOptions {
  uid: TagUid;
  /** Keys by slot number */
  keys: ReadonlyMap<number, Uint8Array>;
  random?: RandomSource;
  /** Number of first frames answered with an authentication delay */
  delayedAttempts?: number;
}

export class SimulatedTag implements NfcTransceiver {
  readonly uid: TagUid;
  commandCount = 0;

  private keys: ReadonlyMap<number, Uint8Array>;
  private random: RandomSource;
  private delayedAttempts: number;
  private pending: { key: Uint8Array; rndB: Uint8Array } | null = null;
  private lastSession: { sessionKeys: SessionKeys; transactionId: Uint8Array } | null = null;

  constructor(options: SimulatedTagOptions) {
    this.uid = options.uid;
    this.keys = options.keys;
    this.random = options.random ?? secureRandom;
    this.delayedAttempts = options.delayedAttempts ?? 0;
  }

  /**
   * A tag holding one already diversified key, as printed by
   * `workshop-backend diversify`, in `keySlot`.
   */
  static personalized(tagUidHex: string, tagKeyHex: string, keySlot: number): SimulatedTag {
    return new SimulatedTag({
      uid: parseTagUid(tagUidHex),
      keys: new Map([[keySlot, parseFixedHex(tagKeyHex, 16, "Tag key")]]),
    });
  }

  /**
   * Session keys and TI of the last successful authentication.
   */
  authenticatedSession(): { sessionKeys: SessionKeys; transactionId: Uint8Array } | null {
    return this.lastSession;
  }

  async transceive(command: Uint8Array): Promise<Uint8Array> {
    this.commandCount += 1;
    if (command.length < 5 || command[0] !== 0x90) {
      return SW_ILLEGAL_COMMAND;
    }
    switch (command[1]) {
      case 0x71:
        return this.authenticateFirst(command);
      case 0xaf:
        return this.authenticatePart2(command);
      default:
        this.pending = null;
        return SW_ILLEGAL_COMMAND;
    }
  }

  private authenticateFirst(command: Uint8Array): Uint8Array {
    this.pending = null;
    this.lastSession = null;
    if (command[4] !== 0x02 || command.length !== 8) {
      return SW_LENGTH_ERROR;
    }
    if (this.delayedAttempts > 0) {
      this.delayedAttempts -= 1;
      return SW_AUTHENTICATION_DELAY;
    }
    const key = this.keys.get(command[5]);
    if (!key) {
      return SW_NO_SUCH_KEY;
    }
    const rndB = this.random(16);
    this.pending = { key, rndB };
    return concatBytes(aesCbcEncrypt(key, rndB), SW_ADDITIONAL_FRAME);
  }

  private authenticatePart2(command: Uint8Array): Uint8Array {
    const pending = this.pending;
    this.pending = null;
    if (!pending) {
      return SW_ILLEGAL_COMMAND;
    }
    if (command[4] !== 0x20 || command.length !== 38) {
      return SW_LENGTH_ERROR;
    }

    const plain = aesCbcDecrypt(pending.key, command.subarray(5, 37));
    const rndA = plain.slice(0, 16);
    if (!bytesEqual(plain.subarray(16, 32), rotateLeft(pending.rndB))) {
      return SW_AUTHENTICATION_ERROR;
    }

    const transactionId = this.random(4);
    const answer = concatBytes(transactionId, rotateLeft(rndA), new Uint8Array(6), new Uint8Array(6));
    this.lastSession = {
      sessionKeys: deriveSessionKeys(pending.key, rndA, pending.rndB),
      transactionId,
    };
    return concatBytes(aesCbcEncrypt(pending.key, answer), SW_OK);
  }
}
