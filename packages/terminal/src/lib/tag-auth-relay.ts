/**
 * Tag Authentication Relay
 *
 * Issues the two AuthenticateEV2First frames and hands the ciphertext back
 * untouched. The terminal never sees a key; it only knows which key slot to
 * address.
 */

import { concatBytes, createLogger, toError } from "@workshop-access/shared";

const logger = createLogger("terminal:tag");

/**
 * Raw ISO 14443-4 exchange with the tag in the field.
 */
export interface NfcTransceiver {
  transceive(command: Uint8Array): Promise<Uint8Array>;
}

export const AUTHORIZATION_KEY_SLOT = 2;

const CLA = 0x90;
const INS_AUTHENTICATE_EV2_FIRST = 0x71;
const INS_ADDITIONAL_FRAME = 0xaf;

const SW1 = 0x91;
const SW2_OK = 0x00;
const SW2_ADDITIONAL_FRAME = 0xaf;
const SW2_AUTHENTICATION_DELAY = 0xad;

const TAG_CHALLENGE_LENGTH = 16;
const CLOUD_CHALLENGE_LENGTH = 32;
const TAG_RESPONSE_LENGTH = 32;

export type TagFailure =
  | { type: "authenticationDelay" }
  | { type: "status"; sw1: number; sw2: number }
  | { type: "malformed"; length: number }
  | { type: "transport"; cause: Error };

export type TagResult<T> = { ok: true; value: T } | { ok: false; failure: TagFailure };

export function describeTagFailure(failure: TagFailure): string {
  switch (failure.type) {
    case "authenticationDelay":
      return "Tag requested an authentication delay";
    case "status":
      return `Tag returned status ${hexByte(failure.sw1)}${hexByte(failure.sw2)}`;
    case "malformed":
      return `Tag response had unexpected length ${failure.length}`;
    case "transport":
      return `NFC transceive failed: ${failure.cause.message}`;
  }
}

function hexByte(value: number): string {
  return value.toString(16).padStart(2, "0");
}

export class TagAuthenticationRelay {
  constructor(
    private transceiver: NfcTransceiver,
    private keySlot: number = AUTHORIZATION_KEY_SLOT,
  ) {
    if (!Number.isInteger(keySlot) || keySlot < 0 || keySlot > 4) {
      throw new RangeError(`Key slot must be 0..4, got ${keySlot}`);
    }
  }

  /**
   * First frame: returns E(K, RndB), 16 bytes.
   */
  async beginAuthentication(): Promise<TagResult<Uint8Array>> {
    const command = Uint8Array.of(CLA, INS_AUTHENTICATE_EV2_FIRST, 0x00, 0x00, 0x02, this.keySlot, 0x00, 0x00);
    return this.exchange(command, SW2_ADDITIONAL_FRAME, TAG_CHALLENGE_LENGTH);
  }

  /**
   * Second frame: forwards the backend's 32-byte challenge, returns the tag's
   * 32-byte encrypted answer.
   */
  async completeAuthentication(cloudChallenge: Uint8Array): Promise<TagResult<Uint8Array>> {
    if (cloudChallenge.length !== CLOUD_CHALLENGE_LENGTH) {
      throw new RangeError(
        `Cloud challenge must be ${CLOUD_CHALLENGE_LENGTH} bytes, got ${cloudChallenge.length}`,
      );
    }
    const command = concatBytes(
      Uint8Array.of(CLA, INS_ADDITIONAL_FRAME, 0x00, 0x00, CLOUD_CHALLENGE_LENGTH),
      cloudChallenge,
      Uint8Array.of(0x00),
    );
    return this.exchange(command, SW2_OK, TAG_RESPONSE_LENGTH);
  }

  private async exchange(
    command: Uint8Array,
    expectedSw2: number,
    expectedLength: number,
  ): Promise<TagResult<Uint8Array>> {
    let response: Uint8Array;
    try {
      response = await this.transceiver.transceive(command);
    } catch (error) {
      const cause = toError(error);
      logger.warn("Transceive failed", { error: cause.message });
      return { ok: false, failure: { type: "transport", cause } };
    }

    if (response.length < 2) {
      return { ok: false, failure: { type: "malformed", length: response.length } };
    }

    const sw1 = response[response.length - 2];
    const sw2 = response[response.length - 1];
    if (sw1 === SW1 && sw2 === SW2_AUTHENTICATION_DELAY) {
      return { ok: false, failure: { type: "authenticationDelay" } };
    }
    if (sw1 !== SW1 || sw2 !== expectedSw2) {
      logger.warn("Unexpected tag status", { sw: `${hexByte(sw1)}${hexByte(sw2)}` });
      return { ok: false, failure: { type: "status", sw1, sw2 } };
    }

    const data = response.slice(0, response.length - 2);
    if (data.length !== expectedLength) {
      return { ok: false, failure: { type: "malformed", length: data.length } };
    }
    return { ok: true, value: data };
  }
}
