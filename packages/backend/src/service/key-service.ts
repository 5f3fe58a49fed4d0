/**
 * Key Service
 * Holds the master secret and derives per-tag keys on demand
 */

import {
  AES_KEY_SIZE,
  diversifyKey,
  diversifyKeys,
  type DiversifiedKeys,
  type TagUid,
} from "@workshop-access/shared";

export class KeyService {
  private readonly masterKey: Uint8Array;

  constructor(
    masterKey: Uint8Array,
    public readonly systemName: string,
  ) {
    if (masterKey.length !== AES_KEY_SIZE) {
      throw new RangeError(`Master key must be ${AES_KEY_SIZE} bytes, got ${masterKey.length}`);
    }
    this.masterKey = masterKey.slice();
  }

  /**
   * Key in slot 2 of the tag, used for the backend handshake.
   * Callers zero it after use.
   */
  authorizationKey(tagUid: TagUid): Uint8Array {
    return diversifyKey(this.masterKey, this.systemName, tagUid, "authorization");
  }

  /**
   * Key 3 (`reserved1`) is the tag's SDM file read key, the base of its SUN MACs.
   * Callers zero it after use.
   */
  sdmFileReadKey(tagUid: TagUid): Uint8Array {
    return diversifyKey(this.masterKey, this.systemName, tagUid, "reserved1");
  }

  /**
   * Every key for personalizing a tag.
   */
  personalizationKeys(tagUid: TagUid): DiversifiedKeys {
    return diversifyKeys(this.masterKey, this.systemName, tagUid);
  }
}
