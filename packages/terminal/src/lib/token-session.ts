/**
 * Token Session
 * An authenticated usage session issued by the backend for one tag.
 */

import {
  parseTagUid,
  tokenSessionRecordSchema,
  type TagUid,
  type TokenSessionRecord,
} from "@workshop-access/shared";

export class TokenSession {
  readonly tagUid: TagUid;
  readonly tagUidHex: string;
  readonly sessionId: string;
  readonly userId: string;
  readonly userLabel: string;
  /** epoch milliseconds */
  readonly expiration: number;
  readonly permissions: ReadonlySet<string>;

  private constructor(record: TokenSessionRecord) {
    this.tagUid = parseTagUid(record.tagUid);
    this.tagUidHex = record.tagUid;
    this.sessionId = record.sessionId;
    this.userId = record.userId;
    this.userLabel = record.userLabel;
    this.expiration = record.expirationUnixSeconds * 1000;
    this.permissions = new Set(record.permissions);
    Object.freeze(this);
  }

  /**
   * Build from a backend record. Throws if the record is malformed.
   */
  static fromRecord(record: unknown): TokenSession {
    return new TokenSession(tokenSessionRecordSchema.parse(record));
  }

  /**
   * Sessions end at their expiration instant; evaluated on every call.
   */
  isActive(now: number): boolean {
    return now < this.expiration;
  }

  hasPermission(permission: string): boolean {
    return this.permissions.has(permission);
  }

  missingPermissions(required: readonly string[]): string[] {
    return required.filter((p) => !this.permissions.has(p));
  }

  toRecord(): TokenSessionRecord {
    return {
      tagUid: this.tagUidHex,
      sessionId: this.sessionId,
      expirationUnixSeconds: Math.floor(this.expiration / 1000),
      userId: this.userId,
      userLabel: this.userLabel,
      permissions: Array.from(this.permissions),
    };
  }
}
