/**
 * Tag Verification Service
 * Checks a SUN message from a tag tap and names the token's owner. Used for
 * checkout without a terminal handshake.
 */

import {
  bytesToHex,
  createLogger,
  decryptPiccData,
  parseHexToBytes,
  toError,
  verifySdmMac,
  zeroize,
  type PiccData,
  type VerifyTagRequest,
  type VerifyTagResponse,
} from "@workshop-access/shared";

import type { TokenRepository } from "../repository/token-repository.js";
import type { UserRepository } from "../repository/user-repository.js";
import { BackendError } from "../shared/errors.js";
import type { KeyService } from "./key-service.js";

const logger = createLogger("backend:tag-verification");

export class TagVerificationService {
  /** Highest read counter accepted per tag */
  private readCounters = new Map<string, number>();

  constructor(
    private tokenRepo: TokenRepository,
    private userRepo: UserRepository,
    private keyService: KeyService,
    private metaReadKey?: Uint8Array,
  ) {}

  verify(request: VerifyTagRequest): VerifyTagResponse {
    if (!this.metaReadKey) {
      throw new BackendError("NOT_FOUND", "Tag verification is not configured");
    }

    let picc: PiccData;
    try {
      picc = decryptPiccData(this.metaReadKey, parseHexToBytes(request.picc));
    } catch (error) {
      throw new BackendError("BAD_REQUEST", `PICC decryption failed: ${toError(error).message}`);
    }
    const tagUid = bytesToHex(picc.tagUid);
    const log = logger.child({ tagUid, readCounter: picc.readCounter });

    const token = this.tokenRepo.get(tagUid);
    if (!token) {
      log.warn("Token not found");
      throw new BackendError("NOT_FOUND", `Token ${tagUid} is not registered`);
    }
    if (token.deactivated) {
      log.warn("Token is deactivated");
      throw new BackendError("UNAUTHORIZED", `Token ${tagUid} has been deactivated`);
    }
    const user = this.userRepo.get(token.userId);
    if (!user) {
      throw new BackendError("NOT_FOUND", `User ${token.userId} not found`);
    }

    const fileReadKey = this.keyService.sdmFileReadKey(picc.tagUid);
    const valid = verifySdmMac(fileReadKey, picc, parseHexToBytes(request.cmac));
    zeroize(fileReadKey);
    if (!valid) {
      log.warn("SDM MAC mismatch");
      throw new BackendError("UNAUTHORIZED", "Invalid SDM MAC");
    }

    const last = this.readCounters.get(tagUid);
    if (last !== undefined && picc.readCounter <= last) {
      log.warn("Read counter replayed", { lastReadCounter: last });
      throw new BackendError("UNAUTHORIZED", `Read counter ${picc.readCounter} was already used`);
    }
    this.readCounters.set(tagUid, picc.readCounter);

    log.info("Tag verified", { userId: user.userId });
    return { tagUid, userId: user.userId, userLabel: user.label, readCounter: picc.readCounter };
  }
}
