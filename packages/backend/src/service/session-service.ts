/**
 * Session Service
 * Backend half of session creation: existing-session lookup, the two
 * handshake rounds with the tag, and the issued TokenSession records.
 */

import {
  aesCmac,
  beginMutualAuthentication,
  bytesToHex,
  completeMutualAuthentication,
  createLogger,
  deriveSessionKeys,
  MutualAuthenticationError,
  parseHexToBytes,
  parseTagUid,
  secureRandom,
  systemClock,
  toError,
  zeroize,
  type AuthenticateNewSessionRequest,
  type AuthenticateNewSessionResponse,
  type Clock,
  type CompleteAuthenticationRequest,
  type CompleteAuthenticationResponse,
  type RandomSource,
  type StartSessionRequest,
  type StartSessionResponse,
  type TokenSessionRecord,
} from "@workshop-access/shared";

import type { SessionData, SessionRepository } from "../repository/session-repository.js";
import type { TokenRepository } from "../repository/token-repository.js";
import type { UserData, UserRepository } from "../repository/user-repository.js";
import { BackendError } from "../shared/errors.js";
import { generateSessionId } from "../shared/random.js";
import {
  calculateSessionExpiration,
  DEFAULT_SESSION_TIMEZONE,
} from "../shared/session-expiration.js";
import type { KeyService } from "./key-service.js";

const logger = createLogger("backend:session-service");

export interface SessionServiceOptions {
  timezone?: string;
  clock?: Clock;
  random?: RandomSource;
  generateSessionId?: () => string;
  /** Handshakes not completed within this window are discarded */
  pendingAuthTtlMs?: number;
}

export const DEFAULT_PENDING_AUTH_TTL_MS = 60 * 1000;

function rejected(message: string): CompleteAuthenticationResponse {
  return { result: { type: "rejected", message } };
}

export class SessionService {
  private readonly timezone: string;
  private readonly clock: Clock;
  private readonly random: RandomSource;
  private readonly nextSessionId: () => string;
  private readonly pendingAuthTtlMs: number;

  constructor(
    private sessionRepo: SessionRepository,
    private tokenRepo: TokenRepository,
    private userRepo: UserRepository,
    private keyService: KeyService,
    options: SessionServiceOptions = {},
  ) {
    this.timezone = options.timezone ?? DEFAULT_SESSION_TIMEZONE;
    this.clock = options.clock ?? systemClock;
    this.random = options.random ?? secureRandom;
    this.nextSessionId = options.generateSessionId ?? generateSessionId;
    this.pendingAuthTtlMs = options.pendingAuthTtlMs ?? DEFAULT_PENDING_AUTH_TTL_MS;
  }

  /**
   * Reuse a live session for the tag, or ask the terminal to authenticate it.
   */
  startSession(request: StartSessionRequest): StartSessionResponse {
    const token = this.tokenRepo.get(request.tagUid);
    if (!token) {
      logger.info("Start session for unknown token", { tagUid: request.tagUid });
      return { result: { type: "rejected", message: "Token is not registered" } };
    }
    if (token.deactivated) {
      logger.info("Start session for deactivated token", { tagUid: request.tagUid });
      return { result: { type: "rejected", message: "Token has been deactivated" } };
    }

    const existing = this.sessionRepo.findActiveByTagUid(token.tagUid, new Date(this.clock.now()));
    if (existing) {
      const user = this.userRepo.get(existing.userId);
      if (!user) {
        return { result: { type: "rejected", message: "User not found" } };
      }
      logger.debug("Reusing existing session", { sessionId: existing.sessionId });
      return { result: { type: "existingSession", session: this.toRecord(existing, user) } };
    }

    return { result: { type: "authRequired" } };
  }

  /**
   * First handshake round: decrypt the tag challenge and answer with ours.
   * Refusals throw, since a terminal only gets here after `authRequired`.
   */
  authenticateNewSession(request: AuthenticateNewSessionRequest): AuthenticateNewSessionResponse {
    const token = this.tokenRepo.get(request.tagUid);
    if (!token) {
      throw new BackendError("NOT_FOUND", `Token ${request.tagUid} is not registered`);
    }
    if (token.deactivated) {
      throw new BackendError("UNAUTHORIZED", `Token ${request.tagUid} has been deactivated`);
    }
    if (!this.userRepo.get(token.userId)) {
      throw new BackendError("NOT_FOUND", `User ${token.userId} not found`);
    }

    const authKey = this.keyService.authorizationKey(parseTagUid(token.tagUid));
    try {
      const challenge = beginMutualAuthentication(
        parseHexToBytes(request.tagChallenge),
        authKey,
        this.random,
      );
      const sessionId = this.nextSessionId();
      this.sessionRepo.create({
        sessionId,
        tagUid: token.tagUid,
        userId: token.userId,
        createdAt: new Date(this.clock.now()),
        authenticated: false,
        inProgressAuth: { rndA: challenge.rndA, rndB: challenge.rndB },
      });
      logger.info("Authentication started", { sessionId, tagUid: token.tagUid });
      return { sessionId, cloudChallenge: bytesToHex(challenge.cloudChallenge) };
    } finally {
      zeroize(authKey);
    }
  }

  /**
   * Second handshake round. Every refusal is a `rejected` result; the
   * pending handshake is discarded either way.
   */
  completeAuthentication(request: CompleteAuthenticationRequest): CompleteAuthenticationResponse {
    const session = this.sessionRepo.get(request.sessionId);
    if (!session || session.authenticated || !session.inProgressAuth) {
      logger.warn("No authentication in progress", { sessionId: request.sessionId });
      return rejected("No authentication in progress for this session");
    }

    const { rndA, rndB } = session.inProgressAuth;
    const log = logger.child({ sessionId: session.sessionId, tagUid: session.tagUid });

    const token = this.tokenRepo.get(session.tagUid);
    const user = this.userRepo.get(session.userId);
    if (!token || token.deactivated || !user) {
      this.discard(session);
      log.info("Token or user no longer valid");
      return rejected(!user ? "User not found" : "Token is not valid");
    }

    const authKey = this.keyService.authorizationKey(parseTagUid(session.tagUid));
    try {
      const result = completeMutualAuthentication(
        parseHexToBytes(request.encryptedTagResponse),
        authKey,
        rndA,
      );
      const sessionKeys = deriveSessionKeys(authKey, rndA, rndB);
      const keyCheckValue = bytesToHex(aesCmac(sessionKeys.macKey, result.transactionId));
      zeroize(sessionKeys.encKey, sessionKeys.macKey);
      zeroize(rndA, rndB);

      const now = new Date(this.clock.now());
      const expiresAt = calculateSessionExpiration(now, this.timezone);
      this.sessionRepo.update(session.sessionId, {
        authenticated: true,
        expiresAt,
        inProgressAuth: undefined,
        keyCheckValue,
      });
      log.info("Authentication completed", { userId: user.userId, expiresAt: expiresAt.toISOString() });

      return { result: { type: "newSession", session: this.toRecord(session, user) } };
    } catch (error) {
      this.discard(session);
      if (error instanceof MutualAuthenticationError) {
        log.warn("Tag failed mutual authentication");
        return rejected("Authentication failed");
      }
      log.error("Authentication could not be completed", toError(error));
      throw error;
    } finally {
      zeroize(authKey);
    }
  }

  /**
   * CMAC of the transaction identifier under the session MAC key, for
   * checking that both sides derived the same keys.
   */
  getKeyCheckValue(sessionId: string): string | undefined {
    return this.sessionRepo.get(sessionId)?.keyCheckValue;
  }

  cleanup(): number {
    return this.sessionRepo.cleanup(new Date(this.clock.now()), this.pendingAuthTtlMs);
  }

  getActiveCount(): number {
    return this.sessionRepo.countActive(new Date(this.clock.now()));
  }

  private discard(session: SessionData): void {
    if (session.inProgressAuth) {
      zeroize(session.inProgressAuth.rndA, session.inProgressAuth.rndB);
    }
    this.sessionRepo.delete(session.sessionId);
  }

  private toRecord(session: SessionData, user: UserData): TokenSessionRecord {
    if (!session.expiresAt) {
      throw new Error(`Session ${session.sessionId} has no expiration`);
    }
    return {
      tagUid: session.tagUid,
      sessionId: session.sessionId,
      expirationUnixSeconds: Math.floor(session.expiresAt.getTime() / 1000),
      userId: user.userId,
      userLabel: user.label,
      permissions: [...user.permissions],
    };
  }
}
