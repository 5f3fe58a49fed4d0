/**
 * Session Registry
 * In-memory index of validated sessions by tag UID and by session id.
 */

import { createLogger, tagUidToHex, type TagUid } from "@workshop-access/shared";

import { TokenSession } from "./token-session.js";

const logger = createLogger("terminal:sessions");

export class SessionRegistry {
  private sessions = new Map<string, TokenSession>();
  private byTag = new Map<string, string>();

  getByTagUid(tagUid: TagUid): TokenSession | undefined {
    const sessionId = this.byTag.get(tagUidToHex(tagUid));
    return sessionId === undefined ? undefined : this.sessions.get(sessionId);
  }

  getBySessionId(sessionId: string): TokenSession | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * Registered session for the tag that is still valid at `now`.
   */
  getActiveByTagUid(tagUid: TagUid, now: number): TokenSession | undefined {
    const session = this.getByTagUid(tagUid);
    return session && session.isActive(now) ? session : undefined;
  }

  /**
   * Register a backend-issued session. Registering the same session id again
   * returns the instance already held.
   */
  register(record: unknown): TokenSession {
    const session = TokenSession.fromRecord(record);
    const existing = this.sessions.get(session.sessionId);
    if (existing) {
      logger.warn("Session already registered", { sessionId: session.sessionId });
      return existing;
    }

    const previousId = this.byTag.get(session.tagUidHex);
    if (previousId !== undefined) {
      this.sessions.delete(previousId);
    }

    this.sessions.set(session.sessionId, session);
    this.byTag.set(session.tagUidHex, session.sessionId);
    logger.info("Session registered", {
      sessionId: session.sessionId,
      tagUid: session.tagUidHex,
      userId: session.userId,
    });
    return session;
  }

  removeByTagUid(tagUid: TagUid): boolean {
    const key = tagUidToHex(tagUid);
    const sessionId = this.byTag.get(key);
    if (sessionId === undefined) {
      return false;
    }
    this.byTag.delete(key);
    this.sessions.delete(sessionId);
    return true;
  }

  pruneExpired(now: number): number {
    let count = 0;
    for (const [sessionId, session] of this.sessions.entries()) {
      if (!session.isActive(now)) {
        this.sessions.delete(sessionId);
        this.byTag.delete(session.tagUidHex);
        count++;
      }
    }
    return count;
  }

  size(): number {
    return this.sessions.size;
  }
}
