/**
 * Session Repository
 * Token sessions, from the first authentication round until expiry
 */

export interface SessionData {
  sessionId: string;
  tagUid: string;
  userId: string;
  createdAt: Date;
  /** Set once the tag completed authentication */
  expiresAt?: Date;
  authenticated: boolean;
  /** Handshake randoms, cleared when the handshake ends */
  inProgressAuth?: { rndA: Uint8Array; rndB: Uint8Array };
  /** CMAC of the transaction identifier under the session MAC key */
  keyCheckValue?: string;
}

export class SessionRepository {
  private sessions = new Map<string, SessionData>();

  create(data: SessionData): void {
    this.sessions.set(data.sessionId, data);
  }

  get(sessionId: string): SessionData | undefined {
    return this.sessions.get(sessionId);
  }

  update(sessionId: string, partial: Partial<SessionData>): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return false;
    }
    Object.assign(session, partial);
    return true;
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  /**
   * Authenticated, unexpired session for the tag, newest first
   */
  findActiveByTagUid(tagUid: string, now: Date): SessionData | undefined {
    let found: SessionData | undefined;
    for (const session of this.sessions.values()) {
      if (
        session.tagUid === tagUid &&
        session.authenticated &&
        session.expiresAt !== undefined &&
        session.expiresAt > now &&
        (!found || session.createdAt > found.createdAt)
      ) {
        found = session;
      }
    }
    return found;
  }

  /**
   * Drop expired sessions and handshakes abandoned for longer than `maxPendingMs`
   */
  cleanup(now: Date, maxPendingMs: number): number {
    let count = 0;
    for (const [id, session] of this.sessions.entries()) {
      const expired = session.expiresAt !== undefined && session.expiresAt <= now;
      const abandoned =
        !session.authenticated && now.getTime() - session.createdAt.getTime() > maxPendingMs;
      if (expired || abandoned) {
        this.sessions.delete(id);
        count++;
      }
    }
    return count;
  }

  countActive(now: Date): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (session.authenticated && session.expiresAt !== undefined && session.expiresAt > now) {
        count++;
      }
    }
    return count;
  }

  count(): number {
    return this.sessions.size;
  }
}
