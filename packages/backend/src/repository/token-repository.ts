/**
 * Token Repository
 * Registered NFC tags, keyed by lowercase UID hex
 */

export interface TokenData {
  tagUid: string;
  userId: string;
  label?: string;
  deactivated: boolean;
}

export class TokenRepository {
  private tokens = new Map<string, TokenData>();

  upsert(token: TokenData): void {
    this.tokens.set(token.tagUid.toLowerCase(), { ...token, tagUid: token.tagUid.toLowerCase() });
  }

  get(tagUid: string): TokenData | undefined {
    return this.tokens.get(tagUid.toLowerCase());
  }

  setDeactivated(tagUid: string, deactivated: boolean): boolean {
    const token = this.get(tagUid);
    if (!token) {
      return false;
    }
    token.deactivated = deactivated;
    return true;
  }

  count(): number {
    return this.tokens.size;
  }
}
