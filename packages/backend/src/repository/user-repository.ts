/**
 * User Repository
 */

export interface UserData {
  userId: string;
  label: string;
  permissions: string[];
}

export class UserRepository {
  private users = new Map<string, UserData>();

  upsert(user: UserData): void {
    this.users.set(user.userId, { ...user, permissions: [...user.permissions] });
  }

  get(userId: string): UserData | undefined {
    return this.users.get(userId);
  }

  count(): number {
    return this.users.size;
  }
}
