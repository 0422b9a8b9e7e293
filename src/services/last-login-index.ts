import { LoginEvent } from '../types/audit.types';

/**
 * Most recent sign-in per user. Timestamps are compared as raw strings,
 * which orders fixed-format ISO-8601 UTC values chronologically. A stored
 * value only ever moves forward; on a tie the first one seen stays.
 */
export class LastLoginIndex {
  private readonly lastLogins = new Map<string, string>();

  /**
   * Returns true when the event became the user's latest login
   */
  record(event: LoginEvent): boolean {
    const existing = this.lastLogins.get(event.userId);
    if (existing === undefined || event.loggedAt > existing) {
      this.lastLogins.set(event.userId, event.loggedAt);
      return true;
    }
    return false;
  }

  get(userId: string): string | undefined {
    return this.lastLogins.get(userId);
  }

  has(userId: string): boolean {
    return this.lastLogins.has(userId);
  }

  get size(): number {
    return this.lastLogins.size;
  }
}
