/**
 * Conversation Context Store
 *
 * Remembers, per user, that they are in the middle of signing up as a
 * volunteer, so a follow-up like "I'll do it - Sarah" is understood
 * without mentioning the bot again.
 *
 * Entries expire `sessionTimeoutMin` minutes after their last activity.
 * There is no timer: every read or write first evicts expired entries.
 * State lives in memory only and is gone after a restart.
 */

import type { Clock, ConversationContext } from './types.js';
import { ReadWriteLock } from '../utils/rw-lock.js';
import { createLogger } from '../logger.js';

const log = createLogger('Context');

export const DEFAULT_SESSION_TIMEOUT_MIN = 3;

export interface ConversationContextStoreOptions {
  sessionTimeoutMin?: number;
  clock?: Clock;
}

export class ConversationContextStore {
  private contexts = new Map<string, ConversationContext>();
  private lock = new ReadWriteLock();
  private timeoutMs: number;
  private clock: Clock;

  constructor(options: ConversationContextStoreOptions = {}) {
    const minutes = options.sessionTimeoutMin ?? DEFAULT_SESSION_TIMEOUT_MIN;
    if (!Number.isFinite(minutes) || minutes <= 0) {
      throw new Error(`Session timeout must be a positive number of minutes, got ${minutes}`);
    }
    this.timeoutMs = minutes * 60_000;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Create or overwrite a user's context. Both timestamps are set to now.
   */
  async createOrUpdateContext(
    userId: string,
    displayName: string,
    volunteerIntent: boolean,
    mentionedBot: boolean,
  ): Promise<void> {
    await this.lock.withWrite(() => {
      const now = this.clock();
      this.evictExpired(now);
      this.contexts.set(userId, {
        userId,
        displayName,
        sessionStart: now,
        lastActivity: now,
        volunteerIntent,
        mentionedBot,
      });
      log.debug(`Opened context for ${displayName} (${userId})`);
    });
  }

  /**
   * Live context for a user, or undefined if none or expired.
   * Returns a copy; mutating it does not touch the store.
   */
  async getActiveContext(userId: string): Promise<ConversationContext | undefined> {
    await this.evict();
    return this.lock.withRead(() => {
      const context = this.contexts.get(userId);
      return context ? cloneContext(context) : undefined;
    });
  }

  /**
   * Refresh `lastActivity` for a live context. No-op when the user has none.
   */
  async updateActivity(userId: string): Promise<void> {
    await this.lock.withWrite(() => {
      const now = this.clock();
      this.evictExpired(now);
      const context = this.contexts.get(userId);
      if (context) {
        context.lastActivity = now;
      }
    });
  }

  async clearContext(userId: string): Promise<void> {
    await this.lock.withWrite(() => {
      this.evictExpired(this.clock());
      this.contexts.delete(userId);
    });
  }

  /**
   * Snapshot of every live context
   */
  async listActive(): Promise<ConversationContext[]> {
    await this.evict();
    return this.lock.withRead(() => Array.from(this.contexts.values(), cloneContext));
  }

  private async evict(): Promise<void> {
    await this.lock.withWrite(() => this.evictExpired(this.clock()));
  }

  // Caller must hold the write lock
  private evictExpired(now: Date): void {
    for (const [userId, context] of this.contexts) {
      if (now.getTime() - context.lastActivity.getTime() >= this.timeoutMs) {
        this.contexts.delete(userId);
        log.debug(`Expired context for ${context.displayName} (${userId})`);
      }
    }
  }
}

function cloneContext(context: ConversationContext): ConversationContext {
  return {
    ...context,
    sessionStart: new Date(context.sessionStart.getTime()),
    lastActivity: new Date(context.lastActivity.getTime()),
  };
}
