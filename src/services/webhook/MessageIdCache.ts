/**
 * Message ID Cache
 * Prevents duplicate processing of WhatsApp webhook messages
 * Uses TTL-based expiration (48 hours to cover WhatsApp's retry window)
 */

import { logger } from '../../utils/logger';

const DEFAULT_TTL = 48 * 60 * 60 * 1000; // 48 hours (longer than WhatsApp's 24h retry window)

export class MessageIdCache {
  private cache: Map<string, number> = new Map(); // messageId -> timestamp

  constructor(
    private readonly ttl: number = DEFAULT_TTL,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Check if message ID has been processed
   * @returns true if already processed, false if new
   */
  has(messageId: string): boolean {
    const timestamp = this.cache.get(messageId);

    if (timestamp === undefined) {
      return false;
    }

    if (this.now() - timestamp > this.ttl) {
      this.cache.delete(messageId);
      return false;
    }

    return true;
  }

  /**
   * Mark message ID as processed
   */
  add(messageId: string): void {
    this.cache.set(messageId, this.now());
    logger.debug(`📝 Cached message ID: ${messageId.substring(0, 20)}...`);
  }

  /**
   * Records the id and reports whether it was new.
   */
  markIfNew(messageId: string): boolean {
    if (this.has(messageId)) {
      return false;
    }
    this.add(messageId);
    return true;
  }

  /**
   * Clear expired entries
   */
  cleanup(): number {
    const now = this.now();
    let cleaned = 0;

    for (const [messageId, timestamp] of this.cache.entries()) {
      if (now - timestamp > this.ttl) {
        this.cache.delete(messageId);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.debug(`🧹 Cleaned up ${cleaned} expired message IDs`);
    }
    return cleaned;
  }

  getStats(): { size: number; ttl: number } {
    return {
      size: this.cache.size,
      ttl: this.ttl
    };
  }
}
