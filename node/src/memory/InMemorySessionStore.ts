import { logger } from '@/services/logger';
import type { SessionStore } from './SessionStore';
import type { SessionMemory } from './sessionMemory';

interface SessionEntry {
  memory: SessionMemory;
  timestamp: number;
}

export interface InMemorySessionStoreOptions {
  ttlMinutes?: number;
  maxSessions?: number;
  /** 0 disables the background sweep. */
  cleanupIntervalMs?: number;
  now?: () => number;
}

export class InMemorySessionStore implements SessionStore {
  private readonly memory = new Map<string, SessionEntry>();
  private readonly ttl: number;
  private readonly maxSessions: number;
  private readonly now: () => number;
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(options: InMemorySessionStoreOptions = {}) {
    this.ttl = (options.ttlMinutes ?? 30) * 60 * 1000;
    this.maxSessions = options.maxSessions ?? 1000;
    this.now = options.now ?? Date.now;
    this.startCleanupInterval(options.cleanupIntervalMs ?? 5 * 60 * 1000);
  }

  private startCleanupInterval(intervalMs: number): void {
    if (intervalMs <= 0) return;
    this.cleanupInterval = setInterval(() => this.cleanupExpiredSessions(), intervalMs);
    this.cleanupInterval.unref();
  }

  /** Drops idle sessions, then the oldest 20% when the store is full. */
  cleanupExpiredSessions(): number {
    const now = this.now();
    let cleaned = 0;

    for (const [sessionId, entry] of this.memory) {
      if (now - entry.timestamp > this.ttl) {
        this.memory.delete(sessionId);
        cleaned++;
      }
    }

    if (this.memory.size >= this.maxSessions) {
      const oldest = Array.from(this.memory.entries())
        .sort((a, b) => a[1].timestamp - b[1].timestamp)
        .slice(0, Math.max(1, Math.floor(this.memory.size * 0.2)));
      for (const [sessionId] of oldest) {
        this.memory.delete(sessionId);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.info('session:evicted', { cleaned, remaining: this.memory.size });
    }
    return cleaned;
  }

  async get(sessionId: string): Promise<SessionMemory | null> {
    const entry = this.memory.get(sessionId);
    if (!entry) return null;

    const now = this.now();
    if (now - entry.timestamp > this.ttl) {
      this.memory.delete(sessionId);
      logger.info('session:expired', { sessionId });
      return null;
    }

    entry.timestamp = now;
    return entry.memory;
  }

  async set(sessionId: string, memory: SessionMemory): Promise<void> {
    if (!this.memory.has(sessionId)) this.cleanupExpiredSessions();
    this.memory.set(sessionId, { memory, timestamp: this.now() });
  }

  async delete(sessionId: string): Promise<void> {
    if (this.memory.delete(sessionId)) {
      logger.info('session:ended', { sessionId });
    }
  }

  size(): number {
    return this.memory.size;
  }

  destroy(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
    this.memory.clear();
  }
}
