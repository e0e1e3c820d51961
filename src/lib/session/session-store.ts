import { NotFoundError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import { KeyedMutex } from "@/lib/session/keyed-mutex";
import type { ConversationMessage, VideoSession } from "@/lib/session/types";

const HOUR_MS = 60 * 60 * 1000;

export const DEFAULT_ABSOLUTE_TTL_MS = 24 * HOUR_MS;
export const DEFAULT_SLIDING_TTL_MS = 4 * HOUR_MS;

export type VideoSessionStoreOptions = {
  /** Lifetime measured from the last `put`. */
  absoluteTtlMs?: number;
  /** Idle lifetime measured from the last read or write. */
  slidingTtlMs?: number;
  now?: () => number;
  logger?: Logger;
};

type CacheEntry = {
  session: VideoSession;
  createdAt: number;
  lastAccessAt: number;
};

/**
 * In-memory video session cache.
 *
 * Entries expire 24h after they were stored or 4h after their last access,
 * whichever comes first. Expired entries are dropped when touched and by `sweep`.
 * Summary and history updates are read-modify-write under a per-video lock, so
 * concurrent updates to one video are never lost while other videos proceed.
 */
export class VideoSessionStore {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly locks = new KeyedMutex();
  private readonly absoluteTtlMs: number;
  private readonly slidingTtlMs: number;
  private readonly now: () => number;
  private readonly logger?: Logger;

  constructor(options: VideoSessionStoreOptions = {}) {
    this.absoluteTtlMs = options.absoluteTtlMs ?? DEFAULT_ABSOLUTE_TTL_MS;
    this.slidingTtlMs = options.slidingTtlMs ?? DEFAULT_SLIDING_TTL_MS;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
  }

  async get(videoId: string): Promise<VideoSession | undefined> {
    const entry = this.touch(videoId);

    if (!entry) {
      this.logger?.debug({ videoId }, "session cache miss");
      return undefined;
    }

    this.logger?.debug({ videoId }, "session cache hit");
    return entry.session;
  }

  async exists(videoId: string): Promise<boolean> {
    return this.touch(videoId) !== undefined;
  }

  async put(session: VideoSession): Promise<void> {
    const now = this.now();

    this.entries.set(session.videoId, {
      session: freezeSession(session),
      createdAt: now,
      lastAccessAt: now,
    });

    this.logger?.info({ videoId: session.videoId, chunks: session.chunks.length }, "session cached");
  }

  async updateSummary(videoId: string, summary: string): Promise<void> {
    await this.update(videoId, (session) => ({ ...session, summary }));
    this.logger?.info({ videoId }, "session summary updated");
  }

  async addConversationMessage(videoId: string, message: ConversationMessage): Promise<void> {
    await this.update(videoId, (session) => ({
      ...session,
      conversationHistory: [...session.conversationHistory, Object.freeze({ ...message })],
    }));
    this.logger?.debug({ videoId, role: message.role }, "conversation message added");
  }

  /** Live entry count; expired entries are swept first. */
  size(): number {
    this.sweep();
    return this.entries.size;
  }

  sweep(): number {
    const now = this.now();
    let removed = 0;

    for (const [videoId, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(videoId);
        removed += 1;
      }
    }

    if (removed > 0) {
      this.logger?.debug({ removed }, "expired sessions swept");
    }

    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.locks.clear();
  }

  private async update(videoId: string, apply: (session: VideoSession) => VideoSession): Promise<void> {
    await this.locks.runExclusive(videoId, () => {
      const entry = this.touch(videoId);

      if (!entry) {
        this.logger?.warn({ videoId }, "update attempted on missing session");
        throw new NotFoundError(videoId);
      }

      entry.session = freezeSession(apply(entry.session));
    });
  }

  /** Returns the live entry and refreshes its sliding window, or evicts it. */
  private touch(videoId: string): CacheEntry | undefined {
    const entry = this.entries.get(videoId);

    if (!entry) {
      return undefined;
    }

    const now = this.now();

    if (this.isExpired(entry, now)) {
      this.entries.delete(videoId);
      this.logger?.debug({ videoId }, "session expired");
      return undefined;
    }

    entry.lastAccessAt = now;
    return entry;
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.createdAt >= this.absoluteTtlMs || now - entry.lastAccessAt >= this.slidingTtlMs;
  }
}

function freezeSession(session: VideoSession): VideoSession {
  return Object.freeze({
    ...session,
    metadata: freezeCopy(session.metadata),
    chunks: Object.freeze(session.chunks.map(freezeCopy)),
    conversationHistory: Object.freeze(session.conversationHistory.map(freezeCopy)),
  });
}

/** Frozen values are already owned by the store and are shared between versions. */
function freezeCopy<T extends object>(value: T): Readonly<T> {
  return Object.isFrozen(value) ? value : Object.freeze({ ...value });
}
