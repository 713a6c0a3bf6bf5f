import { v4 as uuidv4 } from 'uuid';
import { SessionRepository } from '../repositories/types';
import { Session } from '../types/session';
import { SessionNotFoundError } from '../utils/errors';
import { KeyedMutex } from '../utils/KeyedMutex';
import { errorMessage, logger } from '../utils/logger';
import { createSessionRecord, resetSession, touch } from './SessionRecord';

export interface SessionStoreOptions {
  maxSessions: number;
  now?: () => Date;
}

export interface WithSessionOptions {
  createIfMissing?: boolean;
}

const EVICTION_FRACTION = 0.1;

/**
 * Owns every live session. Writes for one session id go through a per-id
 * lock; a unit of work sees a private copy of the record and its changes
 * are committed only when it resolves. Reads of a cached session return the
 * last committed copy without waiting for that lock.
 *
 * Longer work that spans several commits (a chat turn) is ordered through
 * `queue`, which uses its own per-id lock so readers and short writers are
 * never held up by it.
 */
export class SessionStore {
  private cache = new Map<string, Session>();
  private locks = new KeyedMutex();
  private turns = new KeyedMutex();
  private readonly now: () => Date;

  constructor(
    private readonly repository: SessionRepository,
    private readonly options: SessionStoreOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  get size(): number {
    return this.cache.size;
  }

  async create(sessionId?: string): Promise<Session> {
    const id = sessionId ?? uuidv4();
    return this.withSession(id, async (session) => session, { createIfMissing: true });
  }

  async get(sessionId: string): Promise<Session | null> {
    const cached = this.cache.get(sessionId);
    if (cached) {
      return structuredClone(cached);
    }
    return this.locks.runExclusive(sessionId, async () => {
      const session = await this.loadUnlocked(sessionId);
      return session ? structuredClone(session) : null;
    });
  }

  async require(sessionId: string): Promise<Session> {
    const session = await this.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  /**
   * Runs `work` with exclusive access to the session. The copy handed to
   * `work` is committed (updatedAt bumped, persisted) only if it resolves;
   * a rejection leaves the stored session as it was.
   */
  async withSession<T>(
    sessionId: string,
    work: (session: Session) => Promise<T>,
    options: WithSessionOptions = {}
  ): Promise<T> {
    return this.locks.runExclusive(sessionId, async () => {
      let current = await this.loadUnlocked(sessionId);
      let created = false;
      if (!current) {
        if (!options.createIfMissing) {
          throw new SessionNotFoundError(sessionId);
        }
        current = createSessionRecord(sessionId, this.now());
        created = true;
      }

      const draft = structuredClone(current);
      const result = await work(draft);
      touch(draft, this.now());
      await this.repository.save(draft);
      this.cache.set(sessionId, structuredClone(draft));

      if (created) {
        logger.info('Session created', { sessionId });
        await this.evictIfFull(sessionId);
      }
      return result;
    });
  }

  // Runs `task` after every earlier queued task for the session has settled.
  async queue<T>(sessionId: string, task: () => Promise<T>): Promise<T> {
    return this.turns.runExclusive(sessionId, task);
  }

  async reset(sessionId: string): Promise<Session> {
    return this.withSession(sessionId, async (session) => {
      resetSession(session, this.now());
      logger.info('Session reset', { sessionId });
      return session;
    });
  }

  async delete(sessionId: string): Promise<boolean> {
    return this.locks.runExclusive(sessionId, async () => {
      const existed = this.cache.delete(sessionId) || (await this.repository.load(sessionId)) !== null;
      await this.repository.delete(sessionId);
      return existed;
    });
  }

  private async loadUnlocked(sessionId: string): Promise<Session | null> {
    const cached = this.cache.get(sessionId);
    if (cached) {
      return cached;
    }
    const stored = await this.repository.load(sessionId);
    if (stored) {
      this.cache.set(sessionId, stored);
      logger.debug('Session loaded from storage', { sessionId });
    }
    return stored;
  }

  /**
   * Drops the least recently updated tenth of the cache once it is full.
   * Sessions with a write or a queued turn in flight are skipped, as is the
   * one just created.
   */
  private async evictIfFull(keep: string): Promise<void> {
    if (this.cache.size < this.options.maxSessions) {
      return;
    }
    const quota = Math.max(1, Math.floor(this.cache.size * EVICTION_FRACTION));
    const candidates = [...this.cache.values()]
      .filter((session) => session.sessionId !== keep && !this.isBusy(session.sessionId))
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime())
      .slice(0, quota);

    const evicted: string[] = [];
    for (const { sessionId } of candidates) {
      await this.locks.runExclusive(sessionId, async () => {
        if (this.turns.isLocked(sessionId)) {
          return;
        }
        this.cache.delete(sessionId);
        evicted.push(sessionId);
        try {
          await this.repository.delete(sessionId);
        } catch (error) {
          logger.error('Failed to delete evicted session', {
            sessionId,
            error: errorMessage(error),
          });
        }
      });
    }
    logger.info('Evicted sessions', {
      evicted,
      remaining: this.cache.size,
    });
  }

  private isBusy(sessionId: string): boolean {
    return this.locks.isLocked(sessionId) || this.turns.isLocked(sessionId);
  }
}
