import { Injectable, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createLogger } from '../../../../common/utils/logger';
import type {
  SessionMutator,
  SessionStorePort,
} from '../../application/ports/session-store.port';
import type { FeedbackSession } from '../../domain/session';

const DEFAULT_TTL_MS = 86_400_000;
const SWEEP_INTERVAL_MS = 60_000;

type Clock = () => number;

interface StoredSession {
  session: FeedbackSession;
  touchedAt: number;
}

/**
 * Process-local session store.
 *
 * Entries expire `FEEDBACK_SESSION_TTL_MS` after their last write; expired entries read as
 * absent and are swept at most once per minute, on access. Each key owns a promise chain so
 * tasks passed to `runExclusive` for the same key run one after another while other keys
 * proceed in parallel.
 */
@Injectable()
export class InMemorySessionStore implements SessionStorePort {
  private readonly logger = createLogger(InMemorySessionStore.name);
  private readonly entries = new Map<string, StoredSession>();
  private readonly tails = new Map<string, Promise<void>>();
  private readonly ttlMs: number;
  private lastSweepAt: number;

  constructor(
    private readonly configService: ConfigService,
    @Optional()
    private readonly clock: Clock = Date.now,
  ) {
    this.ttlMs = this.configService.get<number>('FEEDBACK_SESSION_TTL_MS') ?? DEFAULT_TTL_MS;
    this.lastSweepAt = this.clock();
  }

  get(key: string): FeedbackSession | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.isExpired(entry, this.clock())) {
      this.entries.delete(key);
      return undefined;
    }

    return entry.session;
  }

  upsert(key: string, mutator: SessionMutator): FeedbackSession {
    this.sweepIfDue();

    const next = mutator(this.get(key));
    this.entries.set(key, { session: next, touchedAt: this.clock() });
    return next;
  }

  remove(key: string): void {
    this.entries.delete(key);
  }

  size(): number {
    return this.entries.size;
  }

  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const result = previous.then(task);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );

    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    });

    return result;
  }

  private sweepIfDue(): void {
    const now = this.clock();
    if (now - this.lastSweepAt < SWEEP_INTERVAL_MS) {
      return;
    }

    this.lastSweepAt = now;
    let evicted = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(key);
        evicted += 1;
      }
    }

    if (evicted > 0) {
      this.logger.debug('feedback_sessions_evicted', {
        event: 'feedback_sessions_evicted',
        evicted,
        remaining: this.entries.size,
      });
    }
  }

  private isExpired(entry: StoredSession, now: number): boolean {
    return now - entry.touchedAt >= this.ttlMs;
  }
}
