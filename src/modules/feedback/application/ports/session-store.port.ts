import type { FeedbackSession } from '../../domain/session';

export type SessionMutator = (current: FeedbackSession | undefined) => FeedbackSession;

/**
 * Keyed store of live feedback sessions.
 * `upsert` applies the mutator synchronously; `runExclusive` serializes asynchronous
 * work per key so read-check-write sequences spanning an await are linearized.
 */
export interface SessionStorePort {
  get(key: string): FeedbackSession | undefined;
  upsert(key: string, mutator: SessionMutator): FeedbackSession;
  remove(key: string): void;
  runExclusive<T>(key: string, task: () => Promise<T>): Promise<T>;
}
