import type { FeedbackRecord } from '../../domain/feedback-record';

export interface SaveFeedbackResult {
  created: boolean;
}

export interface FeedbackRepositoryPort {
  /**
   * Appends a record. A second call with the same `id` must not create another row
   * and reports `created: false`.
   */
  saveFeedback(record: FeedbackRecord): Promise<SaveFeedbackResult>;
  /** Most recent first. */
  listFeedback(input: { limit: number }): Promise<FeedbackRecord[]>;
}
