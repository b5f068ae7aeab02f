/**
 * Durable result of one completed feedback session. `id` is the session id, so a
 * session can produce at most one record.
 */
export interface FeedbackRecord {
  id: string;
  channelId: string;
  channelName: string;
  threadTs: string;
  userId: string;
  userName: string;
  rating: number;
  comments: string;
  ticketId?: string;
  correlationId?: string;
  submittedAt: string;
}
