import { Inject, Injectable } from '@nestjs/common';
import { Pool } from 'pg';
import type {
  FeedbackRepositoryPort,
  SaveFeedbackResult,
} from '../../application/ports/feedback-repository.port';
import { PG_POOL } from '../../application/ports/tokens';
import type { FeedbackRecord } from '../../domain/feedback-record';
import { ExternalServiceError } from '../../domain/errors';

interface FeedbackRow {
  id: string;
  channel_id: string;
  channel_name: string;
  thread_ts: string;
  user_id: string;
  user_name: string;
  rating: number;
  comments: string;
  ticket_id: string | null;
  correlation_id: string | null;
  submitted_at: Date | string;
}

@Injectable()
export class PgFeedbackRepository implements FeedbackRepositoryPort {
  constructor(@Inject(PG_POOL) private readonly pool: Pool) {}

  async saveFeedback(record: FeedbackRecord): Promise<SaveFeedbackResult> {
    try {
      const result = await this.pool.query<{ id: string }>(
        `INSERT INTO feedback_records (
           id,
           channel_id,
           channel_name,
           thread_ts,
           user_id,
           user_name,
           rating,
           comments,
           ticket_id,
           correlation_id,
           submitted_at
         )
         VALUES ($1::uuid, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11::timestamptz)
         ON CONFLICT (id)
         DO NOTHING
         RETURNING id::text`,
        [
          record.id,
          record.channelId,
          record.channelName,
          record.threadTs,
          record.userId,
          record.userName,
          record.rating,
          record.comments,
          record.ticketId ?? null,
          record.correlationId ?? null,
          record.submittedAt,
        ],
      );

      return { created: (result.rowCount ?? 0) > 0 };
    } catch (error: unknown) {
      throw toPersistenceError('saveFeedback', error);
    }
  }

  async listFeedback(input: { limit: number }): Promise<FeedbackRecord[]> {
    try {
      const result = await this.pool.query<FeedbackRow>(
        `SELECT id::text,
                channel_id,
                channel_name,
                thread_ts,
                user_id,
                user_name,
                rating,
                comments,
                ticket_id,
                correlation_id,
                submitted_at
         FROM feedback_records
         ORDER BY submitted_at DESC
         LIMIT $1`,
        [input.limit],
      );

      return result.rows.map(mapRow);
    } catch (error: unknown) {
      throw toPersistenceError('listFeedback', error);
    }
  }
}

function mapRow(row: FeedbackRow): FeedbackRecord {
  return {
    id: row.id,
    channelId: row.channel_id,
    channelName: row.channel_name,
    threadTs: row.thread_ts,
    userId: row.user_id,
    userName: row.user_name,
    rating: Number(row.rating),
    comments: row.comments,
    ...(row.ticket_id ? { ticketId: row.ticket_id } : {}),
    ...(row.correlation_id ? { correlationId: row.correlation_id } : {}),
    submittedAt:
      row.submitted_at instanceof Date ? row.submitted_at.toISOString() : String(row.submitted_at),
  };
}

function toPersistenceError(operation: string, error: unknown): ExternalServiceError {
  const detail = error instanceof Error ? error.message : String(error);
  return new ExternalServiceError(
    `Feedback persistence failed: ${detail}`,
    0,
    'network',
    { service: 'persistence', operation },
  );
}
