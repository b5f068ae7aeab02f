import type { Pool } from 'pg';
import type { FeedbackRecord } from '@/modules/feedback/domain/feedback-record';
import { ExternalServiceError } from '@/modules/feedback/domain/errors';
import { PgFeedbackRepository } from '@/modules/feedback/infrastructure/repositories';

describe('PgFeedbackRepository', () => {
  const record: FeedbackRecord = {
    id: '3f1f7a3e-1111-4c2d-9a55-2f1a3e9b0c01',
    channelId: 'C100',
    channelName: 'support',
    threadTs: '1700000000.000100',
    userId: 'U1',
    userName: 'Ada L',
    rating: 4,
    comments: 'great support',
    ticketId: 'SUP-1042',
    submittedAt: '2024-05-01T10:00:00.000Z',
  };

  function buildRepository(query: jest.Mock): PgFeedbackRepository {
    return new PgFeedbackRepository({ query } as unknown as Pool);
  }

  it('inserts with the session id as conflict key', async () => {
    const query = jest.fn().mockResolvedValue({ rowCount: 1, rows: [{ id: record.id }] });

    await expect(buildRepository(query).saveFeedback(record)).resolves.toEqual({ created: true });

    const [sql, params] = query.mock.calls[0];
    expect(sql).toContain('INSERT INTO feedback_records');
    expect(sql).toContain('ON CONFLICT (id)');
    expect(params).toEqual([
      record.id,
      'C100',
      'support',
      '1700000000.000100',
      'U1',
      'Ada L',
      4,
      'great support',
      'SUP-1042',
      null,
      '2024-05-01T10:00:00.000Z',
    ]);
  });

  it('reports a conflicting insert as not created', async () => {
    const query = jest.fn().mockResolvedValue({ rowCount: 0, rows: [] });

    await expect(buildRepository(query).saveFeedback(record)).resolves.toEqual({ created: false });
  });

  it('lists records newest first and maps rows', async () => {
    const query = jest.fn().mockResolvedValue({
      rowCount: 1,
      rows: [
        {
          id: record.id,
          channel_id: 'C100',
          channel_name: 'support',
          thread_ts: '1700000000.000100',
          user_id: 'U1',
          user_name: 'Ada L',
          rating: 4,
          comments: 'great support',
          ticket_id: 'SUP-1042',
          correlation_id: null,
          submitted_at: new Date('2024-05-01T10:00:00.000Z'),
        },
      ],
    });

    await expect(buildRepository(query).listFeedback({ limit: 25 })).resolves.toEqual([record]);

    const [sql, params] = query.mock.calls[0];
    expect(sql).toContain('ORDER BY submitted_at DESC');
    expect(params).toEqual([25]);
  });

  it('wraps driver failures as persistence errors', async () => {
    const query = jest.fn().mockRejectedValue(new Error('connection refused'));

    const error = await buildRepository(query)
      .saveFeedback(record)
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ExternalServiceError);
    expect(error).toMatchObject({
      message: 'Feedback persistence failed: connection refused',
      context: { service: 'persistence', operation: 'saveFeedback' },
    });
  });
});
