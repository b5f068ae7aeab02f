import { InvalidSlackPayloadError } from '@/modules/feedback/domain/errors';
import { parseSlackEventEnvelope } from '@/modules/feedback/domain/slack-events';

describe('parseSlackEventEnvelope', () => {
  function messageEnvelope(event: Record<string, unknown>): Record<string, unknown> {
    return {
      type: 'event_callback',
      event_id: 'Ev001',
      event: {
        type: 'message',
        channel: 'C100',
        user: 'U1',
        text: 'feedback please',
        ts: '1700000000.000100',
        ...event,
      },
    };
  }

  it('returns the challenge for url_verification', () => {
    expect(
      parseSlackEventEnvelope({ type: 'url_verification', challenge: 'challenge-token' }),
    ).toEqual({ kind: 'challenge', token: 'challenge-token' });
  });

  it('parses a top-level message and uses its ts as thread', () => {
    expect(parseSlackEventEnvelope(messageEnvelope({}))).toEqual({
      kind: 'message',
      eventId: 'Ev001',
      channelId: 'C100',
      userId: 'U1',
      text: 'feedback please',
      ts: '1700000000.000100',
      threadTs: '1700000000.000100',
    });
  });

  it('keeps thread_ts for replies', () => {
    const result = parseSlackEventEnvelope(
      messageEnvelope({ ts: '1700000050.000200', thread_ts: '1700000000.000100' }),
    );

    expect(result).toMatchObject({
      kind: 'message',
      ts: '1700000050.000200',
      threadTs: '1700000000.000100',
    });
  });

  const ignoredCases: Array<[string, Record<string, unknown>]> = [
    ['message_subtype', { subtype: 'message_changed' }],
    ['bot_message', { bot_id: 'B1' }],
    ['missing_user', { user: undefined }],
    ['unsupported_event', { type: 'reaction_added' }],
  ];

  it.each(ignoredCases)('ignores %s events', (reason, override) => {
    expect(parseSlackEventEnvelope(messageEnvelope(override))).toEqual({
      kind: 'ignored',
      reason,
      eventId: 'Ev001',
    });
  });

  it('ignores unknown envelope types', () => {
    expect(parseSlackEventEnvelope({ type: 'app_rate_limited' })).toEqual({
      kind: 'ignored',
      reason: 'unsupported_envelope',
    });
  });

  it('rejects malformed bodies', () => {
    expect(() => parseSlackEventEnvelope('not-json')).toThrow(InvalidSlackPayloadError);
    expect(() => parseSlackEventEnvelope({ type: 'url_verification' })).toThrow(
      'url_verification without challenge',
    );
    expect(() => parseSlackEventEnvelope({ type: 'event_callback' })).toThrow(
      'event_callback without event object',
    );
    expect(() => parseSlackEventEnvelope(messageEnvelope({ channel: undefined }))).toThrow(
      'message event without channel or ts',
    );
  });
});
