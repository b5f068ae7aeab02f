import { isRecord, readRecord } from '../../../../common/utils/object.utils';
import { resolveOptionalString } from '../../../../common/utils/string.utils';
import { InvalidSlackPayloadError } from '../errors';
import type { SlackEventEnvelope } from './types';

/**
 * Classifies the JSON body of an Events API delivery.
 * Only plain user messages are routed; edits, joins, bot posts (including this app's own
 * replies) and every other event type come back as `ignored`.
 */
export function parseSlackEventEnvelope(body: unknown): SlackEventEnvelope {
  if (!isRecord(body)) {
    throw new InvalidSlackPayloadError('Event body must be a JSON object');
  }

  if (body.type === 'url_verification') {
    const token = body.challenge;
    if (typeof token !== 'string' || token.length === 0) {
      throw new InvalidSlackPayloadError('url_verification without challenge');
    }

    return { kind: 'challenge', token };
  }

  const eventId = resolveOptionalString(body.event_id);

  if (body.type !== 'event_callback') {
    return { kind: 'ignored', reason: 'unsupported_envelope', eventId };
  }

  const event = readRecord(body, 'event');
  if (!event) {
    throw new InvalidSlackPayloadError('event_callback without event object');
  }

  if (event.type !== 'message') {
    return { kind: 'ignored', reason: 'unsupported_event', eventId };
  }

  if (event.subtype !== undefined) {
    return { kind: 'ignored', reason: 'message_subtype', eventId };
  }

  if (event.bot_id !== undefined) {
    return { kind: 'ignored', reason: 'bot_message', eventId };
  }

  const userId = resolveOptionalString(event.user);
  if (!userId) {
    return { kind: 'ignored', reason: 'missing_user', eventId };
  }

  const channelId = resolveOptionalString(event.channel);
  const ts = resolveOptionalString(event.ts);
  if (!channelId || !ts) {
    throw new InvalidSlackPayloadError('message event without channel or ts');
  }

  return {
    kind: 'message',
    eventId,
    channelId,
    userId,
    text: typeof event.text === 'string' ? event.text : '',
    ts,
    threadTs: resolveOptionalString(event.thread_ts) ?? ts,
  };
}
