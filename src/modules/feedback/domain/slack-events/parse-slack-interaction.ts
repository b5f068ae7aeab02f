import { isRecord, readRecord } from '../../../../common/utils/object.utils';
import { firstNonEmptyString, resolveOptionalString } from '../../../../common/utils/string.utils';
import { InvalidSlackPayloadError } from '../errors';
import { decodeMetadataValue } from '../resolution-metadata';
import { FEEDBACK_ACTION_IDS } from '../slack-blocks/constants';
import type { FeedbackAction, SlackInteraction } from './types';

/**
 * Parses the `payload` field of an interactivity delivery (already JSON-decoded).
 * Only the first entry of `actions` is considered; Slack sends one per click.
 */
export function parseSlackInteraction(payload: unknown): SlackInteraction {
  if (!isRecord(payload)) {
    throw new InvalidSlackPayloadError('Interaction payload must be a JSON object');
  }

  if (payload.type !== 'block_actions') {
    return { kind: 'ignored', reason: 'unsupported_interaction' };
  }

  const actions = payload.actions;
  const firstAction = Array.isArray(actions) ? actions[0] : undefined;
  if (!isRecord(firstAction)) {
    return { kind: 'ignored', reason: 'no_actions' };
  }

  const user = readRecord(payload, 'user');
  const channel = readRecord(payload, 'channel');
  const container = readRecord(payload, 'container') ?? {};
  const message = readRecord(payload, 'message') ?? {};

  const userId = resolveOptionalString(user?.id);
  const channelId = firstNonEmptyString(channel?.id, container.channel_id);
  const messageTs = firstNonEmptyString(container.message_ts, message.ts);
  const threadTs = firstNonEmptyString(container.thread_ts, message.thread_ts, messageTs);

  if (!userId || !channelId || !threadTs) {
    throw new InvalidSlackPayloadError('block_actions without user, channel or message reference');
  }

  return {
    kind: 'action',
    userId,
    userName: firstNonEmptyString(user?.name, user?.username),
    channelId,
    threadTs,
    messageTs,
    action: parseAction(firstAction),
  };
}

function parseAction(action: Record<string, unknown>): FeedbackAction {
  const actionId = typeof action.action_id === 'string' ? action.action_id : '';

  switch (actionId) {
    case FEEDBACK_ACTION_IDS.showForm:
      return { type: 'show_form', metadata: decodeMetadataValue(action.value) };
    case FEEDBACK_ACTION_IDS.ratingSelect: {
      const selected = readRecord(action, 'selected_option');
      const value = selected?.value ?? action.value;
      return { type: 'rating_selected', value: typeof value === 'string' ? value : '' };
    }
    case FEEDBACK_ACTION_IDS.feedbackText:
      return {
        type: 'comment_entered',
        text: typeof action.value === 'string' ? action.value : '',
      };
    case FEEDBACK_ACTION_IDS.submit:
      return { type: 'submit' };
    default:
      return { type: 'unrecognized', actionId };
  }
}
