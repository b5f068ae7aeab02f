import type { ExtractedMetadata } from '../session';

export interface ChallengeEvent {
  kind: 'challenge';
  token: string;
}

export interface MessageEvent {
  kind: 'message';
  eventId?: string;
  channelId: string;
  userId: string;
  text: string;
  ts: string;
  threadTs: string;
}

export type IgnoredReason =
  | 'unsupported_envelope'
  | 'unsupported_event'
  | 'message_subtype'
  | 'bot_message'
  | 'missing_user'
  | 'unsupported_interaction'
  | 'no_actions';

export interface IgnoredEvent {
  kind: 'ignored';
  reason: IgnoredReason;
  eventId?: string;
}

export type FeedbackAction =
  | { type: 'show_form'; metadata: ExtractedMetadata }
  | { type: 'rating_selected'; value: string }
  | { type: 'comment_entered'; text: string }
  | { type: 'submit' }
  | { type: 'unrecognized'; actionId: string };

export interface ActionEvent {
  kind: 'action';
  userId: string;
  userName?: string;
  channelId: string;
  threadTs: string;
  messageTs?: string;
  action: FeedbackAction;
}

export type SlackEventEnvelope = ChallengeEvent | MessageEvent | IgnoredEvent;
export type SlackInteraction = ActionEvent | IgnoredEvent;
export type InboundEvent = SlackEventEnvelope | ActionEvent;
