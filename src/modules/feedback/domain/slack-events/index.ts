export { parseSlackEventEnvelope } from './parse-slack-event';
export { parseSlackInteraction } from './parse-slack-interaction';
export type {
  ActionEvent,
  ChallengeEvent,
  FeedbackAction,
  IgnoredEvent,
  IgnoredReason,
  InboundEvent,
  MessageEvent,
  SlackEventEnvelope,
  SlackInteraction,
} from './types';
