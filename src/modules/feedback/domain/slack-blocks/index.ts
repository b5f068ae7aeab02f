export {
  buildFeedbackConfirmationMessage,
  buildFeedbackFormMessage,
  buildFeedbackPromptMessage,
  buildFeedbackThankYouMessage,
} from './build-feedback-messages';
export {
  FEEDBACK_ACTION_IDS,
  FEEDBACK_BLOCK_IDS,
  FEEDBACK_COMMENT_MAX_LENGTH,
} from './constants';
export type { SlackBlock, SlackMessageContent } from './types';
