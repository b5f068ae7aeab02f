import type { ExtractedMetadata } from '../session';
import { listRatingValues, type RatingRange } from '../rating';
import { encodeMetadataValue } from '../resolution-metadata';
import {
  FEEDBACK_ACTION_IDS,
  FEEDBACK_BLOCK_IDS,
  FEEDBACK_COMMENT_MAX_LENGTH,
} from './constants';
import type { SlackBlock, SlackMessageContent } from './types';

const PROMPT_TEXT = 'Would you like to share feedback on how this conversation went?';

export function buildFeedbackPromptMessage(input: {
  metadata: ExtractedMetadata;
}): SlackMessageContent {
  return {
    text: PROMPT_TEXT,
    blocks: [
      {
        type: 'section',
        block_id: FEEDBACK_BLOCK_IDS.prompt,
        text: { type: 'mrkdwn', text: PROMPT_TEXT },
      },
      {
        type: 'actions',
        block_id: FEEDBACK_BLOCK_IDS.promptActions,
        elements: [
          {
            type: 'button',
            action_id: FEEDBACK_ACTION_IDS.showForm,
            text: { type: 'plain_text', text: 'Yes, give feedback' },
            value: encodeMetadataValue(input.metadata),
            style: 'primary',
          },
        ],
      },
    ],
  };
}

export function buildFeedbackFormMessage(input: {
  userName?: string;
  ratingRange: RatingRange;
}): SlackMessageContent {
  const greeting = input.userName ? `Thanks, ${escapeMrkdwn(input.userName)}!` : 'Thanks!';
  const intro =
    `${greeting} How would you rate this conversation ` +
    `(${input.ratingRange.min} = poor, ${input.ratingRange.max} = excellent)?`;

  const blocks: SlackBlock[] = [
    {
      type: 'section',
      block_id: FEEDBACK_BLOCK_IDS.rating,
      text: { type: 'mrkdwn', text: intro },
      accessory: {
        type: 'static_select',
        action_id: FEEDBACK_ACTION_IDS.ratingSelect,
        placeholder: { type: 'plain_text', text: 'Select a rating' },
        options: listRatingValues(input.ratingRange).map((value) => ({
          text: { type: 'plain_text', text: `${value} / ${input.ratingRange.max}` },
          value: String(value),
        })),
      },
    },
    {
      type: 'input',
      block_id: FEEDBACK_BLOCK_IDS.comments,
      dispatch_action: true,
      optional: true,
      label: { type: 'plain_text', text: 'Anything else you would like to add?' },
      element: {
        type: 'plain_text_input',
        action_id: FEEDBACK_ACTION_IDS.feedbackText,
        placeholder: { type: 'plain_text', text: 'Type a comment and press Enter' },
        max_length: FEEDBACK_COMMENT_MAX_LENGTH,
        dispatch_action_config: { trigger_actions_on: ['on_enter_pressed'] },
      },
    },
    {
      type: 'actions',
      block_id: FEEDBACK_BLOCK_IDS.submit,
      elements: [
        {
          type: 'button',
          action_id: FEEDBACK_ACTION_IDS.submit,
          text: { type: 'plain_text', text: 'Submit feedback' },
          value: 'submit',
          style: 'primary',
        },
      ],
    },
  ];

  return { text: intro, blocks };
}

/**
 * Static replacement for the form once the submission is stored; carries no interactive elements.
 */
export function buildFeedbackConfirmationMessage(input: {
  rating: number;
  comments?: string;
  ratingRange: RatingRange;
}): SlackMessageContent {
  const lines = [`:white_check_mark: Feedback received: *${input.rating} / ${input.ratingRange.max}*`];
  const comments = input.comments?.trim();
  if (comments) {
    lines.push(`> ${escapeMrkdwn(comments).replace(/\n/g, '\n> ')}`);
  }

  const text = lines.join('\n');

  return {
    text,
    blocks: [
      {
        type: 'section',
        block_id: FEEDBACK_BLOCK_IDS.confirmation,
        text: { type: 'mrkdwn', text },
      },
    ],
  };
}

export function buildFeedbackThankYouMessage(input: { userId: string }): SlackMessageContent {
  return {
    text: `Thank you for your feedback, <@${input.userId}>!`,
  };
}

function escapeMrkdwn(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}
