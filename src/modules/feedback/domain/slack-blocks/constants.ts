export const FEEDBACK_ACTION_IDS = {
  showForm: 'show_form',
  ratingSelect: 'rating_select',
  feedbackText: 'feedback_text',
  submit: 'submit_feedback',
} as const;

export const FEEDBACK_BLOCK_IDS = {
  prompt: 'feedback_prompt',
  promptActions: 'feedback_prompt_actions',
  rating: 'feedback_rating',
  comments: 'feedback_comments',
  submit: 'feedback_submit',
  confirmation: 'feedback_confirmation',
} as const;

export const FEEDBACK_COMMENT_MAX_LENGTH = 3000;
