/**
 * User-facing messages returned by the HTTP layer and the feedback workflow.
 */

export const BACKEND_ERROR_MESSAGE =
  'Something went wrong while handling this request. Please try again in a moment.';

export const INVALID_PAYLOAD_MESSAGE = 'invalid payload';

export const INVALID_SIGNATURE_MESSAGE = 'invalid signature';

export const RATING_REQUIRED_MESSAGE = 'Please select a rating before submitting your feedback.';

export const RATING_OUT_OF_RANGE_MESSAGE = 'That rating is not available. Please pick one from the list.';

export const ALREADY_SUBMITTED_MESSAGE = 'You have already submitted feedback for this conversation.';

export const FORM_EXPIRED_MESSAGE =
  'This feedback form has expired. Ask for a new one in the thread to start again.';
