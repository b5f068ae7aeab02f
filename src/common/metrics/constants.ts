export const FEEDBACK_METRIC_WEBHOOK_DELIVERIES_TOTAL = 'feedback_webhook_deliveries_total';
export const FEEDBACK_METRIC_SIGNATURE_REJECTED_TOTAL = 'feedback_signature_rejected_total';
export const FEEDBACK_METRIC_SESSIONS_STARTED_TOTAL = 'feedback_sessions_started_total';
export const FEEDBACK_METRIC_SUBMITTED_TOTAL = 'feedback_submitted_total';
export const FEEDBACK_METRIC_SUBMISSION_REJECTED_TOTAL = 'feedback_submission_rejected_total';
export const FEEDBACK_METRIC_STALE_ACTIONS_TOTAL = 'feedback_stale_actions_total';
export const FEEDBACK_METRIC_SUBMISSION_LATENCY_SECONDS = 'feedback_submission_latency_seconds';

export const FEEDBACK_SUBMISSION_LATENCY_BUCKETS = [0.1, 0.25, 0.5, 1, 2, 5] as const;
