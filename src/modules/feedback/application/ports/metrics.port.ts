export type WebhookDeliveryKind =
  | 'challenge'
  | 'message'
  | 'ignored'
  | 'duplicate'
  | 'action';

export type SignatureRejectionReason =
  | 'missing_headers'
  | 'stale_timestamp'
  | 'signature_mismatch';

export type SubmissionRejectionReason =
  | 'rating_required'
  | 'already_submitted'
  | 'session_not_found';

export interface MetricsPort {
  incrementWebhookDelivery(kind: WebhookDeliveryKind): void;

  incrementSignatureRejected(reason: SignatureRejectionReason): void;

  incrementSessionStarted(): void;

  incrementFeedbackSubmitted(rating: number): void;

  incrementSubmissionRejected(reason: SubmissionRejectionReason): void;

  incrementStaleAction(actionType: string): void;

  observeSubmissionLatency(seconds: number): void;
}
