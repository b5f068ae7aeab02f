export type SessionStage = 'prompted' | 'form_displayed' | 'submitted';

export interface ExtractedMetadata {
  ticketId?: string;
  correlationId?: string;
}

/**
 * One user's feedback conversation inside one Slack thread.
 * `submitted` only ever moves from false to true; rating and comments are frozen after that.
 */
export interface FeedbackSession {
  sessionId: string;
  key: string;
  userId: string;
  channelId: string;
  threadTs: string;
  stage: SessionStage;
  rating?: number;
  comments?: string;
  promptMessageTs?: string;
  formMessageTs?: string;
  submitted: boolean;
  submittedAt?: string;
  extractedMetadata: ExtractedMetadata;
  createdAt: string;
  updatedAt: string;
}
