export { buildSessionKey } from './session-key';
export type { ExtractedMetadata, FeedbackSession, SessionStage } from './types';
