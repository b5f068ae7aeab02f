export type { FeedbackRecord } from './types';
