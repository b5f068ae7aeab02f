export { resolveRatingRange } from './resolve-rating-range';
export { SILENT_ACK, type InteractionReply } from './types';
