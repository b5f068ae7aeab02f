export { isRatingInRange, listRatingValues, parseRating, type RatingRange } from './rating-range';
