import type { ConfigService } from '@nestjs/config';
import type { RatingRange } from '../../../domain/rating';

const DEFAULT_RATING_MIN = 1;
const DEFAULT_RATING_MAX = 5;

export function resolveRatingRange(configService: ConfigService): RatingRange {
  return {
    min: configService.get<number>('FEEDBACK_RATING_MIN') ?? DEFAULT_RATING_MIN,
    max: configService.get<number>('FEEDBACK_RATING_MAX') ?? DEFAULT_RATING_MAX,
  };
}
