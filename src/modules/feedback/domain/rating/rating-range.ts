export interface RatingRange {
  min: number;
  max: number;
}

export function listRatingValues(range: RatingRange): number[] {
  const values: number[] = [];
  for (let value = range.min; value <= range.max; value += 1) {
    values.push(value);
  }
  return values;
}

export function isRatingInRange(value: number, range: RatingRange): boolean {
  return Number.isInteger(value) && value >= range.min && value <= range.max;
}

/**
 * Parses a rating coming from a select option value ("4").
 * Returns undefined for anything that is not an integer inside the range.
 */
export function parseRating(value: string, range: RatingRange): number | undefined {
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    return undefined;
  }

  const parsed = Number.parseInt(trimmed, 10);
  return isRatingInRange(parsed, range) ? parsed : undefined;
}
