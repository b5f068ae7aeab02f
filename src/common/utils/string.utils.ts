/**
 * Trimmed, non-empty string or undefined. Slack sends ids and timestamps as strings,
 * but optional fields arrive as "", null or missing depending on the payload type.
 */
export function resolveOptionalString(value: unknown): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/** First candidate that resolves to a non-empty string, in order. */
export function firstNonEmptyString(...candidates: unknown[]): string | undefined {
  for (const candidate of candidates) {
    const resolved = resolveOptionalString(candidate);
    if (resolved) {
      return resolved;
    }
  }

  return undefined;
}
