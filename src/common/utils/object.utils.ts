export function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === 'object' && input !== null && !Array.isArray(input);
}

/**
 * Reads a nested record property, returning undefined when it is missing or not an object.
 */
export function readRecord(
  input: Record<string, unknown>,
  key: string,
): Record<string, unknown> | undefined {
  const value = input[key];
  return isRecord(value) ? value : undefined;
}
