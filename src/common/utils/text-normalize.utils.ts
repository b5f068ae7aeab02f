/**
 * Text normalization helpers shared by trigger detection and metadata extraction.
 */

/**
 * Collapses every run of whitespace (including Slack's newlines and tabs) into a single space.
 * Case and punctuation are preserved.
 */
export function collapseWhitespace(text: string): string {
  return typeof text === 'string' ? text.replace(/\s+/g, ' ').trim() : '';
}

/**
 * Normalization for phrase comparison:
 * - lowercase
 * - diacritics removed ("é" -> "e")
 * - punctuation replaced with spaces
 * - whitespace collapsed and trimmed
 */
export function normalizeTextForSearch(value: string): string {
  return value
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/[^\w\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Substring match of a phrase against text, both normalized with normalizeTextForSearch.
 * An empty phrase never matches.
 */
export function containsNormalizedPhrase(text: string, phrase: string): boolean {
  const normalizedPhrase = normalizeTextForSearch(phrase);
  if (normalizedPhrase.length === 0) {
    return false;
  }

  return normalizeTextForSearch(text).includes(normalizedPhrase);
}
