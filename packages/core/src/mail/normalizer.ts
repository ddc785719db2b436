const RE_TAG = /<[^>]+>/g;
const RE_WHITESPACE = /\s+/g;

export function stripMarkup(text: string): string {
  return text.replace(RE_TAG, ' ');
}

/**
 * Text used for every keyword and pattern match: markup replaced by spaces,
 * whitespace collapsed, trimmed and lower-cased.
 */
export function normalizeText(text: string): string {
  return stripMarkup(text).replace(RE_WHITESPACE, ' ').trim().toLowerCase();
}
