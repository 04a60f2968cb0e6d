const TAG_PATTERN = /<[^>]*>/g;
const SPACE_RUN_PATTERN = / {2,}/g;

/**
 * Strip markup from provider instruction text.
 *
 * Tags become a single space so adjacent words stay apart, runs of spaces are
 * collapsed, and the ends are trimmed. Applying it twice changes nothing.
 */
export function stripMarkup(text: string): string {
  return text.replace(TAG_PATTERN, ' ').replace(SPACE_RUN_PATTERN, ' ').trim();
}
