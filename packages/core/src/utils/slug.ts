import { CONSTRAINTS } from '../schemas/types.js';

// Whitespace, punctuation, symbols and underscores all become separators
const SEPARATOR_RUN = /[\s\p{P}\p{S}_]+/gu;
const COMBINING_MARKS = /\p{M}+/gu;
const OUTSIDE_SLUG_ALPHABET = /[^a-z0-9-]+/g;

/**
 * Derive a URL-safe identifier from a human-readable title.
 *
 * `deriveSlug('Hello, Wörld!')` is `'hello-world'`. The result only ever holds
 * `[a-z0-9-]` with no leading, trailing or doubled hyphens, so applying it to
 * its own output changes nothing. May return an empty string.
 */
export function deriveSlug(title: string, maxLength: number = CONSTRAINTS.SLUG.MAX_LENGTH): string {
  const slug = title
    .normalize('NFKD')
    .replace(COMBINING_MARKS, '')
    .toLowerCase()
    .replace(SEPARATOR_RUN, '-')
    .replace(OUTSIDE_SLUG_ALPHABET, '')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');

  return slug.slice(0, maxLength).replace(/-+$/, '');
}
