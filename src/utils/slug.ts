import slugifyText from 'slugify';

/**
 * Characters dropped after transliteration.
 * Letters, digits, underscores, whitespace and hyphens survive.
 */
const REMOVE_REGEX = /[^\p{L}\p{N}_\s-]+/gu;

/**
 * Converts a title or custom slug into a filename- and URL-safe token:
 * transliterate, drop punctuation, lowercase, join words with single hyphens.
 *
 * Running the result through again returns it unchanged.
 */
export function slugify(value: string): string {
  // slugify turns '-' into a space, so hyphen runs collapse with whitespace
  return slugifyText(value, { lower: true, remove: REMOVE_REGEX })
    .normalize('NFKD')
    .replace(/\p{M}/gu, '');
}
