import { InvalidMarkupError } from '../article/errors.js';
import { MARKUPS, type Markup } from '../types.js';

function isMarkup(value: string): value is Markup {
  return MARKUPS.some((markup) => markup === value);
}

/**
 * Checks the markup format case-insensitively.
 * @returns The normalized (lower-case) markup
 * @throws {InvalidMarkupError} if the markup is not supported
 */
export function validateMarkup(markup: string): Markup {
  const normalized = markup.trim().toLowerCase();
  if (!isMarkup(normalized)) {
    throw new InvalidMarkupError(markup);
  }
  return normalized;
}
