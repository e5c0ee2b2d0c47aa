import * as path from 'node:path';
import { format } from 'date-fns';
import type { GeneratedArticle, Markup, ValidatedArticleRequest } from '../types.js';
import { buildMarkdownHeader, buildRstHeader, type HeaderFormatter } from '../formatters/header.js';
import { slugify } from '../utils/slug.js';
import { EmptySlugError } from './errors.js';

/**
 * Date format Pelican reads from the header (minute precision, local time).
 */
export const DATE_FORMAT = 'yyyy-MM-dd HH:mm';

const HEADER_FORMATTERS: Record<Markup, HeaderFormatter> = {
  md: buildMarkdownHeader,
  rst: buildRstHeader,
};

/**
 * Derives the file slug from the explicit slug, or the title when none is given.
 */
export function deriveSlug(title: string, slug?: string): string {
  return slugify(slug || title).replace(/ /g, '-');
}

/**
 * Generates the file content and target path for a validated request.
 *
 * Articles get a timestamp, pages carry no date. No I/O is performed.
 *
 * @param request - Validated request fields
 * @param now - Moment used for the article date
 * @throws {EmptySlugError} If the slug source has no letters or digits
 */
export function generateArticle(
  request: ValidatedArticleRequest,
  now: Date = new Date(),
): GeneratedArticle {
  const slug = deriveSlug(request.title, request.slug);
  if (slug === '') {
    throw new EmptySlugError(request.slug || request.title);
  }
  const date = request.contentType === 'article' ? format(now, DATE_FORMAT) : undefined;

  const content = HEADER_FORMATTERS[request.markup]({
    title: request.title,
    date,
    author: request.author,
    categories: request.category ? [request.category] : undefined,
    tags: request.tags.length > 0 ? request.tags : undefined,
    slug,
    status: request.status,
  });

  return {
    content,
    path: path.join(request.path, `${slug}.${request.markup}`),
    slug,
  };
}
