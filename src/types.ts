export const CONTENT_TYPES = ['article', 'page'] as const;
export const STATUSES = ['draft', 'hidden', 'published'] as const;
export const MARKUPS = ['md', 'rst'] as const;

export type ContentType = (typeof CONTENT_TYPES)[number];
export type Status = (typeof STATUSES)[number];
export type Markup = (typeof MARKUPS)[number];

/**
 * Everything needed to generate one article or page file.
 *
 * Note: markup is still raw user input at this point. It is narrowed to
 * {@link Markup} by the validator before generation.
 */
export interface ArticleRequest {
  contentType: ContentType;
  title: string;
  slug?: string;
  tags: string[];
  category?: string;
  author: string;
  status?: Status;
  markup: string;
  path: string;
}

export type ValidatedArticleRequest = Omit<ArticleRequest, 'markup'> & { markup: Markup };

export interface GeneratedArticle {
  content: string;
  path: string;
  slug: string;
}
