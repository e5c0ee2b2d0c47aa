import * as path from 'node:path';
import type { Services } from '../services.js';
import type { Config } from '../../config/types.js';
import type { Prompter } from '../prompter.js';
import {
  CONTENT_TYPES,
  MARKUPS,
  STATUSES,
  type ArticleRequest,
  type ContentType,
  type Markup,
  type Status,
} from '../../types.js';
import { MissingTitleError } from '../../article/errors.js';
import { generateArticle } from '../../article/generator.js';
import { validateMarkup } from '../../utils/validation.js';

export interface NewCommandOptions {
  title?: string;
  contentType?: ContentType;
  author?: string;
  tags?: string;
  category?: string;
  slug?: string;
  status?: Status;
  path?: string;
  markup?: string;
  /** undefined means "use the config" */
  prompt?: boolean;
  /** Alternate spelling of --no-prompt */
  noprompt?: boolean;
  /** Explicit config file */
  config?: string;
}

/**
 * Parses tags from CLI argument format.
 * Format: comma-separated "a, b,c" -> ["a", "b", "c"]
 */
function parseTags(tagsArg?: string): string[] {
  if (!tagsArg || tagsArg.trim() === '') {
    return [];
  }

  return tagsArg
    .split(',')
    .map((t) => t.trim())
    .filter((t) => t !== '');
}

/**
 * Returns the trimmed value, or undefined for missing and blank values.
 */
function optional(value?: string): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Collects request fields from CLI flags, falling back to config values.
 * Precedence: flag -> config file -> built-in default.
 */
function collectArguments(options: NewCommandOptions, config: Config): ArticleRequest {
  return {
    contentType: options.contentType ?? config.contentType,
    title: options.title?.trim() ?? '',
    slug: optional(options.slug),
    tags: parseTags(options.tags),
    category: optional(options.category),
    author: optional(options.author) ?? config.author,
    status: options.status ?? config.status,
    markup: options.markup ?? config.markup,
    path: options.path ?? config.path,
  };
}

/**
 * Asks for every field in turn, pre-filled with the collected values.
 *
 * @param values - Values collected from flags and config
 * @param explicitPath - Whether --path was given; otherwise the path defaults
 *   to a per-type subdirectory ("content/articles", "content/pages")
 */
async function interactive(
  values: ArticleRequest,
  prompter: Prompter,
  explicitPath = false,
): Promise<ArticleRequest> {
  const contentType = await prompter.select({
    message: 'Content Type:',
    choices: CONTENT_TYPES,
    default: values.contentType,
  });
  const title = await prompter.input({
    message: 'Content Title:',
    default: values.title,
    validate: (text) => text !== '' || new MissingTitleError().message,
  });
  const author = await prompter.input({ message: 'Author name:', default: values.author });
  const tags = await prompter.input({
    message: 'Tags (comma separated):',
    default: values.tags.join(','),
  });
  const category = await prompter.input({ message: 'Category:', default: values.category ?? '' });
  const slug = await prompter.input({ message: 'Slug:', default: values.slug ?? '' });
  const status = await prompter.select({
    message: 'Status:',
    choices: STATUSES,
    default: values.status,
  });
  const markup = await prompter.select({
    message: 'Markup Style:',
    choices: MARKUPS,
    default: MARKUPS.find((m) => m === values.markup.toLowerCase()),
  });
  const filePath = await prompter.input({
    message: 'File path:',
    default: explicitPath ? values.path : path.join(values.path, `${contentType}s`),
  });

  return {
    ...values,
    contentType,
    title,
    author,
    tags: parseTags(tags),
    category: optional(category),
    slug: optional(slug),
    status,
    markup,
    path: filePath || values.path,
  };
}

/**
 * Lets the user edit the generated content before it is saved.
 */
async function review(content: string, markup: Markup, prompter: Prompter): Promise<string> {
  return prompter.editor({ message: 'Review', default: content, postfix: `.${markup}` });
}

/**
 * Main implementation of the new article command.
 * @returns Path of the written file
 */
export async function newCommand(options: NewCommandOptions, services: Services): Promise<string> {
  // 1. Load config (flags override it)
  const config = await services.config.load(options.config);

  // 2. Collect values from flags
  const values = collectArguments(options, config);

  // 3. Prompt for the rest
  const prompt = options.noprompt ? false : (options.prompt ?? config.prompt);
  const request = prompt
    ? await interactive(values, services.prompter, options.path !== undefined)
    : values;

  if (!request.title) {
    throw new MissingTitleError();
  }

  // 4. Validate before anything is written
  const markup = validateMarkup(request.markup);

  // 5. Generate content and target path
  const article = generateArticle({ ...request, markup });

  // 6. Review
  const content = prompt
    ? await review(article.content, markup, services.prompter)
    : article.content;

  // 7. Save
  return services.writer.save(content, article.path);
}

// Export helper functions for testing
export { parseTags, collectArguments, interactive, review };
