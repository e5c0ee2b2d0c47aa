import type { ContentType, Markup, Status } from '../types.js';

/** Name of the project configuration file */
export const CONFIG_FILE_NAME = 'pelican-article.yml';

/** Output directory used when neither the config nor --path sets one */
export const DEFAULT_PATH = 'content';

export const DEFAULT_MARKUP: Markup = 'md';

export const DEFAULT_CONTENT_TYPE: ContentType = 'article';

export interface Config {
  /** Output directory; absolute when it came from a config file */
  path: string;
  markup: Markup;
  contentType: ContentType;
  author: string;
  status?: Status;
  /** Whether to prompt interactively when neither --prompt nor --no-prompt is given */
  prompt: boolean;
}

export interface ConfigService {
  load(path?: string): Promise<Config>;
  createDefault(contentDir?: string): Promise<{ created: boolean; message: string }>;
}
