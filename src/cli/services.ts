import type { ConfigService } from '../config/types.js';
import type { ArticleWriter } from '../storage/writer.js';
import type { Prompter } from './prompter.js';
import { configService } from '../config/index.js';
import { createArticleWriter } from '../storage/writer.js';
import { createPrompter } from './prompter.js';

export interface Services {
  config: ConfigService;
  writer: ArticleWriter;
  prompter: Prompter;
}

export function createServices(): Services {
  return {
    config: configService,
    writer: createArticleWriter(),
    prompter: createPrompter(),
  };
}
