export { createArticleWriter, type ArticleWriter } from './writer.js';
