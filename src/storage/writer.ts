import * as defaultFs from 'node:fs/promises';

type FsModule = typeof defaultFs;

export interface ArticleWriter {
  /**
   * Writes the file, creating or truncating it.
   * Missing directories are not created.
   * @returns The path that was written
   */
  save(content: string, filePath: string): Promise<string>;
}

class ArticleWriterImpl implements ArticleWriter {
  constructor(private readonly fs: FsModule = defaultFs) {}

  async save(content: string, filePath: string): Promise<string> {
    // Filesystem errors (ENOENT, EACCES, ...) go to the caller unchanged
    await this.fs.writeFile(filePath, content, { encoding: 'utf8', flag: 'w' });
    return filePath;
  }
}

export function createArticleWriter(fs?: FsModule): ArticleWriter {
  return new ArticleWriterImpl(fs);
}
