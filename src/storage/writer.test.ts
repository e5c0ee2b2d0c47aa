import { describe, it, expect, beforeEach } from 'vitest';
import { Volume } from 'memfs';
import { createArticleWriter, type ArticleWriter } from './index.js';

describe('ArticleWriter', () => {
  let vol: InstanceType<typeof Volume>;
  let writer: ArticleWriter;

  beforeEach(() => {
    vol = Volume.fromJSON({ '/content/existing.md': 'Title: Old title with a long body\n\n' });
    writer = createArticleWriter(vol.promises as unknown as typeof import('node:fs/promises'));
  });

  describe('save()', () => {
    it('should write the content and return the path', async () => {
      const result = await writer.save('Title: Hello\n\n', '/content/hello.md');

      expect(result).toBe('/content/hello.md');
      expect(vol.readFileSync('/content/hello.md', 'utf8')).toBe('Title: Hello\n\n');
    });

    it('should truncate an existing file', async () => {
      await writer.save('Title: New\n\n', '/content/existing.md');

      expect(vol.readFileSync('/content/existing.md', 'utf8')).toBe('Title: New\n\n');
    });

    it('should not create missing directories', async () => {
      await expect(writer.save('Title: Hello\n\n', '/missing/hello.md')).rejects.toMatchObject({
        code: 'ENOENT',
      });
      expect(vol.existsSync('/missing')).toBe(false);
    });
  });
});
