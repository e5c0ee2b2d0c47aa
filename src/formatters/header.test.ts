import { describe, it, expect } from 'vitest';
import {
  buildMarkdownHeader,
  buildRstHeader,
  columnWidth,
  HeaderFormatError,
  type HeaderFields,
} from './header.js';

const fullFields: HeaderFields = {
  title: 'Hello World',
  date: '2024-01-15 09:05',
  author: 'jane',
  categories: ['news'],
  tags: ['a', 'b'],
  slug: 'hello-world',
  status: 'draft',
};

describe('buildMarkdownHeader()', () => {
  it('should write every field in order followed by a blank line', () => {
    expect(buildMarkdownHeader(fullFields)).toBe(
      [
        'Title: Hello World',
        'Date: 2024-01-15 09:05',
        'Author: jane',
        'Category: news',
        'Tags: a, b',
        'Slug: hello-world',
        'Status: draft',
        '',
        '',
      ].join('\n'),
    );
  });

  it('should skip missing and empty fields', () => {
    const result = buildMarkdownHeader({ title: 'About', tags: [], slug: 'about' });

    expect(result).toBe('Title: About\nSlug: about\n\n');
  });

  it('should throw if the title is empty', () => {
    expect(() => buildMarkdownHeader({ title: '  ' })).toThrow(HeaderFormatError);
  });
});

describe('buildRstHeader()', () => {
  it('should underline the title and write docinfo fields', () => {
    expect(buildRstHeader(fullFields)).toBe(
      [
        'Hello World',
        '###########',
        ':date: 2024-01-15 09:05',
        ':author: jane',
        ':category: news',
        ':tags: a, b',
        ':slug: hello-world',
        ':status: draft',
        '',
        '',
      ].join('\n'),
    );
  });

  it('should size the underline by display width', () => {
    const lines = buildRstHeader({ title: '日本語' }).split('\n');

    expect(lines[1]).toBe('######');
  });

  it('should throw if the title is empty', () => {
    expect(() => buildRstHeader({ title: '' })).toThrow('Missing required header field: title');
  });
});

describe('columnWidth()', () => {
  it('should count ASCII characters as one column', () => {
    expect(columnWidth('abc')).toBe(3);
  });

  it('should count wide characters as two columns', () => {
    expect(columnWidth('日本')).toBe(4);
  });

  it('should not count combining marks', () => {
    expect(columnWidth('e\u0301')).toBe(1);
  });

  it('should size the rst underline to a wide title', () => {
    expect(buildRstHeader({ title: '日本 blog' })).toBe('日本 blog\n#########\n\n');
  });
});
