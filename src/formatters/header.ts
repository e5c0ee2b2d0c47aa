import stringWidth from 'string-width';
import { HeaderFormatError } from './errors.js';

// Re-export for convenience
export { HeaderFormatError };

export interface HeaderFields {
  title: string;
  date?: string;
  author?: string;
  categories?: string[];
  tags?: string[];
  slug?: string;
  status?: string;
}

export type HeaderFormatter = (fields: HeaderFields) => string;

/**
 * Number of terminal columns the text occupies.
 * Used to size the reStructuredText title underline.
 */
export function columnWidth(text: string): number {
  return stringWidth(text);
}

function requireTitle(fields: HeaderFields): string {
  const title = fields.title.trim();
  if (title === '') {
    throw new HeaderFormatError('Missing required header field: title');
  }
  return title;
}

/**
 * Optional header entries in output order.
 * Empty values and empty lists are skipped.
 */
function optionalEntries(fields: HeaderFields): Array<{ key: string; value: string }> {
  const entries: Array<{ key: string; value: string | undefined }> = [
    { key: 'date', value: fields.date },
    { key: 'author', value: fields.author },
    { key: 'category', value: fields.categories?.join(', ') },
    { key: 'tags', value: fields.tags?.join(', ') },
    { key: 'slug', value: fields.slug },
    { key: 'status', value: fields.status },
  ];

  const result: Array<{ key: string; value: string }> = [];
  for (const { key, value } of entries) {
    if (value !== undefined && value !== '') {
      result.push({ key, value });
    }
  }
  return result;
}

/**
 * Builds a Pelican Markdown metadata block.
 *
 * Output format:
 *   Title: <title>
 *   Date: <date>
 *   ...
 *   <blank line>
 *
 * @throws {HeaderFormatError} If the title is empty
 */
export function buildMarkdownHeader(fields: HeaderFields): string {
  const lines = [`Title: ${requireTitle(fields)}`];

  for (const { key, value } of optionalEntries(fields)) {
    // "date" -> "Date"
    lines.push(`${key.charAt(0).toUpperCase()}${key.slice(1)}: ${value}`);
  }

  return lines.join('\n') + '\n\n';
}

/**
 * Builds a Pelican reStructuredText header: the title underlined with '#'
 * followed by docinfo field lines.
 *
 * @throws {HeaderFormatError} If the title is empty
 */
export function buildRstHeader(fields: HeaderFields): string {
  const title = requireTitle(fields);
  const lines = [title, '#'.repeat(columnWidth(title))];

  for (const { key, value } of optionalEntries(fields)) {
    lines.push(`:${key}: ${value}`);
  }

  return lines.join('\n') + '\n\n';
}
