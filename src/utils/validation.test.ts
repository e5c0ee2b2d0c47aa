import { describe, it, expect } from 'vitest';
import { validateMarkup } from './validation.js';
import { InvalidMarkupError } from '../article/errors.js';

describe('validateMarkup()', () => {
  it('should accept supported markups', () => {
    expect(validateMarkup('md')).toBe('md');
    expect(validateMarkup('rst')).toBe('rst');
  });

  it('should accept markups case-insensitively and normalize them', () => {
    expect(validateMarkup('MD')).toBe('md');
    expect(validateMarkup('Rst')).toBe('rst');
  });

  it('should reject unsupported markups', () => {
    expect(() => validateMarkup('txt')).toThrow(InvalidMarkupError);
    expect(() => validateMarkup('')).toThrow(InvalidMarkupError);
    expect(() => validateMarkup('markdown')).toThrow(InvalidMarkupError);
  });

  it('should list the available options in the error message', () => {
    expect(() => validateMarkup('txt')).toThrow(
      'txt is not a valid markup format, available options are md, rst',
    );
  });
});
