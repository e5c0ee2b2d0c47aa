import { MARKUPS } from '../types.js';

/**
 * Error thrown when the requested markup is not one of the supported formats.
 */
export class InvalidMarkupError extends Error {
  constructor(public markup: string) {
    super(`${markup} is not a valid markup format, available options are ${MARKUPS.join(', ')}`);
    this.name = 'InvalidMarkupError';
  }
}

/**
 * Error thrown when no title was given.
 * In interactive mode its message is shown and the title is asked again.
 */
export class MissingTitleError extends Error {
  constructor() {
    super('Must provide a title');
    this.name = 'MissingTitleError';
  }
}

/**
 * Error thrown when the title or custom slug leaves nothing to name the file with.
 */
export class EmptySlugError extends Error {
  constructor(public source: string) {
    super(`Cannot derive a file name from "${source}", provide a slug with letters or digits`);
    this.name = 'EmptySlugError';
  }
}
