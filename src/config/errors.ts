import { CONFIG_FILE_NAME } from './types.js';

export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public cause?: Error,
  ) {
    super(message);
    this.name = 'ConfigLoadError';
  }
}

export class ConfigNotFoundError extends Error {
  constructor(public configPath: string) {
    super(
      `Configuration file not found: ${configPath}. Run "pelican-article init" to create ${CONFIG_FILE_NAME}.`,
    );
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigValidationError extends Error {
  constructor(public issues: unknown[]) {
    super('Configuration validation failed');
    this.name = 'ConfigValidationError';
  }
}
