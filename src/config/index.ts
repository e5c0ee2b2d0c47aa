import { readFile, access, writeFile, mkdir } from 'node:fs/promises';
import { userInfo } from 'node:os';
import { resolve, dirname } from 'node:path';
import { parse, stringify } from 'yaml';
import { z } from 'zod';
import { CONTENT_TYPES, MARKUPS, STATUSES } from '../types.js';
import {
  CONFIG_FILE_NAME,
  DEFAULT_CONTENT_TYPE,
  DEFAULT_MARKUP,
  DEFAULT_PATH,
  type Config,
  type ConfigService,
} from './types.js';
import { ConfigLoadError, ConfigNotFoundError, ConfigValidationError } from './errors.js';

interface NodeError extends Error {
  code?: string;
}

export function isNodeError(e: unknown): e is NodeError {
  return e instanceof Error && 'code' in e;
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/**
 * Current OS user, used as the default author.
 * Falls back to the environment when the user has no passwd entry (some containers).
 */
function currentUser(): string {
  try {
    return userInfo().username;
  } catch {
    return process.env.USER ?? process.env.USERNAME ?? 'unknown';
  }
}

/** Computed once at startup, read-only afterwards */
export const DEFAULT_AUTHOR = currentUser();

const fileSchema = z
  .object({
    path: z.string().min(1, 'path cannot be empty').optional(),
    markup: z.enum(MARKUPS).optional(),
    contentType: z.enum(CONTENT_TYPES).optional(),
    author: z.string().min(1, 'author cannot be empty').optional(),
    status: z.enum(STATUSES).optional(),
    prompt: z.boolean().optional(),
  })
  .strict();

/**
 * Built-in defaults, used as-is when no config file exists.
 */
export function defaultConfig(): Config {
  return {
    path: DEFAULT_PATH,
    markup: DEFAULT_MARKUP,
    contentType: DEFAULT_CONTENT_TYPE,
    author: DEFAULT_AUTHOR,
    prompt: true,
  };
}

export class ConfigServiceImpl implements ConfigService {
  async createDefault(
    contentDir: string = DEFAULT_PATH,
  ): Promise<{ created: boolean; message: string }> {
    const configPath = resolve(process.cwd(), CONFIG_FILE_NAME);

    // Never overwrite an existing config
    const exists = await access(configPath)
      .then(() => true)
      .catch(() => false);
    if (exists) {
      return { created: false, message: `Configuration already exists (${CONFIG_FILE_NAME})` };
    }

    await mkdir(resolve(process.cwd(), contentDir), { recursive: true });

    const content = {
      path: contentDir,
      markup: DEFAULT_MARKUP,
      contentType: DEFAULT_CONTENT_TYPE,
      author: DEFAULT_AUTHOR,
      prompt: true,
    };

    await writeFile(configPath, stringify(content), 'utf-8');

    return { created: true, message: `Created ${CONFIG_FILE_NAME}` };
  }

  /**
   * Find config file by traversing up the directory tree.
   * Returns the resolved path to the config file, or null if not found.
   */
  private async findConfigPath(startDir: string): Promise<string | null> {
    let currentDir = resolve(startDir);

    while (true) {
      const configPath = resolve(currentDir, CONFIG_FILE_NAME);

      try {
        await access(configPath);
        return configPath;
      } catch (e) {
        // If it's not a "not found" error (e.g., permission denied), propagate it
        if (!isNodeError(e) || e.code !== 'ENOENT') {
          throw new ConfigLoadError(`Cannot access config at ${configPath}`, toError(e));
        }
      }

      const parentDir = dirname(currentDir);

      // Stop if we've reached the root
      if (parentDir === currentDir) {
        return null;
      }

      currentDir = parentDir;
    }
  }

  async load(path?: string): Promise<Config> {
    let configPath: string;

    if (path) {
      configPath = resolve(path);
      // Explicit path: verify it exists
      try {
        await access(configPath);
      } catch {
        throw new ConfigNotFoundError(configPath);
      }
    } else {
      const foundPath = await this.findConfigPath(process.cwd());
      if (!foundPath) {
        return defaultConfig();
      }
      configPath = foundPath;
    }

    const content = await readFile(configPath, 'utf-8');

    let rawConfig: unknown;
    try {
      rawConfig = parse(content);
    } catch (e) {
      throw new ConfigLoadError('Invalid YAML in configuration file', toError(e));
    }

    // Empty file
    if (rawConfig === null || rawConfig === undefined) {
      rawConfig = {};
    }

    if (typeof rawConfig !== 'object' || Array.isArray(rawConfig)) {
      throw new ConfigLoadError('Configuration file must contain a mapping');
    }

    const result = fileSchema.safeParse(rawConfig);
    if (!result.success) {
      throw new ConfigValidationError(result.error.issues);
    }

    const defaults = defaultConfig();
    const parsed = result.data;

    const config: Config = {
      path: resolve(dirname(configPath), parsed.path ?? defaults.path),
      markup: parsed.markup ?? defaults.markup,
      contentType: parsed.contentType ?? defaults.contentType,
      author: parsed.author ?? defaults.author,
      prompt: parsed.prompt ?? defaults.prompt,
    };
    if (parsed.status) {
      config.status = parsed.status;
    }

    return config;
  }
}

export const configService = new ConfigServiceImpl();
