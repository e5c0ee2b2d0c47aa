import type { Services } from '../services.js';
import { DEFAULT_PATH } from '../../config/types.js';

export interface InitCommandOptions {
  dir?: string;
}

/**
 * Main implementation of the init command.
 */
export async function initCommand(
  options: InitCommandOptions,
  services: Pick<Services, 'config'>,
): Promise<string> {
  const contentDir = options.dir || DEFAULT_PATH;
  const result = await services.config.createDefault(contentDir);
  return result.message;
}
