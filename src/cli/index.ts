#!/usr/bin/env node
import { realpathSync } from 'node:fs';
import { pathToFileURL } from 'node:url';
import { Command, Option } from 'commander';
import { newCommand, type NewCommandOptions } from './commands/new.js';
import { initCommand, type InitCommandOptions } from './commands/init.js';
import { createServices, type Services } from './services.js';
import { CONTENT_TYPES, MARKUPS, STATUSES } from '../types.js';
import { CONFIG_FILE_NAME, DEFAULT_PATH } from '../config/types.js';

function reportError(error: unknown): never {
  if (error instanceof Error) {
    console.error(error.message);
    process.exit(1);
  }
  console.error('Unknown error');
  process.exit(1);
}

/**
 * Builds the CLI program. The root command creates a new article;
 * `init` writes a default config file.
 */
export function createProgram(services: Services = createServices()): Command {
  const program = new Command();

  program
    .name('pelican-article')
    .description('Generate a new Pelican article or page file')
    .version('1.0.0')
    .enablePositionalOptions()
    .argument('[title]', 'The article title')
    .option('--title <title>', 'The article title (overrides the positional argument)')
    .addOption(
      new Option('--content-type <type>', 'The content type to be created').choices(CONTENT_TYPES),
    )
    .option('--author <name>', 'Set the author of the article (default: current user)')
    .option('--tags <tags>', 'Set tags to the article (separated by comma)')
    .option('--category <category>', 'Set the article category')
    .option('--slug <slug>', 'Set a custom article slug (default: generated from title)')
    .addOption(new Option('--status <status>', 'Publication status').choices(STATUSES))
    .option('--path <path>', `Path to save the article file (default: "${DEFAULT_PATH}")`)
    .option('--markup <markup>', `The markup style for the article: ${MARKUPS.join(', ')}`)
    .option('--prompt', 'Ask for every field interactively (default)')
    .option('--no-prompt', 'Disable the interactive prompt')
    .addOption(new Option('--noprompt').hideHelp())
    .option('--config <file>', `Path to ${CONFIG_FILE_NAME}`)
    .action(async (title: string | undefined, options: NewCommandOptions) => {
      try {
        const filePath = await newCommand({ ...options, title: options.title ?? title }, services);
        console.log(`Article file created at ${filePath}`);
      } catch (error) {
        reportError(error);
      }
    });

  program
    .command('init')
    .description(`Create ${CONFIG_FILE_NAME} in the current directory`)
    .option('--dir <dir>', `Content directory (default: "${DEFAULT_PATH}")`)
    .action(async (options: InitCommandOptions) => {
      try {
        const message = await initCommand(options, services);
        console.log(`✓ ${message}`);
      } catch (error) {
        reportError(error);
      }
    });

  return program;
}

/**
 * Main CLI entry point.
 */
export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv);
}

// Run CLI if this file is executed directly (also through the npm bin symlink)
function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isEntryPoint()) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
