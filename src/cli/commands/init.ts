/**
 * repo-deck init command
 *
 * Creates .repo-deck/config.json with the default settings.
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { handleError } from '../../utils/errors.js';
import { promptOverwrite } from '../../utils/prompts.js';
import {
  configFileExists,
  configFilePath,
  getDefaultConfig,
  writeConfigFile,
} from '../../core/services/config-manager.js';

interface InitOptions {
  force: boolean;
}

/**
 * Write the default configuration unless one exists and the user declines.
 * Returns the written path, or null when nothing was written.
 */
export async function initializeConfig(rootPath: string, force: boolean): Promise<string | null> {
  if (!force && (await configFileExists(rootPath))) {
    const overwrite = await promptOverwrite(configFilePath(rootPath));
    if (!overwrite) return null;
  }
  return writeConfigFile(rootPath, getDefaultConfig(rootPath));
}

export const initCommand = new Command('init')
  .description('Create .repo-deck/config.json with default settings')
  .option('--force', 'Overwrite an existing configuration without asking', false)
  .addHelpText(
    'after',
    `
Examples:
  $ repo-deck init            Create the configuration
  $ repo-deck init --force    Replace an existing configuration

API keys are never written to the file; export GOOGLE_API_KEY (or
OPENAI_API_KEY) and PRESENTON_API_KEY instead.
`
  )
  .action(async (options: InitOptions) => {
    try {
      logger.section('Initializing repo-deck');
      const path = await initializeConfig(process.cwd(), options.force);

      if (!path) {
        logger.warning('Existing configuration kept. Use --force to replace it.');
        return;
      }

      logger.success(`Created ${path}`);
      logger.blank();
      logger.info('Next', 'repo-deck generate https://github.com/owner/repo');
    } catch (error) {
      handleError(error);
    }
  });
