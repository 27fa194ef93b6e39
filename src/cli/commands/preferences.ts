/**
 * repo-deck preferences command
 *
 * Shows or clears the presentation preferences remembered from earlier runs.
 */

import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { handleError } from '../../utils/errors.js';
import { confirmResetPreferences } from '../../utils/prompts.js';
import { preferencesFilePath } from '../../core/services/config-manager.js';
import { YamlPreferencesStore } from '../../core/services/preferences-store.js';

interface PreferencesOptions {
  reset: boolean;
  json: boolean;
}

export const preferencesCommand = new Command('preferences')
  .description('Show or clear stored presentation preferences')
  .option('--reset', 'Clear stored preferences', false)
  .option('--json', 'Print preferences as JSON', false)
  .action(async (options: PreferencesOptions) => {
    const store = new YamlPreferencesStore(preferencesFilePath(process.cwd()));

    try {
      if (options.reset) {
        if (!(await confirmResetPreferences())) {
          logger.warning('Preferences kept');
          return;
        }
        await store.clear();
        logger.success('Stored preferences cleared');
        return;
      }

      const stored = await store.read();

      if (options.json) {
        console.log(JSON.stringify(stored, null, 2));
        return;
      }

      const entries = Object.entries(stored);
      if (entries.length === 0) {
        logger.info('Preferences', 'none stored yet');
        return;
      }

      logger.section('Stored Preferences');
      for (const [key, value] of entries) {
        logger.info(key, String(value));
      }
      logger.debug(`Read from ${store.path}`);
    } catch (error) {
      handleError(error);
    }
  });
