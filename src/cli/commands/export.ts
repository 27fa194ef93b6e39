/**
 * repo-deck export command
 *
 * Re-exports a presentation that was already generated.
 */

import { Command, Option } from 'commander';
import { logger } from '../../utils/logger.js';
import { errors, handleError } from '../../utils/errors.js';
import { ShutdownManager } from '../../utils/shutdown.js';
import { resolveConfig, resolveCredentials } from '../../core/services/config-manager.js';
import { createPresentationRenderer } from '../../core/renderer/presentation-renderer.js';
import { EXPORT_FORMATS, type ExportFormat } from '../../types/index.js';

interface ExportOptions {
  format: ExportFormat;
  json: boolean;
}

export const exportCommand = new Command('export')
  .description('Export an existing presentation as pptx or pdf')
  .argument('<presentation-id>', 'ID returned by repo-deck generate')
  .addOption(new Option('-f, --format <format>', 'Export format').choices(EXPORT_FORMATS).default('pptx'))
  .option('--json', 'Print the service response as JSON', false)
  .action(async (presentationId: string, options: ExportOptions) => {
    const shutdown = new ShutdownManager();

    try {
      if (!presentationId.trim()) {
        throw errors.validation(['presentation-id: cannot be empty']);
      }

      const config = await resolveConfig();
      const renderer = createPresentationRenderer(config.presentation, resolveCredentials());

      const spinner = logger.spinner(`Exporting ${presentationId} as ${options.format}`);
      const result = await renderer
        .exportPresentation(presentationId, options.format, shutdown.signal)
        .catch((error: unknown) => {
          spinner.fail(`Export of ${presentationId} failed`);
          throw error;
        });
      spinner.succeed(`Exported ${presentationId}`);

      if (options.json) {
        console.log(
          JSON.stringify(
            {
              presentation_id: result.presentationId,
              download_url: result.downloadUrl ?? null,
              edit_url: result.editUrl ?? null,
            },
            null,
            2
          )
        );
        return;
      }

      if (result.downloadUrl) logger.info('Download', result.downloadUrl);
      if (result.editUrl) logger.info('Edit', result.editUrl);
    } catch (error) {
      handleError(error);
    } finally {
      shutdown.removeHandlers();
    }
  });
