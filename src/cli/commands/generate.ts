/**
 * repo-deck generate command
 *
 * Runs the full pipeline for one GitHub repository:
 * clone → digest → analyze → format → render.
 */

import { Command, Option } from 'commander';
import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { configureLogger, logger } from '../../utils/logger.js';
import { handleError } from '../../utils/errors.js';
import { ShutdownManager } from '../../utils/shutdown.js';
import {
  CONFIG_DIR,
  resolveConfig,
  resolveCredentials,
} from '../../core/services/config-manager.js';
import { createLLMService } from '../../core/services/llm-service.js';
import { YamlPreferencesStore } from '../../core/services/preferences-store.js';
import { RepositoryAcquirer } from '../../core/acquirer/repository-acquirer.js';
import { DigestProducer } from '../../core/digest/digest-producer.js';
import { ContentAnalyzer } from '../../core/analyzer/content-analyzer.js';
import { createPresentationRenderer } from '../../core/renderer/presentation-renderer.js';
import { GenerationPipeline, toResponsePayload } from '../../core/pipeline/generation-pipeline.js';
import {
  EXPORT_FORMATS,
  IMAGE_TYPES,
  TONES,
  VERBOSITY_LEVELS,
  type GenerationOutcome,
  type LLMProviderName,
} from '../../types/index.js';

// ============================================================================
// TYPES
// ============================================================================

export interface GenerateOptions {
  slides?: string;
  tone?: string;
  verbosity?: string;
  language?: string;
  template?: string;
  exportAs?: string;
  titleSlide?: boolean;
  toc?: boolean;
  imageType?: string;
  webSearch?: boolean;
  theme?: string;
  keepRepo: boolean;
  json: boolean;
  provider?: LLMProviderName;
  model?: string;
}

export interface RunMetadata {
  version: string;
  timestamp: string;
  outcome: GenerationOutcome;
}

export const RUNS_DIR = 'runs';

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Translate CLI options into the wire request the pipeline validates.
 * Values are passed through untouched so validation reports them as typed.
 */
export function buildRequestInput(githubUrl: string, options: Partial<GenerateOptions>): Record<string, unknown> {
  const input: Record<string, unknown> = { github_url: githubUrl };
  if (options.slides !== undefined) input.n_slides = Number(options.slides);
  if (options.tone !== undefined) input.tone = options.tone;
  if (options.verbosity !== undefined) input.verbosity = options.verbosity;
  if (options.language !== undefined) input.language = options.language;
  if (options.template !== undefined) input.template = options.template;
  if (options.exportAs !== undefined) input.export_as = options.exportAs;
  if (options.titleSlide !== undefined) input.include_title_slide = options.titleSlide;
  if (options.toc !== undefined) input.include_table_of_contents = options.toc;
  if (options.imageType !== undefined) input.image_type = options.imageType;
  if (options.webSearch !== undefined) input.web_search = options.webSearch;
  if (options.theme !== undefined) input.theme = options.theme;
  return input;
}

/**
 * Record a run's outcome under .repo-deck/runs
 */
export async function writeRunMetadata(rootPath: string, metadata: RunMetadata): Promise<string> {
  const runsDir = join(rootPath, CONFIG_DIR, RUNS_DIR);
  await mkdir(runsDir, { recursive: true });
  const filePath = join(runsDir, `${metadata.timestamp.replace(/[:.]/g, '-')}.json`);
  await writeFile(filePath, JSON.stringify(metadata, null, 2) + '\n');
  return filePath;
}

function printOutcome(outcome: GenerationOutcome): void {
  logger.blank();
  if (outcome.status === 'success') {
    logger.section('Presentation Ready');
    logger.info('Presentation ID', outcome.presentationId);
    if (outcome.downloadUrl) logger.info('Download', outcome.downloadUrl);
    if (outcome.editUrl) logger.info('Edit', outcome.editUrl);
    if (outcome.creditsConsumed !== undefined) logger.info('Credits used', outcome.creditsConsumed);
    logger.info('Processing time', outcome.processingTime);
    return;
  }

  logger.error(`[${outcome.code}] during ${outcome.stage}: ${outcome.error}`);
  if (outcome.suggestion) {
    logger.info('Suggestion', outcome.suggestion);
  }
}

// ============================================================================
// COMMAND
// ============================================================================

export const generateCommand = new Command('generate')
  .description('Generate a presentation from a public GitHub repository')
  .argument('<github-url>', 'Repository URL, e.g. https://github.com/owner/repo')
  .option('-s, --slides <n>', 'Number of slides (5-15)')
  .addOption(new Option('--tone <tone>', 'Presentation tone').choices(TONES))
  .addOption(new Option('--verbosity <level>', 'Amount of text per slide').choices(VERBOSITY_LEVELS))
  .option('--language <language>', 'Presentation language')
  .option('--template <name>', 'Presenton template')
  .addOption(new Option('--export-as <format>', 'Export format').choices(EXPORT_FORMATS))
  .option('--title-slide', 'Include a title slide')
  .option('--no-title-slide', 'Leave out the title slide')
  .option('--toc', 'Include a table of contents')
  .option('--no-toc', 'Leave out the table of contents')
  .addOption(new Option('--image-type <type>', 'Slide imagery').choices(IMAGE_TYPES))
  .option('--web-search', 'Let the presentation service search the web')
  .option('--theme <name>', 'Presenton theme')
  .option('--keep-repo', 'Keep the cloned working copy after a successful run', false)
  .option('--json', 'Print the response payload as JSON', false)
  .addOption(new Option('--provider <name>', 'Text generation provider').choices(['gemini', 'openai']))
  .option('--model <name>', 'Model used for fact extraction')
  .addHelpText(
    'after',
    `
Examples:
  $ repo-deck generate https://github.com/octocat/Hello-World
  $ repo-deck generate https://github.com/octocat/Hello-World --slides 10 --tone casual
  $ repo-deck generate https://github.com/octocat/Hello-World --export-as pdf --json

Environment:
  GOOGLE_API_KEY      Gemini API key (default provider)
  OPENAI_API_KEY      OpenAI-compatible API key (--provider openai)
  PRESENTON_API_KEY   Presenton API key
`
  )
  .action(async (githubUrl: string, options: GenerateOptions) => {
    const rootPath = process.cwd();
    const shutdown = new ShutdownManager();
    shutdown.onCleanup(() => logger.warning('Cancelling; the working copy will be removed'));

    if (options.json) {
      configureLogger({ quiet: true });
    }

    try {
      const config = await resolveConfig({
        rootPath,
        overrides: {
          workspace: { cleanupAfterGeneration: options.keepRepo ? false : undefined },
          llm: { provider: options.provider, model: options.model },
        },
      });
      const credentials = resolveCredentials();

      const llm = createLLMService(config.llm, credentials);
      const renderer = createPresentationRenderer(config.presentation, credentials);

      logger.section('Generating Presentation');
      logger.info('Repository', githubUrl);
      logger.info('Model', `${llm.getProviderName()}/${llm.getModel()}`);
      logger.blank();

      const pipeline = new GenerationPipeline(
        {
          acquirer: new RepositoryAcquirer(config.workspace),
          digester: new DigestProducer(config.digest),
          analyzer: new ContentAnalyzer(llm, config.llm),
          renderer,
          preferences: new YamlPreferencesStore(config.preferencesPath),
        },
        { cleanupOnSuccess: config.workspace.cleanupAfterGeneration }
      );

      const outcome = await pipeline.run(buildRequestInput(githubUrl, options), shutdown.signal);

      try {
        const metadataPath = await writeRunMetadata(rootPath, {
          version: config.version,
          timestamp: new Date().toISOString(),
          outcome,
        });
        logger.debug(`Run recorded in ${metadataPath}`);
      } catch (error) {
        logger.warning(`Could not record run: ${error instanceof Error ? error.message : String(error)}`);
      }

      const usage = llm.getTokenUsage();
      logger.debug(`Tokens used: ${usage.totalTokens} over ${usage.requests} request(s)`);

      if (options.json) {
        console.log(JSON.stringify(toResponsePayload(outcome), null, 2));
      } else {
        printOutcome(outcome);
      }

      if (outcome.status === 'error') {
        process.exitCode = 1;
      }
    } catch (error) {
      handleError(error);
    } finally {
      shutdown.removeHandlers();
    }
  });
