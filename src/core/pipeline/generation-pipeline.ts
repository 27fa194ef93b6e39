/**
 * Generation Pipeline
 *
 * Orchestrates clone → digest → analyze → format → render for one request.
 * Every run ends in exactly one GenerationOutcome; the working copy is
 * released on failure and, unless told to keep it, on success.
 */

import type {
  FactSet,
  GenerationFailure,
  GenerationOutcome,
  GenerationRequest,
  GenerationSuccess,
  PersistedPreferences,
  PipelineStage,
  PipelineState,
  RenderResult,
  StageRecord,
  WorkingCopy,
} from '../../types/index.js';
import { errors, isRepoDeckError, toRepoDeckError, type RepoDeckError } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { createRunId, type AcquireOptions } from '../acquirer/repository-acquirer.js';
import { formatFactSet } from '../formatter/content-formatter.js';
import type { PreferenceOverrides } from '../renderer/presentation-renderer.js';
import type { PreferencesStore } from '../services/preferences-store.js';
import { checkRequest } from './request-validator.js';

// ============================================================================
// TYPES
// ============================================================================

export interface Acquirer {
  acquire(url: string, options: AcquireOptions): Promise<WorkingCopy>;
  release(copy: WorkingCopy): Promise<void>;
}

export interface Digester {
  digest(copy: WorkingCopy, signal?: AbortSignal): Promise<string>;
  truncate(digest: string): string;
}

export interface Analyzer {
  analyze(digest: string, signal?: AbortSignal): Promise<FactSet>;
}

export interface Renderer {
  render(content: string, overrides: PreferenceOverrides, signal?: AbortSignal): Promise<RenderResult>;
}

export interface PipelineDependencies {
  acquirer: Acquirer;
  digester: Digester;
  analyzer: Analyzer;
  renderer: Renderer;
  preferences?: PreferencesStore;
  logger?: Logger;
}

export interface PipelineOptions {
  /** Release the working copy after a successful run */
  cleanupOnSuccess: boolean;
  onStateChange?: (next: PipelineState, previous: PipelineState, runId: string) => void;
  /** Clock in milliseconds */
  now?: () => number;
  createRunId?: () => string;
}

type WorkStage = Exclude<PipelineStage, 'validation'>;

const WORK_STAGES: readonly WorkStage[] = ['acquiring', 'digesting', 'analyzing', 'formatting', 'rendering'];

const STAGE_LABELS: Record<WorkStage, string> = {
  acquiring: 'Cloning repository',
  digesting: 'Generating codebase digest',
  analyzing: 'Extracting presentation content',
  formatting: 'Formatting slides content',
  rendering: 'Rendering presentation',
};

export const SUCCESS_MESSAGE = 'Presentation generated successfully';

export function formatProcessingTime(durationMs: number): string {
  return `${(durationMs / 1000).toFixed(1)} seconds`;
}

/**
 * Preferences a request persists for later runs
 */
export function preferencesFromRequest(request: GenerationRequest): PersistedPreferences {
  return {
    tone: request.tone,
    verbosity: request.verbosity,
    template: request.template,
    exportAs: request.exportAs,
    includeTitleSlide: request.includeTitleSlide,
    includeTableOfContents: request.includeTableOfContents,
    nSlides: request.nSlides,
  };
}

function overridesFromRequest(request: GenerationRequest): PreferenceOverrides {
  const { githubUrl: _githubUrl, ...overrides } = request;
  return overrides;
}

function repositoryLabel(input: unknown): string {
  if (typeof input === 'object' && input !== null && 'github_url' in input && typeof input.github_url === 'string') {
    return input.github_url;
  }
  return '';
}

// ============================================================================
// PIPELINE
// ============================================================================

/** Mutable state of a single run; never shared between runs */
interface RunContext {
  readonly runId: string;
  state: PipelineState;
}

class StageFailure extends Error {
  constructor(
    readonly stage: PipelineStage,
    readonly error: RepoDeckError
  ) {
    super(error.message);
    this.name = 'StageFailure';
  }
}

export class GenerationPipeline {
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly newRunId: () => string;

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly options: PipelineOptions
  ) {
    this.logger = deps.logger ?? defaultLogger;
    this.now = options.now ?? Date.now;
    this.newRunId = options.createRunId ?? createRunId;
  }

  /**
   * Run one request to completion. Never throws: every failure becomes an
   * error outcome naming the stage it came from.
   */
  async run(input: unknown, signal?: AbortSignal): Promise<GenerationOutcome> {
    const runId = this.newRunId();
    const run: RunContext = { runId, state: 'idle' };

    const checked = checkRequest(input);
    if (!checked.ok) {
      this.transition(run, 'failed');
      const error = errors.validation(checked.issues);
      this.logger.error(error.message);
      return this.failure(runId, repositoryLabel(input), 'validation', error, 0, [
        { stage: 'validation', status: 'failed', durationMs: 0 },
      ]);
    }

    const request = checked.request;
    await this.persistPreferences(request);

    const started = this.now();
    const stages: StageRecord[] = [{ stage: 'validation', status: 'completed', durationMs: 0 }];
    let copy: WorkingCopy | undefined;

    const runStage = async <T>(stage: WorkStage, work: () => Promise<T>): Promise<T> => {
      if (signal?.aborted) {
        throw new StageFailure(stage, errors.cancelled(stage));
      }
      this.transition(run, stage);
      this.logger.step(WORK_STAGES.indexOf(stage) + 1, WORK_STAGES.length, STAGE_LABELS[stage]);

      const stageStart = this.now();
      try {
        const result = await work();
        stages.push({ stage, status: 'completed', durationMs: this.now() - stageStart });
        return result;
      } catch (error) {
        stages.push({ stage, status: 'failed', durationMs: this.now() - stageStart });
        const failure =
          signal?.aborted && !(isRepoDeckError(error) && error.code === 'PIPELINE_CANCELLED')
            ? errors.cancelled(stage)
            : toRepoDeckError(error, stage);
        throw new StageFailure(stage, failure);
      }
    };

    let outcome: GenerationOutcome;
    try {
      copy = await runStage('acquiring', () => this.deps.acquirer.acquire(request.githubUrl, { runId, signal }));
      const acquired = copy;
      this.logger.success(`Cloned ${acquired.owner}/${acquired.repo} (${acquired.sizeMb.toFixed(2)}MB)`);

      const digest = await runStage('digesting', async () => {
        const full = await this.deps.digester.digest(acquired, signal);
        return this.deps.digester.truncate(full);
      });
      this.logger.success(`Digest ready (${digest.length} characters)`);

      const facts = await runStage('analyzing', () => this.deps.analyzer.analyze(digest, signal));
      this.logger.success(`Extracted content for ${facts.project_name}`);

      const content = await runStage('formatting', async () => formatFactSet(facts));

      const rendered = await runStage('rendering', () =>
        this.deps.renderer.render(content, overridesFromRequest(request), signal)
      );

      this.transition(run, 'succeeded');
      const durationMs = this.now() - started;
      this.logger.success(`${SUCCESS_MESSAGE} in ${formatProcessingTime(durationMs)}`);
      outcome = this.success(runId, request.githubUrl, rendered, durationMs, stages);
    } catch (error) {
      this.transition(run, 'failed');
      const failure = error instanceof StageFailure ? error : new StageFailure('acquiring', toRepoDeckError(error));
      this.logger.error(failure.error.message);
      for (const stage of WORK_STAGES) {
        if (!stages.some(record => record.stage === stage)) {
          stages.push({ stage, status: 'skipped', durationMs: 0 });
        }
      }
      outcome = this.failure(
        runId,
        request.githubUrl,
        failure.stage,
        failure.error,
        this.now() - started,
        stages
      );
    }

    if (copy && (outcome.status === 'error' || this.options.cleanupOnSuccess)) {
      await this.releaseQuietly(copy);
    } else if (copy) {
      this.logger.info('Working copy kept', copy.path);
    }

    return outcome;
  }

  private transition(run: RunContext, next: PipelineState): void {
    const previous = run.state;
    run.state = next;
    this.options.onStateChange?.(next, previous, run.runId);
  }

  private async persistPreferences(request: GenerationRequest): Promise<void> {
    if (!this.deps.preferences) return;
    try {
      await this.deps.preferences.merge(preferencesFromRequest(request));
    } catch (error) {
      this.logger.warning(`Could not save preferences: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private async releaseQuietly(copy: WorkingCopy): Promise<void> {
    try {
      await this.deps.acquirer.release(copy);
    } catch (error) {
      this.logger.warning(`Cleanup failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private success(
    runId: string,
    repository: string,
    rendered: RenderResult,
    durationMs: number,
    stages: StageRecord[]
  ): GenerationSuccess {
    return {
      status: 'success',
      runId,
      repository,
      presentationId: rendered.presentationId,
      downloadUrl: rendered.downloadUrl,
      editUrl: rendered.editUrl,
      creditsConsumed: rendered.creditsConsumed,
      durationMs,
      processingTime: formatProcessingTime(durationMs),
      message: SUCCESS_MESSAGE,
      stages,
    };
  }

  private failure(
    runId: string,
    repository: string,
    stage: PipelineStage,
    error: RepoDeckError,
    durationMs: number,
    stages: StageRecord[]
  ): GenerationFailure {
    return {
      status: 'error',
      runId,
      repository,
      stage,
      code: error.code,
      error: error.message,
      suggestion: error.suggestion,
      durationMs,
      timestamp: new Date(this.now()).toISOString(),
      stages,
    };
  }
}

// ============================================================================
// RESPONSE PAYLOADS
// ============================================================================

export interface SuccessPayload {
  status: 'success';
  presentation_id: string;
  download_url: string | null;
  edit_url: string | null;
  credits_consumed: number | null;
  processing_time: string;
  message: string;
}

export interface ErrorPayload {
  status: 'error';
  error: string;
  timestamp: string;
}

/**
 * Map an outcome to the snake_case response shape
 */
export function toResponsePayload(outcome: GenerationOutcome): SuccessPayload | ErrorPayload {
  if (outcome.status === 'error') {
    return { status: 'error', error: outcome.error, timestamp: outcome.timestamp };
  }
  return {
    status: 'success',
    presentation_id: outcome.presentationId,
    download_url: outcome.downloadUrl ?? null,
    edit_url: outcome.editUrl ?? null,
    credits_consumed: outcome.creditsConsumed ?? null,
    processing_time: outcome.processingTime,
    message: outcome.message,
  };
}
