/**
 * Content Analyzer
 *
 * Turns a digest into a FactSet by asking the text-generation service for
 * structured JSON, retrying bad output a bounded number of times.
 */

import { z } from 'zod';
import { FACT_SET_KEYS, type FactSet, type LLMConfig } from '../../types/index.js';
import { errors, type RepoDeckError } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { RetryExhaustedError, withRetry } from '../../utils/retry.js';
import { LLMRequestError, type LLMService } from '../services/llm-service.js';
import { SYSTEM_PROMPT, buildAnalysisPrompt } from './prompts.js';

// ============================================================================
// TYPES
// ============================================================================

export type AnalyzerConfig = Pick<
  LLMConfig,
  'temperature' | 'maxTokens' | 'maxRetries' | 'initialDelayMs' | 'maxDelayMs'
>;

export type AnalysisFailureKind = 'parse' | 'schema';

/**
 * A model response that could not be turned into a FactSet
 */
export class AnalysisOutputError extends Error {
  readonly kind: AnalysisFailureKind;
  /** Keys that were absent or had the wrong type; set for schema failures */
  readonly invalidKeys: string[];

  constructor(kind: AnalysisFailureKind, message: string, invalidKeys: string[] = []) {
    super(message);
    this.name = 'AnalysisOutputError';
    this.kind = kind;
    this.invalidKeys = invalidKeys;
  }
}

const factSetSchema = z.object({
  project_name: z.string(),
  tagline: z.string(),
  problem: z.string(),
  solution: z.string(),
  tech_stack: z.array(z.string()),
  key_features: z.array(z.string()),
  innovation: z.string(),
  architecture: z.string(),
  demo_highlights: z.array(z.string()),
  future_scope: z.array(z.string()),
}) satisfies z.ZodType<FactSet>;

// ============================================================================
// PARSING
// ============================================================================

/**
 * Remove a surrounding markdown code fence, with or without a language tag
 */
export function stripCodeFence(text: string): string {
  let content = text.trim();
  const opening = /^```[\w-]*\s*\n?/.exec(content);
  if (opening) {
    content = content.slice(opening[0].length);
  }
  if (content.endsWith('```')) {
    content = content.slice(0, -3);
  }
  return content.trim();
}

/**
 * Parse and validate a model response. Extra keys are dropped.
 */
export function parseFactSet(text: string): FactSet {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(text));
  } catch (error) {
    throw new AnalysisOutputError('parse', error instanceof Error ? error.message : String(error));
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new AnalysisOutputError('parse', 'Expected a JSON object');
  }

  const missing = FACT_SET_KEYS.filter(key => !(key in parsed));
  if (missing.length > 0) {
    throw new AnalysisOutputError('schema', `Missing keys: ${missing.join(', ')}`, missing);
  }

  const result = factSetSchema.safeParse(parsed);
  if (!result.success) {
    const invalid = [...new Set(result.error.issues.map(issue => String(issue.path[0])))];
    throw new AnalysisOutputError('schema', `Invalid values for: ${invalid.join(', ')}`, invalid);
  }

  return result.data;
}

// ============================================================================
// ANALYZER
// ============================================================================

export class ContentAnalyzer {
  private readonly logger: Logger;

  constructor(
    private readonly llm: LLMService,
    private readonly config: AnalyzerConfig,
    options: { logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Extract a FactSet from the digest in at most `maxRetries` model calls
   */
  async analyze(digest: string, signal?: AbortSignal): Promise<FactSet> {
    if (signal?.aborted) {
      throw errors.cancelled('analyzing');
    }

    const userPrompt = buildAnalysisPrompt(digest);
    const maxAttempts = this.config.maxRetries;
    let attempts = 0;

    try {
      return await withRetry(
        async attempt => {
          attempts = attempt;
          this.logger.inference(
            `Extracting facts with ${this.llm.getModel()} (attempt ${attempt}/${maxAttempts})`
          );
          const response = await this.llm.complete({
            systemPrompt: SYSTEM_PROMPT,
            userPrompt,
            temperature: this.config.temperature,
            maxTokens: this.config.maxTokens,
            responseFormat: 'json',
            signal,
          });
          return parseFactSet(response.content);
        },
        {
          maxAttempts,
          initialDelay: this.config.initialDelayMs,
          maxDelay: this.config.maxDelayMs,
          signal,
          onRetry: (error, attempt, delayMs) => {
            const reason = error instanceof Error ? error.message : String(error);
            const permanent = error instanceof LLMRequestError && !error.retryable ? ', likely permanent' : '';
            this.logger.warning(`Attempt ${attempt} failed (${reason}${permanent}), retrying in ${delayMs}ms`);
          },
        }
      );
    } catch (error) {
      throw this.escalate(error, attempts, signal);
    }
  }

  private escalate(error: unknown, attempts: number, signal?: AbortSignal): RepoDeckError {
    if (signal?.aborted) {
      return errors.cancelled('analyzing');
    }

    const last = error instanceof RetryExhaustedError ? error.lastError : error;

    if (last instanceof AnalysisOutputError) {
      return last.kind === 'schema'
        ? errors.analysisSchemaFailure(attempts, last.invalidKeys)
        : errors.analysisParseFailure(attempts, last.message);
    }

    if (error instanceof RetryExhaustedError || last instanceof LLMRequestError) {
      return errors.analysisTransport(attempts, last instanceof Error ? last.message : String(last));
    }
    return errors.unknown(error, 'analyzing');
  }
}
