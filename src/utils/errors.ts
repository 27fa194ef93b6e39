/**
 * Error taxonomy for repo-deck with user-facing suggestions
 */

import type { PipelineStage } from '../types/index.js';

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'REPO_NOT_FOUND'
  | 'REPO_ACCESS_DENIED'
  | 'REPO_TOO_LARGE'
  | 'CLONE_TIMEOUT'
  | 'CLONE_FAILED'
  | 'DIGEST_TOOL_FAILURE'
  | 'DIGEST_TOO_SMALL'
  | 'DIGEST_TIMEOUT'
  | 'ANALYSIS_PARSE_FAILURE'
  | 'ANALYSIS_SCHEMA_FAILURE'
  | 'ANALYSIS_TRANSPORT'
  | 'RENDER_TIMEOUT'
  | 'RENDER_REJECTED'
  | 'RENDER_TRANSPORT'
  | 'PIPELINE_CANCELLED'
  | 'NO_API_KEY'
  | 'INVALID_CONFIG'
  | 'UNKNOWN_ERROR';

export interface RepoDeckErrorOptions {
  stage?: PipelineStage;
  suggestion?: string;
  /** Structured payload, e.g. the render service's error body */
  details?: unknown;
  cause?: unknown;
}

export class RepoDeckError extends Error {
  readonly code: ErrorCode;
  stage?: PipelineStage;
  readonly suggestion?: string;
  readonly details?: unknown;

  constructor(message: string, code: ErrorCode, options: RepoDeckErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'RepoDeckError';
    this.code = code;
    this.stage = options.stage;
    this.suggestion = options.suggestion;
    this.details = options.details;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Attach the pipeline stage the error surfaced in, unless one is already set
   */
  atStage(stage: PipelineStage): this {
    this.stage ??= stage;
    return this;
  }

  /**
   * Format error for CLI display
   */
  format(useColor = true): string {
    const red = useColor ? '\x1b[31m' : '';
    const yellow = useColor ? '\x1b[33m' : '';
    const dim = useColor ? '\x1b[2m' : '';
    const reset = useColor ? '\x1b[0m' : '';

    const where = this.stage ? ` during ${this.stage}` : '';
    let output = `${red}Error [${this.code}]${where}:${reset} ${this.message}`;

    if (this.suggestion) {
      output += `\n\n${yellow}Suggestion:${reset} ${this.suggestion}`;
    }

    output += `\n\n${dim}Run with --verbose for more detail.${reset}`;

    return output;
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error factory functions with predefined messages and suggestions
 */
export const errors = {
  validation(issues: string[]): RepoDeckError {
    return new RepoDeckError(`Invalid request: ${issues.join('; ')}`, 'VALIDATION_ERROR', {
      stage: 'validation',
      suggestion: 'Expected a URL like https://github.com/owner/repository and options within their allowed values.',
      details: issues,
    });
  },

  repoNotFound(url: string, stderr?: string): RepoDeckError {
    return new RepoDeckError(`Repository not found: ${url}`, 'REPO_NOT_FOUND', {
      stage: 'acquiring',
      suggestion: 'Check the URL. Only public repositories can be cloned.',
      details: stderr,
    });
  },

  repoAccessDenied(url: string, stderr?: string): RepoDeckError {
    return new RepoDeckError(`Access denied to repository: ${url}`, 'REPO_ACCESS_DENIED', {
      stage: 'acquiring',
      suggestion: 'The repository may be private. Make it public or use a different repository.',
      details: stderr,
    });
  },

  repoTooLarge(sizeMb: number, maxMb: number): RepoDeckError {
    return new RepoDeckError(
      `Repository size (${sizeMb.toFixed(1)}MB) exceeds maximum allowed (${maxMb}MB)`,
      'REPO_TOO_LARGE',
      {
        stage: 'acquiring',
        suggestion: 'Raise workspace.maxRepoSizeMb in .repo-deck/config.json or MAX_REPO_SIZE_MB.',
      }
    );
  },

  cloneTimeout(url: string, timeoutMs: number): RepoDeckError {
    return new RepoDeckError(`Cloning ${url} took longer than ${timeoutMs / 1000}s`, 'CLONE_TIMEOUT', {
      stage: 'acquiring',
      suggestion: 'The repository may be too large, or the network is slow. Try again later.',
    });
  },

  cloneFailed(url: string, reason: string): RepoDeckError {
    return new RepoDeckError(`Failed to clone ${url}: ${reason}`, 'CLONE_FAILED', {
      stage: 'acquiring',
      suggestion: 'Check that git is installed and on your PATH.',
    });
  },

  digestToolFailure(reason: string): RepoDeckError {
    return new RepoDeckError(`Digest generation failed: ${reason}`, 'DIGEST_TOOL_FAILURE', {
      stage: 'digesting',
      suggestion: 'Check digest.tool and digest.command in .repo-deck/config.json.',
    });
  },

  digestTooSmall(length: number, minLength: number): RepoDeckError {
    return new RepoDeckError(
      `Generated digest is too short (${length} < ${minLength} characters)`,
      'DIGEST_TOO_SMALL',
      {
        stage: 'digesting',
        suggestion: 'The repository may be empty, or everything in it matched the ignore patterns.',
      }
    );
  },

  digestTimeout(timeoutMs: number): RepoDeckError {
    return new RepoDeckError(`Digest generation took longer than ${timeoutMs / 1000}s`, 'DIGEST_TIMEOUT', {
      stage: 'digesting',
      suggestion: 'Lower digest.maxDepth or add ignore patterns for large directories.',
    });
  },

  analysisParseFailure(attempts: number, reason: string): RepoDeckError {
    return new RepoDeckError(
      `Model returned invalid JSON after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${reason}`,
      'ANALYSIS_PARSE_FAILURE',
      { stage: 'analyzing', suggestion: 'Try again, or switch models with --model.' }
    );
  },

  analysisSchemaFailure(attempts: number, missing: string[]): RepoDeckError {
    return new RepoDeckError(
      `Incomplete analysis after ${attempts} attempt${attempts === 1 ? '' : 's'}. Missing: ${missing.join(', ')}`,
      'ANALYSIS_SCHEMA_FAILURE',
      { stage: 'analyzing', suggestion: 'Try again, or switch models with --model.', details: missing }
    );
  },

  analysisTransport(attempts: number, reason: string): RepoDeckError {
    return new RepoDeckError(
      `Text generation request failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${reason}`,
      'ANALYSIS_TRANSPORT',
      { stage: 'analyzing', suggestion: 'Check your API key and quota, then try again.' }
    );
  },

  renderTimeout(timeoutMs: number): RepoDeckError {
    return new RepoDeckError(
      `Presentation generation timed out after ${timeoutMs / 1000}s`,
      'RENDER_TIMEOUT',
      { stage: 'rendering', suggestion: 'Please try again. Fewer slides render faster.' }
    );
  },

  renderRejected(status: number, detail: unknown): RepoDeckError {
    const text = typeof detail === 'string' ? detail : JSON.stringify(detail);
    return new RepoDeckError(`Presentation service rejected the request (${status}): ${text}`, 'RENDER_REJECTED', {
      stage: 'rendering',
      suggestion: 'Check PRESENTON_API_KEY and your remaining credits.',
      details: detail,
    });
  },

  renderTransport(reason: string): RepoDeckError {
    return new RepoDeckError(`Failed to reach the presentation service: ${reason}`, 'RENDER_TRANSPORT', {
      stage: 'rendering',
      suggestion: 'Check PRESENTON_API_URL and your network connection.',
    });
  },

  cancelled(stage?: PipelineStage): RepoDeckError {
    return new RepoDeckError('Generation was cancelled', 'PIPELINE_CANCELLED', { stage });
  },

  noApiKey(variable: string): RepoDeckError {
    return new RepoDeckError(`${variable} environment variable is not set`, 'NO_API_KEY', {
      suggestion: `Export ${variable} before running repo-deck.`,
    });
  },

  invalidConfig(path: string, details?: string): RepoDeckError {
    return new RepoDeckError(
      `Invalid configuration file at ${path}${details ? `: ${details}` : ''}`,
      'INVALID_CONFIG',
      { suggestion: "Fix the file, or delete it and run 'repo-deck init' again." }
    );
  },

  unknown(error: unknown, stage?: PipelineStage): RepoDeckError {
    return new RepoDeckError(`An unexpected error occurred: ${messageOf(error)}`, 'UNKNOWN_ERROR', {
      stage,
      cause: error,
    });
  },
};

export function isRepoDeckError(error: unknown): error is RepoDeckError {
  return error instanceof RepoDeckError;
}

/**
 * Normalise anything thrown into a RepoDeckError
 */
export function toRepoDeckError(error: unknown, stage?: PipelineStage): RepoDeckError {
  if (isRepoDeckError(error)) {
    return stage ? error.atStage(stage) : error;
  }
  return errors.unknown(error, stage);
}

export function formatError(error: unknown, useColor = true): string {
  return toRepoDeckError(error).format(useColor);
}

/**
 * Print an error for the CLI and set a failing exit code
 */
export function handleError(error: unknown): void {
  console.error(formatError(error, process.stderr.isTTY === true));
  process.exitCode = 1;
}
