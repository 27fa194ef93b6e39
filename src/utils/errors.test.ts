import { describe, it, expect, vi, afterEach } from 'vitest';
import { RepoDeckError, errors, isRepoDeckError, toRepoDeckError, formatError, handleError } from './errors.js';

describe('RepoDeckError', () => {
  it('should carry code, stage and suggestion', () => {
    const error = errors.repoTooLarge(612.34, 500);

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('RepoDeckError');
    expect(error.code).toBe('REPO_TOO_LARGE');
    expect(error.stage).toBe('acquiring');
    expect(error.message).toBe('Repository size (612.3MB) exceeds maximum allowed (500MB)');
  });

  it('should keep the first stage it was attached to', () => {
    const error = new RepoDeckError('boom', 'UNKNOWN_ERROR');

    error.atStage('digesting').atStage('rendering');

    expect(error.stage).toBe('digesting');
  });

  it('should format without color', () => {
    const error = errors.renderTimeout(180000);

    expect(error.format(false)).toBe(
      'Error [RENDER_TIMEOUT] during rendering: Presentation generation timed out after 180s\n\n' +
        'Suggestion: Please try again. Fewer slides render faster.\n\n' +
        'Run with --verbose for more detail.'
    );
  });

  it('should list missing keys in schema failures', () => {
    const error = errors.analysisSchemaFailure(3, ['tagline', 'future_scope']);

    expect(error.message).toBe('Incomplete analysis after 3 attempts. Missing: tagline, future_scope');
    expect(error.details).toEqual(['tagline', 'future_scope']);
  });

  it('should serialize structured render rejections', () => {
    const error = errors.renderRejected(402, { detail: 'Not enough credits' });

    expect(error.message).toBe('Presentation service rejected the request (402): {"detail":"Not enough credits"}');
    expect(error.details).toEqual({ detail: 'Not enough credits' });
  });
});

describe('toRepoDeckError', () => {
  it('should pass RepoDeckErrors through and fill a missing stage', () => {
    const original = errors.noApiKey('GOOGLE_API_KEY');
    const result = toRepoDeckError(original, 'analyzing');

    expect(result).toBe(original);
    expect(result.stage).toBe('analyzing');
  });

  it('should wrap anything else as UNKNOWN_ERROR', () => {
    const cause = new TypeError('x is not a function');
    const result = toRepoDeckError(cause, 'formatting');

    expect(isRepoDeckError(result)).toBe(true);
    expect(result.code).toBe('UNKNOWN_ERROR');
    expect(result.stage).toBe('formatting');
    expect(result.message).toBe('An unexpected error occurred: x is not a function');
    expect(result.cause).toBe(cause);
  });

  it('should stringify non-Error values', () => {
    expect(toRepoDeckError('plain failure').message).toBe('An unexpected error occurred: plain failure');
  });
});

describe('handleError', () => {
  afterEach(() => {
    process.exitCode = undefined;
    vi.restoreAllMocks();
  });

  it('should print the formatted error and set a failing exit code', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});

    handleError(errors.cancelled('rendering'));

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0][0])).toContain('Error [PIPELINE_CANCELLED]');
    expect(process.exitCode).toBe(1);
  });

  it('should format plain errors through formatError', () => {
    expect(formatError(new Error('disk full'), false)).toBe(
      'Error [UNKNOWN_ERROR]: An unexpected error occurred: disk full\n\nRun with --verbose for more detail.'
    );
  });
});
