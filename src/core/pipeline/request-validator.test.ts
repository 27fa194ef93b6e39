import { describe, it, expect } from 'vitest';
import { checkRequest, validateRequest } from './request-validator.js';
import { isRepoDeckError } from '../../utils/errors.js';

describe('validateRequest', () => {
  it('should map the wire shape to a request and leave unset fields unset', () => {
    const request = validateRequest({
      github_url: 'https://github.com/octocat/Hello-World',
      n_slides: 10,
      tone: 'educational',
      export_as: 'pdf',
      include_table_of_contents: true,
      web_search: null,
    });

    expect(request).toEqual({
      githubUrl: 'https://github.com/octocat/Hello-World',
      nSlides: 10,
      tone: 'educational',
      exportAs: 'pdf',
      includeTableOfContents: true,
    });
    expect(Object.keys(request)).not.toContain('webSearch');
    expect(Object.isFrozen(request)).toBe(true);
  });

  it('should accept the slide bounds', () => {
    expect(validateRequest({ github_url: 'https://github.com/a/b', n_slides: 5 }).nSlides).toBe(5);
    expect(validateRequest({ github_url: 'https://github.com/a/b', n_slides: 15 }).nSlides).toBe(15);
  });

  it('should report every invalid field', () => {
    const result = checkRequest({
      github_url: 'https://github.com/a/b',
      n_slides: 16,
      tone: 'angry',
      verbosity: 'verbose',
      export_as: 'key',
      image_type: 'clipart',
    });

    expect(result).toEqual({
      ok: false,
      issues: [
        'n_slides: Number of slides must be between 5 and 15',
        'tone: Tone must be one of: default, casual, professional, funny, educational, sales_pitch',
        'verbosity: Verbosity must be one of: concise, standard, text-heavy',
        "export_as: Export format must be 'pptx' or 'pdf'",
        'image_type: Image type must be one of: stock, ai-generated',
      ],
    });
  });

  it.each([
    ['', 'URL cannot be empty'],
    ['not a url', 'Invalid URL format'],
    ['https://gitlab.com/a/b', 'URL must be from github.com'],
    [
      'https://github.com/a',
      'Invalid GitHub repository URL format. Expected: https://github.com/username/repository',
    ],
  ])('should explain why %j is rejected', (url, message) => {
    expect(checkRequest({ github_url: url })).toEqual({ ok: false, issues: [`github_url: ${message}`] });
  });

  it('should throw a validation error', () => {
    try {
      validateRequest({ n_slides: 8 });
      expect.unreachable();
    } catch (error) {
      expect(isRepoDeckError(error)).toBe(true);
      if (!isRepoDeckError(error)) return;
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.stage).toBe('validation');
      expect(error.message).toBe('Invalid request: github_url: Required');
    }
  });
});
