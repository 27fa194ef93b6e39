import { describe, it, expect, vi, type Mock } from 'vitest';
import {
  PresentationRenderer,
  createPresentationRenderer,
  extractErrorDetail,
  resolvePreferences,
} from './presentation-renderer.js';
import { RENDER_INSTRUCTIONS } from '../analyzer/prompts.js';
import { DEFAULT_PRESENTATION } from '../services/config-manager.js';
import type { PresentationConfig } from '../../types/index.js';
import { Logger } from '../../utils/logger.js';
import { isRepoDeckError, type RepoDeckError } from '../../utils/errors.js';

// ============================================================================
// TEST HELPERS
// ============================================================================

const config: PresentationConfig = {
  apiUrl: 'https://presenton.test',
  timeoutMs: 5000,
  defaults: { ...DEFAULT_PRESENTATION },
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

function createRenderer(fetchImpl: typeof fetch, overrides: Partial<PresentationConfig> = {}): PresentationRenderer {
  return new PresentationRenderer({ ...config, ...overrides }, 'test-secret', {
    fetchImpl,
    logger: new Logger({ quiet: true }),
  });
}

function sentRequest(fetchMock: Mock<typeof fetch>): { url: string; init: RequestInit; body: unknown } {
  const [input, init] = fetchMock.mock.calls[0];
  if (typeof input !== 'string' || !init || typeof init.body !== 'string') {
    throw new Error('Unexpected fetch call');
  }
  return { url: input, init, body: JSON.parse(init.body) };
}

const hangingFetch: typeof fetch = (_input, init) =>
  new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (signal) {
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    }
  });

async function expectRepoDeckError(promise: Promise<unknown>): Promise<RepoDeckError> {
  const error = await promise.then(
    () => undefined,
    (e: unknown) => e
  );
  if (!isRepoDeckError(error)) {
    throw new Error(`Expected a RepoDeckError, got ${String(error)}`);
  }
  return error;
}

// ============================================================================
// TESTS
// ============================================================================

describe('resolvePreferences', () => {
  it('should fall back per field', () => {
    const resolved = resolvePreferences({ tone: 'casual', includeTitleSlide: false }, DEFAULT_PRESENTATION);

    expect(resolved).toEqual({ ...DEFAULT_PRESENTATION, tone: 'casual', includeTitleSlide: false });
  });
});

describe('extractErrorDetail', () => {
  it('should prefer the detail field', () => {
    expect(extractErrorDetail('{"detail": "Insufficient credits"}')).toBe('Insufficient credits');
    expect(extractErrorDetail('{"message": "nope"}')).toEqual({ message: 'nope' });
    expect(extractErrorDetail('Bad Gateway')).toBe('Bad Gateway');
    expect(extractErrorDetail('')).toBe('No error details');
  });
});

describe('PresentationRenderer', () => {
  it('should post the content with resolved options', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({
        presentation_id: 'abc123',
        path: 'https://presenton.test/files/abc123.pptx',
        edit_path: 'https://presenton.test/edit/abc123',
        credits_consumed: 2,
      })
    );

    const result = await createRenderer(fetchMock).render('# Hello', { nSlides: 6, theme: 'dark' });

    expect(result).toEqual({
      presentationId: 'abc123',
      downloadUrl: 'https://presenton.test/files/abc123.pptx',
      editUrl: 'https://presenton.test/edit/abc123',
      creditsConsumed: 2,
    });

    const { url, init, body } = sentRequest(fetchMock);
    expect(url).toBe('https://presenton.test/api/v1/ppt/presentation/generate');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({ Authorization: 'Bearer test-secret', 'Content-Type': 'application/json' });
    expect(body).toEqual({
      content: '# Hello',
      instructions: RENDER_INSTRUCTIONS,
      tone: 'professional',
      verbosity: 'concise',
      n_slides: 6,
      language: 'English',
      template: 'general',
      include_title_slide: true,
      include_table_of_contents: false,
      export_as: 'pptx',
      markdown_emphasis: true,
      web_search: false,
      image_type: 'stock',
      theme: 'dark',
    });
  });

  it('should omit theme when none is set', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ presentation_id: 'p1' }));

    const result = await createRenderer(fetchMock).render('# Hello');

    expect(result).toEqual({ presentationId: 'p1' });
    expect(sentRequest(fetchMock).body).not.toHaveProperty('theme');
  });

  it('should surface the service detail on rejection', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ detail: 'Insufficient credits' }, 402));

    const error = await expectRepoDeckError(createRenderer(fetchMock).render('# Hello'));

    expect(error.code).toBe('RENDER_REJECTED');
    expect(error.stage).toBe('rendering');
    expect(error.message).toBe('Presentation service rejected the request (402): Insufficient credits');
    expect(error.details).toBe('Insufficient credits');
  });

  it('should reject a success response without a presentation id', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => jsonResponse({ status: 'queued' }));

    const error = await expectRepoDeckError(createRenderer(fetchMock).render('# Hello'));

    expect(error.code).toBe('RENDER_REJECTED');
    expect(error.details).toEqual({ status: 'queued' });
  });

  it('should map connection failures to a transport error', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });

    const error = await expectRepoDeckError(createRenderer(fetchMock).render('# Hello'));

    expect(error.code).toBe('RENDER_TRANSPORT');
    expect(error.message).toBe('Failed to reach the presentation service: fetch failed');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should time out a slow service', async () => {
    const error = await expectRepoDeckError(createRenderer(hangingFetch, { timeoutMs: 20 }).render('# Hello'));

    expect(error.code).toBe('RENDER_TIMEOUT');
    expect(error.message).toBe('Presentation generation timed out after 0.02s');
  });

  it('should report cancellation by the caller', async () => {
    const controller = new AbortController();
    const pending = expectRepoDeckError(createRenderer(hangingFetch).render('# Hello', {}, controller.signal));
    controller.abort();

    expect((await pending).code).toBe('PIPELINE_CANCELLED');
  });

  it('should export an existing presentation', async () => {
    const fetchMock = vi.fn<typeof fetch>(async () =>
      jsonResponse({ presentation_id: 'abc123', path: 'https://presenton.test/files/abc123.pdf' })
    );

    const result = await createRenderer(fetchMock).exportPresentation('abc123', 'pdf');

    expect(result).toEqual({ presentationId: 'abc123', downloadUrl: 'https://presenton.test/files/abc123.pdf' });
    const { url, body } = sentRequest(fetchMock);
    expect(url).toBe('https://presenton.test/api/v1/ppt/presentation/export');
    expect(body).toEqual({ id: 'abc123', export_as: 'pdf' });
  });
});

describe('createPresentationRenderer', () => {
  it('should require PRESENTON_API_KEY', () => {
    expect(() => createPresentationRenderer(config, {})).toThrow('PRESENTON_API_KEY environment variable is not set');
  });
});
