/**
 * Presentation Renderer
 *
 * Client for the Presenton HTTP API. Submits formatted content with the
 * resolved presentation options and maps service failures onto the
 * rendering error codes. Requests are never retried.
 */

import { z } from 'zod';
import type {
  Credentials,
  ExportFormat,
  PresentationConfig,
  PresentationPreferences,
  RenderResult,
} from '../../types/index.js';
import { errors, isRepoDeckError } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { RENDER_INSTRUCTIONS } from '../analyzer/prompts.js';

type FetchFn = typeof fetch;

export const GENERATE_PATH = '/api/v1/ppt/presentation/generate';
export const EXPORT_PATH = '/api/v1/ppt/presentation/export';
export const EXPORT_TIMEOUT_MS = 120000;

export type PreferenceOverrides = Partial<PresentationPreferences>;

export interface RendererOptions {
  fetchImpl?: FetchFn;
  logger?: Logger;
}

const renderResponseSchema = z.object({
  presentation_id: z.string().min(1),
  path: z.string().nullish(),
  edit_path: z.string().nullish(),
  credits_consumed: z.number().nullish(),
});

// ============================================================================
// PREFERENCES
// ============================================================================

/**
 * Fill every unset option from the configured defaults, field by field
 */
export function resolvePreferences(
  overrides: PreferenceOverrides,
  defaults: PresentationPreferences
): PresentationPreferences {
  return {
    nSlides: overrides.nSlides ?? defaults.nSlides,
    tone: overrides.tone ?? defaults.tone,
    verbosity: overrides.verbosity ?? defaults.verbosity,
    language: overrides.language ?? defaults.language,
    template: overrides.template ?? defaults.template,
    exportAs: overrides.exportAs ?? defaults.exportAs,
    includeTitleSlide: overrides.includeTitleSlide ?? defaults.includeTitleSlide,
    includeTableOfContents: overrides.includeTableOfContents ?? defaults.includeTableOfContents,
    imageType: overrides.imageType ?? defaults.imageType,
    webSearch: overrides.webSearch ?? defaults.webSearch,
    theme: overrides.theme ?? defaults.theme,
  };
}

/**
 * Request body for the generate endpoint
 */
export function buildGenerateBody(content: string, preferences: PresentationPreferences): Record<string, unknown> {
  return {
    content,
    instructions: RENDER_INSTRUCTIONS,
    tone: preferences.tone,
    verbosity: preferences.verbosity,
    n_slides: preferences.nSlides,
    language: preferences.language,
    template: preferences.template,
    include_title_slide: preferences.includeTitleSlide,
    include_table_of_contents: preferences.includeTableOfContents,
    export_as: preferences.exportAs,
    markdown_emphasis: true,
    web_search: preferences.webSearch,
    image_type: preferences.imageType,
    ...(preferences.theme ? { theme: preferences.theme } : {}),
  };
}

/**
 * Pull the useful part out of an error body: its `detail` field when it has one
 */
export function extractErrorDetail(text: string): unknown {
  if (text.trim() === '') return 'No error details';
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text;
  }
  if (typeof parsed === 'object' && parsed !== null && 'detail' in parsed) {
    return parsed.detail;
  }
  return parsed;
}

// ============================================================================
// RENDERER
// ============================================================================

export class PresentationRenderer {
  private readonly fetchImpl: FetchFn;
  private readonly logger: Logger;

  constructor(
    private readonly config: PresentationConfig,
    private readonly apiKey: string,
    options: RendererOptions = {}
  ) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Generate a deck from markdown content
   */
  async render(content: string, overrides: PreferenceOverrides = {}, signal?: AbortSignal): Promise<RenderResult> {
    const preferences = resolvePreferences(overrides, this.config.defaults);
    this.logger.debug(
      `Requesting ${preferences.nSlides} slides (${preferences.tone}, ${preferences.verbosity}, ${preferences.exportAs})`
    );
    const result = await this.post(
      GENERATE_PATH,
      buildGenerateBody(content, preferences),
      this.config.timeoutMs,
      signal
    );
    this.logger.debug(`Presentation ${result.presentationId} generated`);
    return result;
  }

  /**
   * Re-export an existing presentation in another format
   */
  async exportPresentation(presentationId: string, exportAs: ExportFormat, signal?: AbortSignal): Promise<RenderResult> {
    this.logger.debug(`Exporting presentation ${presentationId} as ${exportAs}`);
    return this.post(EXPORT_PATH, { id: presentationId, export_as: exportAs }, EXPORT_TIMEOUT_MS, signal);
  }

  private async post(
    path: string,
    body: Record<string, unknown>,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<RenderResult> {
    if (signal?.aborted) {
      throw errors.cancelled('rendering');
    }

    const timeoutSignal = AbortSignal.timeout(timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

    let status: number;
    let ok: boolean;
    let text: string;
    try {
      const response = await this.fetchImpl(`${this.config.apiUrl}${path}`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: combined,
      });
      status = response.status;
      ok = response.ok;
      text = await response.text();
    } catch (error) {
      if (signal?.aborted) throw errors.cancelled('rendering');
      if (timeoutSignal.aborted) throw errors.renderTimeout(timeoutMs);
      if (isRepoDeckError(error)) throw error;
      throw errors.renderTransport(error instanceof Error ? error.message : String(error));
    }

    if (!ok) {
      const detail = extractErrorDetail(text);
      throw errors.renderRejected(status, detail);
    }

    let payload: unknown;
    try {
      payload = JSON.parse(text);
    } catch {
      throw errors.renderRejected(status, text);
    }

    const parsed = renderResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw errors.renderRejected(status, payload);
    }

    return {
      presentationId: parsed.data.presentation_id,
      downloadUrl: parsed.data.path ?? undefined,
      editUrl: parsed.data.edit_path ?? undefined,
      creditsConsumed: parsed.data.credits_consumed ?? undefined,
    };
  }
}

/**
 * Create a renderer using PRESENTON_API_KEY from the credentials
 */
export function createPresentationRenderer(
  config: PresentationConfig,
  credentials: Credentials,
  options: RendererOptions = {}
): PresentationRenderer {
  if (!credentials.presentonApiKey) {
    throw errors.noApiKey('PRESENTON_API_KEY');
  }
  return new PresentationRenderer(config, credentials.presentonApiKey, options);
}
