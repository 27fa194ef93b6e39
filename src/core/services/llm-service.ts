/**
 * LLM Service
 *
 * Provider-agnostic text generation with per-request timeouts,
 * cancellation and token usage tracking.
 */

import { z } from 'zod';
import type { Credentials, LLMConfig } from '../../types/index.js';
import { errors } from '../../utils/errors.js';
import logger from '../../utils/logger.js';

// ============================================================================
// TYPES
// ============================================================================

/**
 * Completion request parameters
 */
export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  temperature?: number;
  maxTokens?: number;
  responseFormat?: 'text' | 'json';
  signal?: AbortSignal;
}

/**
 * Completion response
 */
export interface CompletionResponse {
  content: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  model: string;
  finishReason: 'stop' | 'length' | 'error';
}

/**
 * LLM provider interface
 */
export interface LLMProvider {
  name: string;
  model: string;
  generateCompletion(request: CompletionRequest): Promise<CompletionResponse>;
  countTokens(text: string): number;
  maxContextTokens: number;
  maxOutputTokens: number;
}

/**
 * Token usage tracking
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  requests: number;
}

export interface LLMServiceOptions {
  /** Request timeout in ms */
  timeout?: number;
}

/**
 * Failed text generation request. `retryable` is set for rate limits,
 * server errors, timeouts and connectivity failures.
 */
export class LLMRequestError extends Error {
  readonly status?: number;
  readonly retryable: boolean;

  constructor(message: string, options: { status?: number; retryable: boolean; cause?: unknown }) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'LLMRequestError';
    this.status = options.status;
    this.retryable = options.retryable;
  }

  static fromStatus(status: number, body: string): LLMRequestError {
    return new LLMRequestError(`HTTP ${status}: ${body.slice(0, 500)}`, {
      status,
      retryable: status === 429 || status >= 500,
    });
  }
}

type FetchFn = typeof fetch;

// ============================================================================
// FETCH HELPERS
// ============================================================================

/**
 * Validate and normalise an API base URL
 */
function normalizeApiBase(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new Error(`Invalid API base URL: "${url}". Must be a valid URL (e.g., http://localhost:8000/v1).`);
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new Error(`Unsupported protocol in API base URL: "${parsed.protocol}". Only http and https are allowed.`);
  }

  return parsed.toString().replace(/\/+$/, '');
}

async function postJson(
  fetchImpl: FetchFn,
  url: string,
  headers: Record<string, string>,
  body: unknown,
  signal?: AbortSignal
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal,
    });
  } catch (error) {
    if (signal?.aborted) throw error;
    throw new LLMRequestError(`Connection failed: ${error instanceof Error ? error.message : String(error)}`, {
      retryable: true,
      cause: error,
    });
  }

  if (!response.ok) {
    throw LLMRequestError.fromStatus(response.status, await response.text());
  }

  return response.json();
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

// ============================================================================
// TOKEN ESTIMATION
// ============================================================================

/**
 * Estimate token count from text (rough approximation)
 * ~4 characters per token for English text, ~2 for punctuation-heavy code
 */
export function estimateTokens(text: string): number {
  const codePatterns = /[{}()[\];:,.<>/\\|`~!@#$%^&*=+]/g;
  const codeCharCount = (text.match(codePatterns) ?? []).length;
  const regularCharCount = text.length - codeCharCount;

  return Math.ceil(regularCharCount / 4 + codeCharCount / 2);
}

// ============================================================================
// GEMINI PROVIDER
// ============================================================================

const geminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() })).optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      })
    )
    .optional(),
  usageMetadata: z
    .object({
      promptTokenCount: z.number().optional(),
      candidatesTokenCount: z.number().optional(),
      totalTokenCount: z.number().optional(),
    })
    .optional(),
  modelVersion: z.string().optional(),
});

/**
 * Google Gemini provider (Generative Language REST API)
 */
export class GeminiProvider implements LLMProvider {
  name = 'gemini';
  maxContextTokens = 1_000_000;
  maxOutputTokens = 8192;

  readonly model: string;
  private apiKey: string;
  private baseUrl: string;
  private fetchImpl: FetchFn;

  constructor(apiKey: string, model = 'gemini-1.5-flash', baseUrl?: string, fetchImpl: FetchFn = fetch) {
    this.apiKey = apiKey;
    this.model = model;
    this.baseUrl = baseUrl ? normalizeApiBase(baseUrl) : 'https://generativelanguage.googleapis.com/v1beta';
    this.fetchImpl = fetchImpl;
  }

  countTokens(text: string): number {
    return estimateTokens(text);
  }

  async generateCompletion(request: CompletionRequest): Promise<CompletionResponse> {
    const raw = await postJson(
      this.fetchImpl,
      `${this.baseUrl}/models/${encodeURIComponent(this.model)}:generateContent`,
      { 'x-goog-api-key': this.apiKey },
      {
        systemInstruction: { parts: [{ text: request.systemPrompt }] },
        contents: [{ role: 'user', parts: [{ text: request.userPrompt }] }],
        generationConfig: {
          temperature: request.temperature ?? 0.7,
          maxOutputTokens: request.maxTokens ?? this.maxOutputTokens,
          ...(request.responseFormat === 'json' ? { responseMimeType: 'application/json' } : {}),
        },
      },
      request.signal
    );

    const parsed = geminiResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LLMRequestError(`Unexpected Gemini response: ${describeIssues(parsed.error)}`, { retryable: true });
    }

    const candidate = parsed.data.candidates?.[0];
    const content = (candidate?.content?.parts ?? []).map(part => part.text ?? '').join('');
    const usage = parsed.data.usageMetadata;
    const inputTokens = usage?.promptTokenCount ?? this.countTokens(request.systemPrompt + request.userPrompt);
    const outputTokens = usage?.candidatesTokenCount ?? this.countTokens(content);

    return {
      content,
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: usage?.totalTokenCount ?? inputTokens + outputTokens,
      },
      model: parsed.data.modelVersion ?? this.model,
      finishReason:
        candidate?.finishReason === 'STOP' ? 'stop' : candidate?.finishReason === 'MAX_TOKENS' ? 'length' : 'error',
    };
  }
}

// ============================================================================
// OPENAI PROVIDER
// ============================================================================

const openAIResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable().optional() }),
      finish_reason: z.string().nullable().optional(),
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
  model: z.string().optional(),
});

/**
 * OpenAI provider, also used for OpenAI-compatible servers via apiBase
 */
export class OpenAIProvider implements LLMProvider {
  name = 'openai';
  maxContextTokens = 128000;
  maxOutputTokens = 4096;

  readonly model: string;
  private apiKey: string;
  private baseUrl: string;
  private fetchImpl: FetchFn;

  constructor(apiKey: string, model = 'gpt-4o-mini', baseUrl?: string, fetchImpl: FetchFn = fetch) {
    this.apiKey = apiKey;
    this.model = model;
    this.baseUrl = baseUrl ? normalizeApiBase(baseUrl) : 'https://api.openai.com/v1';
    this.fetchImpl = fetchImpl;
  }

  countTokens(text: string): number {
    return estimateTokens(text);
  }

  async generateCompletion(request: CompletionRequest): Promise<CompletionResponse> {
    const body: Record<string, unknown> = {
      model: this.model,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt },
      ],
      max_tokens: request.maxTokens ?? this.maxOutputTokens,
      temperature: request.temperature ?? 0.7,
    };

    if (request.responseFormat === 'json') {
      body.response_format = { type: 'json_object' };
    }

    const raw = await postJson(
      this.fetchImpl,
      `${this.baseUrl}/chat/completions`,
      { Authorization: `Bearer ${this.apiKey}` },
      body,
      request.signal
    );

    const parsed = openAIResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw new LLMRequestError(`Unexpected OpenAI response: ${describeIssues(parsed.error)}`, { retryable: true });
    }

    const choice = parsed.data.choices[0];
    const content = choice?.message.content ?? '';
    const usage = parsed.data.usage;
    const inputTokens = usage?.prompt_tokens ?? this.countTokens(request.systemPrompt + request.userPrompt);
    const outputTokens = usage?.completion_tokens ?? this.countTokens(content);

    return {
      content,
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: usage?.total_tokens ?? inputTokens + outputTokens,
      },
      model: parsed.data.model ?? this.model,
      finishReason: choice?.finish_reason === 'stop' ? 'stop' : choice?.finish_reason === 'length' ? 'length' : 'error',
    };
  }
}

// ============================================================================
// MOCK PROVIDER (for testing)
// ============================================================================

/**
 * Mock provider for testing
 */
export class MockLLMProvider implements LLMProvider {
  name = 'mock';
  model = 'mock-model';
  maxContextTokens = 100000;
  maxOutputTokens = 4096;

  private queued: string[] = [];
  private defaultResponse = '{"result": "mock response"}';
  public callHistory: CompletionRequest[] = [];
  public shouldFail = false;
  public failCount = 0;
  private currentFailCount = 0;

  setDefaultResponse(response: string): void {
    this.defaultResponse = response;
  }

  /**
   * Responses returned in order by the next calls, before any other rule applies
   */
  queueResponses(...responses: string[]): void {
    this.queued.push(...responses);
  }

  countTokens(text: string): number {
    return estimateTokens(text);
  }

  async generateCompletion(request: CompletionRequest): Promise<CompletionResponse> {
    this.callHistory.push(request);
    request.signal?.throwIfAborted();

    if (this.shouldFail && this.currentFailCount < this.failCount) {
      this.currentFailCount++;
      throw new LLMRequestError('Mock failure', { status: 500, retryable: true });
    }

    const content = this.queued.shift() ?? this.defaultResponse;

    const inputTokens = this.countTokens(request.systemPrompt + request.userPrompt);
    const outputTokens = this.countTokens(content);

    return {
      content,
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: inputTokens + outputTokens,
      },
      model: this.model,
      finishReason: 'stop',
    };
  }
}

// ============================================================================
// LLM SERVICE
// ============================================================================

/**
 * LLM Service - main interface for LLM interactions.
 * Each call makes exactly one provider request; callers own retry policy.
 */
export class LLMService {
  private provider: LLMProvider;
  private timeout: number;
  private tokenUsage: TokenUsage = { inputTokens: 0, outputTokens: 0, totalTokens: 0, requests: 0 };

  constructor(provider: LLMProvider, options: LLMServiceOptions = {}) {
    this.provider = provider;
    this.timeout = options.timeout ?? 120000;
  }

  getProviderName(): string {
    return this.provider.name;
  }

  getModel(): string {
    return this.provider.model;
  }

  getTokenUsage(): TokenUsage {
    return { ...this.tokenUsage };
  }

  /**
   * Generate a completion, bounded by the service timeout and the caller's signal.
   * Aborts by the caller propagate unchanged; timeouts become retryable LLMRequestErrors.
   */
  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const inputTokens = this.provider.countTokens(request.systemPrompt + request.userPrompt);
    const maxTokens = request.maxTokens ?? this.provider.maxOutputTokens;
    const totalExpected = inputTokens + maxTokens;

    if (totalExpected > this.provider.maxContextTokens) {
      throw new LLMRequestError(
        `Request exceeds context limit: ${totalExpected} > ${this.provider.maxContextTokens}`,
        { retryable: false }
      );
    }

    if (totalExpected > this.provider.maxContextTokens * 0.9) {
      logger.warning(`Approaching context limit: ${totalExpected} tokens (max: ${this.provider.maxContextTokens})`);
    }

    const timeoutSignal = AbortSignal.timeout(this.timeout);
    const signal = request.signal ? AbortSignal.any([request.signal, timeoutSignal]) : timeoutSignal;

    logger.debug(`LLM request to ${this.provider.name}/${this.provider.model} (~${inputTokens} input tokens)`);

    try {
      const response = await this.provider.generateCompletion({ ...request, signal });
      this.updateTracking(response);
      return response;
    } catch (error) {
      if (request.signal?.aborted) throw error;
      if (timeoutSignal.aborted) {
        throw new LLMRequestError(`Request timed out after ${this.timeout / 1000}s`, {
          retryable: true,
          cause: error,
        });
      }
      throw error;
    }
  }

  private updateTracking(response: CompletionResponse): void {
    this.tokenUsage.inputTokens += response.usage.inputTokens;
    this.tokenUsage.outputTokens += response.usage.outputTokens;
    this.tokenUsage.totalTokens += response.usage.totalTokens;
    this.tokenUsage.requests++;
  }
}

// ============================================================================
// FACTORY FUNCTIONS
// ============================================================================

/**
 * Create an LLM service for the configured provider
 */
export function createLLMService(
  config: Pick<LLMConfig, 'provider' | 'model' | 'apiBase' | 'timeoutMs'>,
  credentials: Credentials,
  fetchImpl: FetchFn = fetch
): LLMService {
  let provider: LLMProvider;

  if (config.provider === 'gemini') {
    if (!credentials.googleApiKey) {
      throw errors.noApiKey('GOOGLE_API_KEY');
    }
    provider = new GeminiProvider(credentials.googleApiKey, config.model, undefined, fetchImpl);
  } else {
    if (!credentials.openaiApiKey) {
      throw errors.noApiKey('OPENAI_API_KEY');
    }
    provider = new OpenAIProvider(credentials.openaiApiKey, config.model, config.apiBase, fetchImpl);
  }

  return new LLMService(provider, { timeout: config.timeoutMs });
}

/**
 * Create an LLM service with a mock provider (for testing)
 */
export function createMockLLMService(options: LLMServiceOptions = {}): { service: LLMService; provider: MockLLMProvider } {
  const provider = new MockLLMProvider();
  const service = new LLMService(provider, options);
  return { service, provider };
}
