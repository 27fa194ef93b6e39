/**
 * repo-deck library entry point
 */

export * from './types/index.js';

export { GenerationPipeline, toResponsePayload, formatProcessingTime } from './core/pipeline/generation-pipeline.js';
export type {
  Acquirer,
  Analyzer,
  Digester,
  Renderer,
  PipelineDependencies,
  PipelineOptions,
  SuccessPayload,
  ErrorPayload,
} from './core/pipeline/generation-pipeline.js';
export { validateRequest, checkRequest, generationRequestSchema } from './core/pipeline/request-validator.js';
export type { GenerationRequestInput, ValidationResult } from './core/pipeline/request-validator.js';

export { RepositoryAcquirer, GitCliClient, classifyGitError } from './core/acquirer/repository-acquirer.js';
export type { GitClient, CloneOptions } from './core/acquirer/repository-acquirer.js';
export {
  DigestProducer,
  FileWalkerDigestTool,
  CommandDigestTool,
  truncateDigest,
  TRUNCATION_MARKER,
} from './core/digest/digest-producer.js';
export type { DigestTool, DigestToolOptions } from './core/digest/digest-producer.js';
export { ContentAnalyzer, parseFactSet } from './core/analyzer/content-analyzer.js';
export { formatFactSet } from './core/formatter/content-formatter.js';
export {
  PresentationRenderer,
  createPresentationRenderer,
  resolvePreferences,
} from './core/renderer/presentation-renderer.js';

export { resolveConfig, resolveCredentials, getDefaultConfig } from './core/services/config-manager.js';
export { createLLMService, LLMService, GeminiProvider, OpenAIProvider } from './core/services/llm-service.js';
export type { LLMProvider, CompletionRequest, CompletionResponse } from './core/services/llm-service.js';
export { YamlPreferencesStore } from './core/services/preferences-store.js';
export type { PreferencesStore } from './core/services/preferences-store.js';

export { RepoDeckError, errors, isRepoDeckError } from './utils/errors.js';
export type { ErrorCode } from './utils/errors.js';
export { Logger, logger, configureLogger } from './utils/logger.js';
