/**
 * Core type definitions for repo-deck
 */

// Presentation option enumerations
export const TONES = ['default', 'casual', 'professional', 'funny', 'educational', 'sales_pitch'] as const;
export const VERBOSITY_LEVELS = ['concise', 'standard', 'text-heavy'] as const;
export const EXPORT_FORMATS = ['pptx', 'pdf'] as const;
export const IMAGE_TYPES = ['stock', 'ai-generated'] as const;

export type Tone = (typeof TONES)[number];
export type Verbosity = (typeof VERBOSITY_LEVELS)[number];
export type ExportFormat = (typeof EXPORT_FORMATS)[number];
export type ImageType = (typeof IMAGE_TYPES)[number];

export const MIN_SLIDES = 5;
export const MAX_SLIDES = 15;

// Request types

/**
 * A validated request to turn a repository into a presentation.
 * Optional fields left unset fall back to the configured defaults at render time.
 */
export interface GenerationRequest {
  readonly githubUrl: string;
  readonly nSlides?: number;
  readonly tone?: Tone;
  readonly verbosity?: Verbosity;
  readonly language?: string;
  readonly template?: string;
  readonly exportAs?: ExportFormat;
  readonly includeTitleSlide?: boolean;
  readonly includeTableOfContents?: boolean;
  readonly imageType?: ImageType;
  readonly webSearch?: boolean;
  readonly theme?: string;
}

export interface PresentationPreferences {
  nSlides: number;
  tone: Tone;
  verbosity: Verbosity;
  language: string;
  template: string;
  exportAs: ExportFormat;
  includeTitleSlide: boolean;
  includeTableOfContents: boolean;
  imageType: ImageType;
  webSearch: boolean;
  theme?: string;
}

/**
 * Subset of preferences written to the preferences store on every run
 */
export type PersistedPreferences = Partial<
  Pick<
    PresentationPreferences,
    'tone' | 'verbosity' | 'template' | 'exportAs' | 'includeTitleSlide' | 'includeTableOfContents' | 'nSlides'
  >
>;

// Repository types

export interface RepositoryRef {
  owner: string;
  repo: string;
  fullName: string;
  cloneUrl: string;
}

export interface WorkingCopy {
  readonly path: string;
  readonly owner: string;
  readonly repo: string;
  readonly sizeMb: number;
  readonly runId: string;
}

// Analysis types

export const FACT_SET_KEYS = [
  'project_name',
  'tagline',
  'problem',
  'solution',
  'tech_stack',
  'key_features',
  'innovation',
  'architecture',
  'demo_highlights',
  'future_scope',
] as const;

export type FactSetKey = (typeof FACT_SET_KEYS)[number];

/**
 * Presentation-worthy facts extracted from a digest.
 * Keys mirror the JSON contract the model is asked to produce.
 */
export interface FactSet {
  project_name: string;
  tagline: string;
  problem: string;
  solution: string;
  tech_stack: string[];
  key_features: string[];
  innovation: string;
  architecture: string;
  demo_highlights: string[];
  future_scope: string[];
}

// Render types

export interface RenderResult {
  readonly presentationId: string;
  readonly downloadUrl?: string;
  readonly editUrl?: string;
  readonly creditsConsumed?: number;
}

// Pipeline types

export type PipelineState =
  | 'idle'
  | 'acquiring'
  | 'digesting'
  | 'analyzing'
  | 'formatting'
  | 'rendering'
  | 'succeeded'
  | 'failed';

export type PipelineStage =
  | 'validation'
  | 'acquiring'
  | 'digesting'
  | 'analyzing'
  | 'formatting'
  | 'rendering';

export interface StageRecord {
  stage: PipelineStage;
  status: 'completed' | 'failed' | 'skipped';
  durationMs: number;
}

export interface GenerationSuccess {
  status: 'success';
  runId: string;
  repository: string;
  presentationId: string;
  downloadUrl?: string;
  editUrl?: string;
  creditsConsumed?: number;
  durationMs: number;
  processingTime: string;
  message: string;
  stages: StageRecord[];
}

export interface GenerationFailure {
  status: 'error';
  runId: string;
  repository: string;
  stage: PipelineStage;
  code: string;
  error: string;
  suggestion?: string;
  durationMs: number;
  timestamp: string;
  stages: StageRecord[];
}

export type GenerationOutcome = GenerationSuccess | GenerationFailure;

// Configuration types

export type LLMProviderName = 'gemini' | 'openai';
export type DigestToolName = 'builtin' | 'command';

export interface WorkspaceConfig {
  tempDir: string;
  maxRepoSizeMb: number;
  cleanupAfterGeneration: boolean;
  cloneTimeoutMs: number;
}

export interface DigestConfig {
  tool: DigestToolName;
  command: string;
  maxDepth: number;
  maxFileSizeKb: number;
  maxLength: number;
  minLength: number;
  timeoutMs: number;
  ignorePatterns: string[];
}

export interface LLMConfig {
  provider: LLMProviderName;
  model: string;
  apiBase?: string;
  temperature: number;
  maxTokens: number;
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  timeoutMs: number;
}

export interface PresentationConfig {
  apiUrl: string;
  timeoutMs: number;
  defaults: PresentationPreferences;
}

export interface RepoDeckConfig {
  version: string;
  workspace: WorkspaceConfig;
  digest: DigestConfig;
  llm: LLMConfig;
  presentation: PresentationConfig;
  preferencesPath: string;
}

export interface Credentials {
  googleApiKey?: string;
  openaiApiKey?: string;
  presentonApiKey?: string;
}
