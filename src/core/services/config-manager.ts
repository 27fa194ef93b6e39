/**
 * Configuration management service
 *
 * Resolves one immutable RepoDeckConfig from, lowest precedence first:
 * built-in defaults, .repo-deck/config.json, .repo-deck/preferences.yaml,
 * environment variables and command-line overrides.
 */

import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import { isAbsolute, join, resolve } from 'node:path';
import { z } from 'zod';
import {
  EXPORT_FORMATS,
  IMAGE_TYPES,
  MAX_SLIDES,
  MIN_SLIDES,
  TONES,
  VERBOSITY_LEVELS,
} from '../../types/index.js';
import type {
  Credentials,
  DigestConfig,
  LLMConfig,
  LLMProviderName,
  PresentationConfig,
  PresentationPreferences,
  RepoDeckConfig,
  WorkspaceConfig,
} from '../../types/index.js';
import { errors } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { YamlPreferencesStore } from './preferences-store.js';

export const CONFIG_DIR = '.repo-deck';
export const CONFIG_FILE = 'config.json';
export const PREFERENCES_FILE = 'preferences.yaml';

export const DEFAULT_MODELS: Record<LLMProviderName, string> = {
  gemini: 'gemini-1.5-flash',
  openai: 'gpt-4o-mini',
};

export const DEFAULT_IGNORE_PATTERNS = [
  '*.pyc', '*.pyo', '*.pyd', '__pycache__',
  'node_modules', 'bower_components',
  '.git', '.svn', '.hg', '.gitignore',
  'venv', '.venv', 'env', '.env', '*.env',
  '.idea', '.vscode',
  '*.log', '*.bak', '*.swp', '*.tmp',
  '.DS_Store', 'Thumbs.db',
  'build', 'dist',
  '.egg-info',
  '*.so', '*.dylib', '*.dll',
  'package-lock.json', 'yarn.lock', 'poetry.lock',
  '*.config.js', '*.config.ts',
];

export const DEFAULT_PRESENTATION: PresentationPreferences = {
  nSlides: 8,
  tone: 'professional',
  verbosity: 'concise',
  language: 'English',
  template: 'general',
  exportAs: 'pptx',
  includeTitleSlide: true,
  includeTableOfContents: false,
  imageType: 'stock',
  webSearch: false,
};

// ============================================================================
// FILE SCHEMA
// ============================================================================

const positiveInt = z.number().int().positive();

const configFileSchema = z.object({
  version: z.string().optional(),
  workspace: z
    .object({
      tempDir: z.string().min(1),
      maxRepoSizeMb: z.number().positive(),
      cleanupAfterGeneration: z.boolean(),
      cloneTimeoutMs: positiveInt,
    })
    .partial()
    .optional(),
  digest: z
    .object({
      tool: z.enum(['builtin', 'command']),
      command: z.string().min(1),
      maxDepth: positiveInt,
      maxFileSizeKb: positiveInt,
      maxLength: positiveInt,
      minLength: z.number().int().nonnegative(),
      timeoutMs: positiveInt,
      ignorePatterns: z.array(z.string()),
    })
    .partial()
    .optional(),
  llm: z
    .object({
      provider: z.enum(['gemini', 'openai']),
      model: z.string().min(1),
      apiBase: z.string().url(),
      temperature: z.number().min(0).max(2),
      maxTokens: positiveInt,
      maxRetries: positiveInt,
      initialDelayMs: z.number().int().nonnegative(),
      maxDelayMs: z.number().int().nonnegative(),
      timeoutMs: positiveInt,
    })
    .partial()
    .optional(),
  presentation: z
    .object({
      apiUrl: z.string().url(),
      timeoutMs: positiveInt,
      defaults: z
        .object({
          nSlides: z.number().int().min(MIN_SLIDES).max(MAX_SLIDES),
          tone: z.enum(TONES),
          verbosity: z.enum(VERBOSITY_LEVELS),
          language: z.string().min(1),
          template: z.string().min(1),
          exportAs: z.enum(EXPORT_FORMATS),
          includeTitleSlide: z.boolean(),
          includeTableOfContents: z.boolean(),
          imageType: z.enum(IMAGE_TYPES),
          webSearch: z.boolean(),
          theme: z.string().min(1),
        })
        .partial()
        .optional(),
    })
    .partial()
    .optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

/**
 * Values passed on the command line, applied last
 */
export interface ConfigOverrides {
  workspace?: Partial<WorkspaceConfig>;
  digest?: Partial<DigestConfig>;
  llm?: Partial<LLMConfig>;
  presentation?: Partial<Omit<PresentationConfig, 'defaults'>>;
}

export interface ResolveConfigOptions {
  rootPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
}

// ============================================================================
// FILE HELPERS
// ============================================================================

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

export function configFilePath(rootPath: string): string {
  return join(rootPath, CONFIG_DIR, CONFIG_FILE);
}

export function preferencesFilePath(rootPath: string): string {
  return join(rootPath, CONFIG_DIR, PREFERENCES_FILE);
}

/**
 * Get default repo-deck configuration
 */
export function getDefaultConfig(rootPath: string = process.cwd()): RepoDeckConfig {
  return {
    version: '1.0.0',
    workspace: {
      tempDir: join(rootPath, 'temp_repos'),
      maxRepoSizeMb: 500,
      cleanupAfterGeneration: true,
      cloneTimeoutMs: 120_000,
    },
    digest: {
      tool: 'builtin',
      command: 'cdigest',
      maxDepth: 10,
      maxFileSizeKb: 10240,
      maxLength: 50_000,
      minLength: 100,
      timeoutMs: 300_000,
      ignorePatterns: [...DEFAULT_IGNORE_PATTERNS],
    },
    llm: {
      provider: 'gemini',
      model: DEFAULT_MODELS.gemini,
      temperature: 0.7,
      maxTokens: 4000,
      maxRetries: 3,
      initialDelayMs: 1000,
      maxDelayMs: 8000,
      timeoutMs: 120_000,
    },
    presentation: {
      apiUrl: 'https://api.presenton.ai',
      timeoutMs: 180_000,
      defaults: { ...DEFAULT_PRESENTATION },
    },
    preferencesPath: preferencesFilePath(rootPath),
  };
}

/**
 * Read .repo-deck/config.json. Returns null when the file does not exist.
 */
export async function readConfigFile(rootPath: string): Promise<ConfigFile | null> {
  const path = configFilePath(rootPath);
  if (!(await fileExists(path))) return null;

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw errors.invalidConfig(path, error instanceof Error ? error.message : String(error));
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw errors.invalidConfig(
      path,
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    );
  }
  return parsed.data;
}

/**
 * Write a configuration to .repo-deck/config.json.
 * The temp directory is stored relative to the project root when it lies inside it.
 */
export async function writeConfigFile(rootPath: string, config: RepoDeckConfig): Promise<string> {
  const dir = join(rootPath, CONFIG_DIR);
  const path = configFilePath(rootPath);
  const tempDir = config.workspace.tempDir.startsWith(rootPath + '/')
    ? config.workspace.tempDir.slice(rootPath.length + 1)
    : config.workspace.tempDir;

  // A provider's default model is left implicit so switching provider switches model
  const { model, ...llm } = config.llm;
  const file: ConfigFile = {
    version: config.version,
    workspace: { ...config.workspace, tempDir },
    digest: config.digest,
    llm: model === DEFAULT_MODELS[config.llm.provider] ? llm : { ...llm, model },
    presentation: config.presentation,
  };

  await mkdir(dir, { recursive: true });
  await writeFile(path, JSON.stringify(file, null, 2) + '\n', 'utf-8');
  return path;
}

export async function configFileExists(rootPath: string): Promise<boolean> {
  return fileExists(configFilePath(rootPath));
}

// ============================================================================
// ENVIRONMENT
// ============================================================================

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const value = env[name];
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw errors.invalidConfig('environment', `${name} must be a positive number, got "${value}"`);
  }
  return parsed;
}

function envBoolean(env: NodeJS.ProcessEnv, name: string): boolean | undefined {
  const value = env[name]?.trim().toLowerCase();
  if (value === undefined || value === '') return undefined;
  if (['1', 'true', 'yes', 'on'].includes(value)) return true;
  if (['0', 'false', 'no', 'off'].includes(value)) return false;
  throw errors.invalidConfig('environment', `${name} must be true or false, got "${env[name]}"`);
}

function envProvider(env: NodeJS.ProcessEnv): LLMProviderName | undefined {
  const value = env.LLM_PROVIDER?.trim().toLowerCase();
  if (value === undefined || value === '') return undefined;
  if (value === 'gemini' || value === 'openai') return value;
  throw errors.invalidConfig('environment', `LLM_PROVIDER must be gemini or openai, got "${env.LLM_PROVIDER}"`);
}

function envString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/**
 * Read API keys from the environment. Keys are never read from files.
 */
export function resolveCredentials(env: NodeJS.ProcessEnv = process.env): Credentials {
  return {
    googleApiKey: envString(env, 'GOOGLE_API_KEY'),
    openaiApiKey: envString(env, 'OPENAI_API_KEY'),
    presentonApiKey: envString(env, 'PRESENTON_API_KEY'),
  };
}

// ============================================================================
// RESOLUTION
// ============================================================================

function deepFreeze<T extends object>(value: T): Readonly<T> {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === 'object' && child !== null) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

function withoutUndefined<T extends object>(value: T | undefined): Partial<T> {
  if (!value) return {};
  const result: Partial<T> = { ...value };
  for (const key of Object.keys(result)) {
    if (Reflect.get(result, key) === undefined) {
      Reflect.deleteProperty(result, key);
    }
  }
  return result;
}

/**
 * Build the configuration for this process and freeze it
 */
export async function resolveConfig(options: ResolveConfigOptions = {}): Promise<Readonly<RepoDeckConfig>> {
  const rootPath = options.rootPath ?? process.cwd();
  const env = options.env ?? process.env;
  const overrides = options.overrides ?? {};

  const config = getDefaultConfig(rootPath);
  const file = await readConfigFile(rootPath);

  // Model defaults follow the provider unless something names a model
  let explicitModel: string | undefined;

  if (file) {
    if (file.version) config.version = file.version;
    Object.assign(config.workspace, withoutUndefined(file.workspace));
    Object.assign(config.digest, withoutUndefined(file.digest));
    const filePresentation: NonNullable<ConfigFile['presentation']> = file.presentation ?? {};
    const { defaults, ...presentation } = filePresentation;
    Object.assign(config.presentation, withoutUndefined(presentation));
    Object.assign(config.presentation.defaults, withoutUndefined(defaults));
    const fileLlm: NonNullable<ConfigFile['llm']> = file.llm ?? {};
    const { model, ...llm } = fileLlm;
    Object.assign(config.llm, withoutUndefined(llm));
    explicitModel = model;
  }

  try {
    const stored = await new YamlPreferencesStore(config.preferencesPath).read();
    Object.assign(config.presentation.defaults, stored);
  } catch (error) {
    logger.warning(
      `Ignoring stored preferences: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const tempDir = envString(env, 'REPO_DECK_TEMP_DIR');
  if (tempDir) config.workspace.tempDir = tempDir;
  config.workspace.maxRepoSizeMb = envNumber(env, 'MAX_REPO_SIZE_MB') ?? config.workspace.maxRepoSizeMb;
  config.workspace.cleanupAfterGeneration =
    envBoolean(env, 'CLEANUP_AFTER_GENERATION') ?? config.workspace.cleanupAfterGeneration;
  config.llm.provider = envProvider(env) ?? config.llm.provider;
  const envModel = envString(env, config.llm.provider === 'gemini' ? 'GEMINI_MODEL' : 'OPENAI_MODEL');
  explicitModel = envModel ?? explicitModel;
  const apiBase = envString(env, 'OPENAI_API_BASE');
  if (apiBase) config.llm.apiBase = apiBase;
  const apiUrl = envString(env, 'PRESENTON_API_URL');
  if (apiUrl) config.presentation.apiUrl = apiUrl;

  Object.assign(config.workspace, withoutUndefined(overrides.workspace));
  Object.assign(config.digest, withoutUndefined(overrides.digest));
  Object.assign(config.presentation, withoutUndefined(overrides.presentation));
  const cliLlm: Partial<LLMConfig> = overrides.llm ?? {};
  const { model: overrideModel, ...llmOverrides } = cliLlm;
  Object.assign(config.llm, withoutUndefined(llmOverrides));
  explicitModel = overrideModel ?? explicitModel;

  config.llm.model = explicitModel ?? DEFAULT_MODELS[config.llm.provider];
  config.presentation.apiUrl = config.presentation.apiUrl.replace(/\/+$/, '');
  if (!isAbsolute(config.workspace.tempDir)) {
    config.workspace.tempDir = resolve(rootPath, config.workspace.tempDir);
  }

  return deepFreeze(config);
}
