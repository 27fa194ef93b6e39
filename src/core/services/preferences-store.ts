/**
 * Persisted presentation preferences
 *
 * Each run writes the choices it was given to .repo-deck/preferences.yaml;
 * the stored values become the defaults of the next run. Concurrent runs
 * overwrite each other (last writer wins).
 */

import { mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { EXPORT_FORMATS, MAX_SLIDES, MIN_SLIDES, TONES, VERBOSITY_LEVELS } from '../../types/index.js';
import type { PersistedPreferences } from '../../types/index.js';
import { errors } from '../../utils/errors.js';

export interface PreferencesStore {
  read(): Promise<PersistedPreferences>;
  /** Overwrite the stored values with every field set in `partial` */
  merge(partial: PersistedPreferences): Promise<void>;
  clear(): Promise<void>;
}

const preferencesSchema = z
  .object({
    tone: z.enum(TONES),
    verbosity: z.enum(VERBOSITY_LEVELS),
    template: z.string().min(1),
    exportAs: z.enum(EXPORT_FORMATS),
    includeTitleSlide: z.boolean(),
    includeTableOfContents: z.boolean(),
    nSlides: z.number().int().min(MIN_SLIDES).max(MAX_SLIDES),
  })
  .partial();

/**
 * Validate preferences, dropping keys whose value is undefined so they do
 * not erase stored values
 */
export function compactPreferences(values: PersistedPreferences): PersistedPreferences {
  return preferencesSchema.parse(
    Object.fromEntries(Object.entries(values).filter(([, value]) => value !== undefined))
  );
}

export class YamlPreferencesStore implements PreferencesStore {
  constructor(private readonly filePath: string) {}

  get path(): string {
    return this.filePath;
  }

  async read(): Promise<PersistedPreferences> {
    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return {};
      throw error;
    }

    let raw: unknown;
    try {
      raw = YAML.parse(content);
    } catch (error) {
      throw errors.invalidConfig(this.filePath, error instanceof Error ? error.message : String(error));
    }
    if (raw === null || raw === undefined) return {};

    const parsed = preferencesSchema.safeParse(raw);
    if (!parsed.success) {
      throw errors.invalidConfig(
        this.filePath,
        parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ')
      );
    }
    return parsed.data;
  }

  async merge(partial: PersistedPreferences): Promise<void> {
    const existing = await this.read();
    const next = { ...existing, ...compactPreferences(partial) };

    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, YAML.stringify(next), 'utf-8');
  }

  async clear(): Promise<void> {
    await rm(this.filePath, { force: true });
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
