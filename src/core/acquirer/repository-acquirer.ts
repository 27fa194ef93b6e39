/**
 * Repository acquisition
 *
 * Shallow-clones a public GitHub repository into a run-scoped working
 * directory, enforces the size ceiling and owns deletion of the copy.
 */

import { execFile } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { lstat, mkdir, readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { promisify } from 'node:util';
import type { WorkingCopy, WorkspaceConfig } from '../../types/index.js';
import { errors, type RepoDeckError } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { describeUrlProblem, parseRepositoryUrl, workingCopyName } from '../../utils/url.js';

const execFileAsync = promisify(execFile);

// ============================================================================
// TYPES
// ============================================================================

export interface CloneOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Source of repository checkouts
 */
export interface GitClient {
  clone(url: string, destination: string, options: CloneOptions): Promise<void>;
}

export interface AcquireOptions {
  runId?: string;
  signal?: AbortSignal;
}

export class GitCommandError extends Error {
  readonly stderr: string;
  readonly timedOut: boolean;

  constructor(message: string, stderr: string, timedOut: boolean) {
    super(message);
    this.name = 'GitCommandError';
    this.stderr = stderr;
    this.timedOut = timedOut;
  }
}

// ============================================================================
// GIT CLI CLIENT
// ============================================================================

/**
 * Clones with the git executable on PATH. Credential prompts are disabled
 * so a private or missing repository fails instead of waiting for input.
 */
export class GitCliClient implements GitClient {
  async clone(url: string, destination: string, options: CloneOptions): Promise<void> {
    try {
      await execFileAsync('git', ['clone', '--depth', '1', '--single-branch', '--', url, destination], {
        timeout: options.timeoutMs,
        signal: options.signal,
        maxBuffer: 10 * 1024 * 1024,
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0' },
      });
    } catch (error) {
      if (options.signal?.aborted) throw error;

      const stderr = error instanceof Error && 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';
      const killed = error instanceof Error && 'killed' in error && error.killed === true;
      const message = error instanceof Error ? error.message : String(error);
      throw new GitCommandError(message, stderr, killed);
    }
  }
}

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Short identifier that scopes one run's working directory
 */
export function createRunId(): string {
  return randomUUID().slice(0, 8);
}

/**
 * Map git's stderr to a repository error
 */
export function classifyGitError(url: string, stderr: string): RepoDeckError {
  const text = stderr.toLowerCase();

  if (text.includes('repository not found') || text.includes('does not exist') || text.includes('404')) {
    return errors.repoNotFound(url, stderr);
  }

  if (
    text.includes('authentication failed') ||
    text.includes('could not read username') ||
    text.includes('terminal prompts disabled') ||
    text.includes('permission denied') ||
    text.includes('403')
  ) {
    return errors.repoAccessDenied(url, stderr);
  }

  const firstLine = stderr.split('\n').find(line => line.trim()) ?? 'git exited with an error';
  return errors.cloneFailed(url, firstLine.replace(/^fatal:\s*/i, '').trim());
}

/**
 * Total size in bytes of every file below `path`. Symlinks are not followed.
 */
export async function getDirectorySize(path: string): Promise<number> {
  let total = 0;
  const entries = await readdir(path, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(path, entry.name);
    if (entry.isDirectory()) {
      total += await getDirectorySize(fullPath);
    } else if (entry.isFile()) {
      total += (await lstat(fullPath)).size;
    }
  }

  return total;
}

// ============================================================================
// ACQUIRER
// ============================================================================

export class RepositoryAcquirer {
  private readonly git: GitClient;
  private readonly logger: Logger;
  private readonly measureSize: (path: string) => Promise<number>;

  constructor(
    private readonly config: Pick<WorkspaceConfig, 'tempDir' | 'maxRepoSizeMb' | 'cloneTimeoutMs'>,
    options: { git?: GitClient; logger?: Logger; measureSize?: (path: string) => Promise<number> } = {}
  ) {
    this.git = options.git ?? new GitCliClient();
    this.logger = options.logger ?? defaultLogger;
    this.measureSize = options.measureSize ?? getDirectorySize;
  }

  /**
   * Clone `url` into a fresh working directory.
   * Any failure leaves no directory behind.
   */
  async acquire(url: string, options: AcquireOptions = {}): Promise<WorkingCopy> {
    const { signal } = options;
    const ref = parseRepositoryUrl(url);
    if (!ref) {
      throw errors.validation([describeUrlProblem(url) ?? 'Invalid GitHub repository URL']);
    }
    if (signal?.aborted) throw errors.cancelled('acquiring');

    const runId = options.runId ?? createRunId();
    const path = join(this.config.tempDir, workingCopyName(ref, runId));

    await mkdir(this.config.tempDir, { recursive: true });
    await rm(path, { recursive: true, force: true });

    this.logger.discovery(`Cloning ${ref.fullName}`);
    this.logger.debug(`Working copy: ${path}`);

    try {
      await this.git.clone(ref.cloneUrl, path, { timeoutMs: this.config.cloneTimeoutMs, signal });
    } catch (error) {
      await rm(path, { recursive: true, force: true });
      if (signal?.aborted) throw errors.cancelled('acquiring');
      if (error instanceof GitCommandError) {
        if (error.timedOut) throw errors.cloneTimeout(url, this.config.cloneTimeoutMs);
        throw classifyGitError(url, error.stderr);
      }
      throw errors.cloneFailed(url, error instanceof Error ? error.message : String(error));
    }

    let sizeMb: number;
    try {
      sizeMb = (await this.measureSize(path)) / (1024 * 1024);
    } catch (error) {
      await rm(path, { recursive: true, force: true });
      throw errors.cloneFailed(
        url,
        `could not measure the working copy: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (sizeMb > this.config.maxRepoSizeMb) {
      await rm(path, { recursive: true, force: true });
      throw errors.repoTooLarge(sizeMb, this.config.maxRepoSizeMb);
    }

    this.logger.debug(`Cloned ${ref.fullName} (${sizeMb.toFixed(2)}MB)`);
    return { path, owner: ref.owner, repo: ref.repo, sizeMb, runId };
  }

  /**
   * Delete a working copy. Never throws; failures are logged.
   */
  async release(copy: WorkingCopy): Promise<void> {
    try {
      await rm(copy.path, { recursive: true, force: true });
      this.logger.debug(`Removed working copy ${copy.path}`);
    } catch (error) {
      this.logger.warning(
        `Could not remove ${copy.path}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}
