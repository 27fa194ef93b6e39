/**
 * GitHub repository URL handling
 */

import type { RepositoryRef } from '../types/index.js';

const GITHUB_HOSTS = new Set(['github.com', 'www.github.com']);
const REPO_PATH = /^\/([\w-]+)\/([\w.-]+?)(?:\.git)?\/?$/;

/**
 * Parse a public GitHub repository URL.
 * Returns null for anything that is not exactly https?://github.com/owner/repo.
 */
export function parseRepositoryUrl(url: string): RepositoryRef | null {
  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return null;
  }

  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') return null;
  if (!GITHUB_HOSTS.has(parsed.hostname.toLowerCase())) return null;
  if (parsed.search || parsed.hash || parsed.username || parsed.password) return null;

  const match = REPO_PATH.exec(parsed.pathname);
  if (!match) return null;

  const [, owner, repo] = match;
  if (repo === '.' || repo === '..') return null;

  return {
    owner,
    repo,
    fullName: `${owner}/${repo}`,
    cloneUrl: `https://github.com/${owner}/${repo}.git`,
  };
}

export function isValidRepositoryUrl(url: string): boolean {
  return parseRepositoryUrl(url) !== null;
}

/**
 * Explain why a URL is not accepted, or return null when it is
 */
export function describeUrlProblem(url: string): string | null {
  if (!url.trim()) return 'URL cannot be empty';

  let parsed: URL;
  try {
    parsed = new URL(url.trim());
  } catch {
    return 'Invalid URL format';
  }
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') return 'Invalid URL format';
  if (!GITHUB_HOSTS.has(parsed.hostname.toLowerCase())) return 'URL must be from github.com';
  if (!parseRepositoryUrl(url)) {
    return 'Invalid GitHub repository URL format. Expected: https://github.com/username/repository';
  }
  return null;
}

/**
 * Make a repository name safe to use as a directory name component
 */
export function sanitizeRepoName(name: string): string {
  return name.replace(/[^\w\-.]/g, '_');
}

/**
 * Directory name of a run's working copy
 */
export function workingCopyName(ref: RepositoryRef, runId: string): string {
  return `${sanitizeRepoName(ref.owner)}_${sanitizeRepoName(ref.repo)}_${runId}`;
}
