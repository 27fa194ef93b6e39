/**
 * Digest production
 *
 * Turns a working copy into a bounded plain-text digest of its structure
 * and contents, using either the in-process file walker or an external
 * digest command.
 */

import { execFile } from 'node:child_process';
import { randomUUID } from 'node:crypto';
import { readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, extname, join } from 'node:path';
import { promisify } from 'node:util';
import type { DigestConfig, WorkingCopy } from '../../types/index.js';
import { errors, isRepoDeckError } from '../../utils/errors.js';
import { logger as defaultLogger, type Logger } from '../../utils/logger.js';
import { walkDirectory, type FileWalkerResult } from './file-walker.js';

const execFileAsync = promisify(execFile);

export const TRUNCATION_MARKER = '\n\n... [Content truncated due to size limits] ...';

// ============================================================================
// TYPES
// ============================================================================

export interface DigestToolOptions {
  maxDepth: number;
  maxFileSizeKb: number;
  ignorePatterns: string[];
  signal?: AbortSignal;
}

/**
 * Produces the raw digest text for a directory
 */
export interface DigestTool {
  readonly name: string;
  run(path: string, options: DigestToolOptions): Promise<string>;
}

// ============================================================================
// TRUNCATION
// ============================================================================

/**
 * Cap a digest at `maxLength` characters and append the truncation marker.
 * A digest that is already the result of truncating to `maxLength` is returned as is.
 */
export function truncateDigest(digest: string, maxLength: number): string {
  if (digest.length <= maxLength) return digest;
  if (digest.endsWith(TRUNCATION_MARKER) && digest.length - TRUNCATION_MARKER.length <= maxLength) {
    return digest;
  }
  return digest.slice(0, maxLength) + TRUNCATION_MARKER;
}

// ============================================================================
// MARKDOWN RENDERING
// ============================================================================

interface TreeNode {
  children: Map<string, TreeNode>;
}

/**
 * Render file paths as an indented tree, directories first
 */
export function renderTree(rootName: string, paths: string[]): string {
  const root: TreeNode = { children: new Map() };
  for (const path of paths) {
    let node = root;
    for (const part of path.split('/')) {
      let child = node.children.get(part);
      if (!child) {
        child = { children: new Map() };
        node.children.set(part, child);
      }
      node = child;
    }
  }

  const lines = [`${rootName}/`];
  const visit = (node: TreeNode, prefix: string) => {
    const entries = [...node.children.entries()].sort(([nameA, a], [nameB, b]) => {
      const dirA = a.children.size > 0;
      const dirB = b.children.size > 0;
      if (dirA !== dirB) return dirA ? -1 : 1;
      return nameA < nameB ? -1 : nameA > nameB ? 1 : 0;
    });
    entries.forEach(([name, child], index) => {
      const last = index === entries.length - 1;
      const isDir = child.children.size > 0;
      lines.push(`${prefix}${last ? '└── ' : '├── '}${name}${isDir ? '/' : ''}`);
      if (isDir) visit(child, prefix + (last ? '    ' : '│   '));
    });
  };
  visit(root, '');

  return lines.join('\n');
}

function fenceFor(content: string): string {
  let fence = '```';
  while (content.includes(fence)) fence += '`';
  return fence;
}

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}

/**
 * Render a walk result as a markdown digest
 */
export function renderMarkdownDigest(result: FileWalkerResult, name = basename(result.rootPath)): string {
  const included = result.files.filter(file => file.content !== null);
  const omitted = result.files.length - included.length;

  const sections = [
    `# Codebase Digest: ${name}`,
    [
      '## Summary',
      '',
      `- Files: ${result.files.length}`,
      `- Directories: ${result.directoriesScanned}`,
      `- Total size: ${formatSize(result.totalSize)}`,
      `- Files with content omitted: ${omitted}`,
    ].join('\n'),
    ['## Directory Structure', '', '```', renderTree(name, result.files.map(file => file.path)), '```'].join('\n'),
    '## File Contents',
  ];

  for (const file of included) {
    const content = file.content ?? '';
    const fence = fenceFor(content);
    const language = extname(file.path).slice(1);
    sections.push([`### ${file.path}`, '', `${fence}${language}`, content.replace(/\n$/, ''), fence].join('\n'));
  }

  return sections.join('\n\n') + '\n';
}

// ============================================================================
// DIGEST TOOLS
// ============================================================================

/**
 * Walks the working copy in process
 */
export class FileWalkerDigestTool implements DigestTool {
  readonly name = 'builtin';

  async run(path: string, options: DigestToolOptions): Promise<string> {
    const result = await walkDirectory(path, options);
    return renderMarkdownDigest(result);
  }
}

/**
 * Runs an external codebase-digest command that writes markdown to a file
 */
export class CommandDigestTool implements DigestTool {
  readonly name: string;

  constructor(private readonly command = 'cdigest') {
    this.name = command;
  }

  buildArgs(path: string, outputFile: string, options: DigestToolOptions): string[] {
    const args = [
      path,
      '-d', String(options.maxDepth),
      '-o', 'markdown',
      '-f', outputFile,
      '--max-size', String(options.maxFileSizeKb),
    ];
    if (options.ignorePatterns.length > 0) {
      args.push('--ignore', ...options.ignorePatterns);
    }
    return args;
  }

  async run(path: string, options: DigestToolOptions): Promise<string> {
    const outputFile = join(tmpdir(), `${basename(path)}_codebase_digest_${randomUUID().slice(0, 8)}.md`);

    try {
      const pending = execFileAsync(this.command, this.buildArgs(path, outputFile, options), {
        signal: options.signal,
        maxBuffer: 10 * 1024 * 1024,
      });
      // no interactive prompts
      pending.child.stdin?.end();
      await pending;

      return await readFile(outputFile, 'utf-8');
    } finally {
      await rm(outputFile, { force: true });
    }
  }
}

export function createDigestTool(config: Pick<DigestConfig, 'tool' | 'command'>): DigestTool {
  return config.tool === 'command' ? new CommandDigestTool(config.command) : new FileWalkerDigestTool();
}

// ============================================================================
// DIGEST PRODUCER
// ============================================================================

export class DigestProducer {
  private readonly tool: DigestTool;
  private readonly logger: Logger;

  constructor(
    private readonly config: DigestConfig,
    options: { tool?: DigestTool; logger?: Logger } = {}
  ) {
    this.tool = options.tool ?? createDigestTool(config);
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Produce the digest for a working copy, bounded by the configured timeout
   */
  async digest(copy: WorkingCopy, signal?: AbortSignal): Promise<string> {
    if (signal?.aborted) throw errors.cancelled('digesting');

    const timeoutSignal = AbortSignal.timeout(this.config.timeoutMs);
    const combined = signal ? AbortSignal.any([signal, timeoutSignal]) : timeoutSignal;

    this.logger.analysis(`Generating digest with ${this.tool.name}`);

    let output: string;
    try {
      output = await this.tool.run(copy.path, {
        maxDepth: this.config.maxDepth,
        maxFileSizeKb: this.config.maxFileSizeKb,
        ignorePatterns: this.config.ignorePatterns,
        signal: combined,
      });
    } catch (error) {
      if (signal?.aborted) throw errors.cancelled('digesting');
      if (timeoutSignal.aborted) throw errors.digestTimeout(this.config.timeoutMs);
      if (isRepoDeckError(error)) throw error;
      throw errors.digestToolFailure(error instanceof Error ? error.message : String(error));
    }

    if (!output.trim()) {
      throw errors.digestToolFailure('the digest tool produced no output');
    }
    if (output.length < this.config.minLength) {
      throw errors.digestTooSmall(output.length, this.config.minLength);
    }

    this.logger.debug(`Digest length: ${output.length} characters`);
    return output;
  }

  /**
   * Apply the configured length bound
   */
  truncate(digest: string): string {
    const result = truncateDigest(digest, this.config.maxLength);
    if (result !== digest) {
      this.logger.warning(`Digest too long (${digest.length} chars), truncated to ${this.config.maxLength}`);
    }
    return result;
  }
}
