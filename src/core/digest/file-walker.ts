/**
 * FileWalker Service
 *
 * Traverses a working copy, filtering noise and respecting ignore patterns,
 * and collects the text of every file that belongs in a digest.
 */

import { opendir, open, readFile, stat } from 'node:fs/promises';
import { join, relative, extname } from 'node:path';
import ignoreModule from 'ignore';
const ignore = ignoreModule.default;
type Ignore = ReturnType<typeof ignore>;

/**
 * Options for the FileWalker
 */
export interface FileWalkerOptions {
  /** Deepest directory level to descend into; the root is level 0 */
  maxDepth?: number;
  /** Files above this size are listed but their content is omitted */
  maxFileSizeKb?: number;
  /** gitignore-style patterns applied on top of the repository's own .gitignore */
  ignorePatterns?: string[];
  /** Cancellation; an aborted walk rejects with the signal's reason */
  signal?: AbortSignal;
}

export type SkipReason = 'binary' | 'too-large' | 'unreadable';

export interface WalkedFile {
  /** Path relative to the root, always with forward slashes */
  path: string;
  size: number;
  /** File text, or null when the content was left out */
  content: string | null;
  skipReason?: SkipReason;
}

export interface FileWalkerResult {
  rootPath: string;
  files: WalkedFile[];
  directoriesScanned: number;
  totalSize: number;
  /** Entries excluded entirely, by reason */
  skipped: Record<string, number>;
}

/**
 * Directories that are never part of a digest
 */
const SKIP_DIRECTORIES = new Set(['.git', '.svn', '.hg']);

/**
 * File extensions whose content is never read (binary/generated files)
 */
const BINARY_EXTENSIONS = new Set([
  // Lock files
  '.lock',
  '.lockb',
  // Source maps
  '.map',
  // Images
  '.png',
  '.jpg',
  '.jpeg',
  '.gif',
  '.ico',
  '.webp',
  '.bmp',
  // Fonts
  '.woff',
  '.woff2',
  '.ttf',
  '.eot',
  '.otf',
  // Media
  '.mp3',
  '.mp4',
  '.wav',
  '.avi',
  '.mov',
  '.webm',
  // Documents
  '.pdf',
  '.doc',
  '.docx',
  '.xls',
  '.xlsx',
  // Archives
  '.zip',
  '.tar',
  '.gz',
  '.rar',
  '.7z',
  // Compiled
  '.pyc',
  '.pyo',
  '.class',
  '.o',
  '.so',
  '.dll',
  '.exe',
  '.wasm',
]);

const BINARY_SNIFF_BYTES = 8000;

/**
 * A file is treated as binary when its first bytes contain a NUL
 */
async function looksBinary(filePath: string): Promise<boolean> {
  const handle = await open(filePath, 'r');
  try {
    const buffer = Buffer.alloc(BINARY_SNIFF_BYTES);
    const { bytesRead } = await handle.read(buffer, 0, BINARY_SNIFF_BYTES, 0);
    return buffer.subarray(0, bytesRead).includes(0);
  } finally {
    await handle.close();
  }
}

function toPosix(path: string): string {
  return path.split('\\').join('/');
}

/**
 * Load and combine ignore patterns
 */
async function loadIgnorePatterns(rootPath: string, extra: string[]): Promise<Ignore> {
  const ig = ignore();
  ig.add(extra);

  try {
    ig.add(await readFile(join(rootPath, '.gitignore'), 'utf-8'));
  } catch (error) {
    if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
  }

  return ig;
}

/**
 * FileWalker class for traversing a working copy
 */
export class FileWalker {
  private rootPath: string;
  private options: Required<Omit<FileWalkerOptions, 'signal'>> & { signal?: AbortSignal };
  private ig: Ignore | null = null;
  private files: WalkedFile[] = [];
  private directoriesScanned = 0;
  private totalSize = 0;
  private skipped: Record<string, number> = {};

  constructor(rootPath: string, options: FileWalkerOptions = {}) {
    this.rootPath = rootPath;
    this.options = {
      maxDepth: options.maxDepth ?? 10,
      maxFileSizeKb: options.maxFileSizeKb ?? 10240,
      ignorePatterns: options.ignorePatterns ?? [],
      signal: options.signal,
    };
  }

  private recordSkip(reason: string): void {
    this.skipped[reason] = (this.skipped[reason] ?? 0) + 1;
  }

  /**
   * Walk a directory recursively; entries are visited in name order
   */
  private async walkDirectory(dirPath: string, depth: number): Promise<void> {
    this.options.signal?.throwIfAborted();
    this.directoriesScanned++;

    const entries: { name: string; isDirectory: boolean; isFile: boolean }[] = [];
    const dir = await opendir(dirPath);
    for await (const entry of dir) {
      entries.push({ name: entry.name, isDirectory: entry.isDirectory(), isFile: entry.isFile() });
    }
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      this.options.signal?.throwIfAborted();

      const fullPath = join(dirPath, entry.name);
      const relativePath = toPosix(relative(this.rootPath, fullPath));

      if (entry.isDirectory) {
        if (SKIP_DIRECTORIES.has(entry.name) || this.ig?.ignores(relativePath + '/')) {
          this.recordSkip('ignored');
          continue;
        }
        if (depth + 1 > this.options.maxDepth) {
          this.recordSkip('depth');
          continue;
        }
        await this.walkDirectory(fullPath, depth + 1);
      } else if (entry.isFile) {
        if (this.ig?.ignores(relativePath)) {
          this.recordSkip('ignored');
          continue;
        }
        await this.processFile(fullPath, relativePath);
      }
    }
  }

  private async processFile(absolutePath: string, relativePath: string): Promise<void> {
    let size: number;
    try {
      size = (await stat(absolutePath)).size;
    } catch {
      this.recordSkip('unreadable');
      return;
    }
    this.totalSize += size;

    if (size > this.options.maxFileSizeKb * 1024) {
      this.files.push({ path: relativePath, size, content: null, skipReason: 'too-large' });
      return;
    }

    if (BINARY_EXTENSIONS.has(extname(relativePath).toLowerCase()) || (await looksBinary(absolutePath))) {
      this.files.push({ path: relativePath, size, content: null, skipReason: 'binary' });
      return;
    }

    try {
      const content = await readFile(absolutePath, 'utf-8');
      this.files.push({ path: relativePath, size, content });
    } catch {
      this.files.push({ path: relativePath, size, content: null, skipReason: 'unreadable' });
    }
  }

  async walk(): Promise<FileWalkerResult> {
    this.ig = await loadIgnorePatterns(this.rootPath, this.options.ignorePatterns);
    await this.walkDirectory(this.rootPath, 0);

    return {
      rootPath: this.rootPath,
      files: this.files,
      directoriesScanned: this.directoriesScanned,
      totalSize: this.totalSize,
      skipped: this.skipped,
    };
  }
}

/**
 * Convenience function to walk a directory
 */
export async function walkDirectory(rootPath: string, options?: FileWalkerOptions): Promise<FileWalkerResult> {
  const walker = new FileWalker(rootPath, options);
  return walker.walk();
}
