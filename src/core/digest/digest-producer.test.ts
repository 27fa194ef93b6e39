import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  DigestProducer,
  CommandDigestTool,
  FileWalkerDigestTool,
  TRUNCATION_MARKER,
  createDigestTool,
  renderMarkdownDigest,
  renderTree,
  truncateDigest,
  type DigestTool,
  type DigestToolOptions,
} from './digest-producer.js';
import type { FileWalkerResult } from './file-walker.js';
import type { DigestConfig, WorkingCopy } from '../../types/index.js';
import { Logger } from '../../utils/logger.js';
import { isRepoDeckError } from '../../utils/errors.js';

// ============================================================================
// TEST HELPERS
// ============================================================================

const baseConfig: DigestConfig = {
  tool: 'builtin',
  command: 'cdigest',
  maxDepth: 10,
  maxFileSizeKb: 10240,
  maxLength: 50000,
  minLength: 100,
  timeoutMs: 5000,
  ignorePatterns: [],
};

const copy: WorkingCopy = { path: '/tmp/work/octocat_demo_run1', owner: 'octocat', repo: 'demo', sizeMb: 0.1, runId: 'run1' };

class StubTool implements DigestTool {
  readonly name = 'stub';
  calls: Array<{ path: string; options: DigestToolOptions }> = [];

  constructor(private readonly behaviour: (options: DigestToolOptions) => Promise<string>) {}

  run(path: string, options: DigestToolOptions): Promise<string> {
    this.calls.push({ path, options });
    return this.behaviour(options);
  }
}

function hangUntilAborted(options: DigestToolOptions): Promise<string> {
  return new Promise((_resolve, reject) => {
    options.signal?.addEventListener('abort', () => reject(options.signal?.reason), { once: true });
  });
}

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  return promise.then(
    () => undefined,
    (error: unknown) => error
  );
}

// ============================================================================
// TESTS
// ============================================================================

describe('truncateDigest', () => {
  it('should return short digests unchanged', () => {
    expect(truncateDigest('abc', 3)).toBe('abc');
  });

  it('should cut at the limit and append the marker', () => {
    expect(truncateDigest('abcdefgh', 5)).toBe('abcde' + TRUNCATION_MARKER);
    expect(TRUNCATION_MARKER).toBe('\n\n... [Content truncated due to size limits] ...');
  });

  it('should be idempotent', () => {
    const once = truncateDigest('x'.repeat(200), 50);

    expect(truncateDigest(once, 50)).toBe(once);
    expect(once).toHaveLength(50 + TRUNCATION_MARKER.length);
  });
});

describe('renderTree', () => {
  it('should list directories before files', () => {
    expect(renderTree('demo', ['README.md', 'src/index.ts', 'logo.png', 'src/util/a.ts'])).toBe(
      [
        'demo/',
        '├── src/',
        '│   ├── util/',
        '│   │   └── a.ts',
        '│   └── index.ts',
        '├── README.md',
        '└── logo.png',
      ].join('\n')
    );
  });
});

describe('renderMarkdownDigest', () => {
  it('should render summary, tree and file contents', () => {
    const result: FileWalkerResult = {
      rootPath: '/tmp/demo',
      files: [
        { path: 'README.md', size: 7, content: '# Demo\n' },
        { path: 'logo.png', size: 100, content: null, skipReason: 'binary' },
        { path: 'src/index.ts', size: 21, content: 'export const x = 1;\n' },
      ],
      directoriesScanned: 2,
      totalSize: 128,
      skipped: {},
    };

    expect(renderMarkdownDigest(result)).toBe(
      [
        '# Codebase Digest: demo',
        '',
        '## Summary',
        '',
        '- Files: 3',
        '- Directories: 2',
        '- Total size: 128 B',
        '- Files with content omitted: 1',
        '',
        '## Directory Structure',
        '',
        '```',
        'demo/',
        '├── src/',
        '│   └── index.ts',
        '├── README.md',
        '└── logo.png',
        '```',
        '',
        '## File Contents',
        '',
        '### README.md',
        '',
        '```md',
        '# Demo',
        '```',
        '',
        '### src/index.ts',
        '',
        '```ts',
        'export const x = 1;',
        '```',
        '',
      ].join('\n')
    );
  });

  it('should lengthen the fence when content contains one', () => {
    const result: FileWalkerResult = {
      rootPath: '/tmp/docs',
      files: [{ path: 'notes.md', size: 10, content: '```js\nx\n```' }],
      directoriesScanned: 1,
      totalSize: 10,
      skipped: {},
    };

    expect(renderMarkdownDigest(result)).toContain('````md\n```js\nx\n```\n````');
  });
});

describe('CommandDigestTool', () => {
  it('should build the digest command line', () => {
    const tool = new CommandDigestTool();

    expect(
      tool.buildArgs('/repo', '/tmp/out.md', { maxDepth: 10, maxFileSizeKb: 10240, ignorePatterns: ['*.log', 'dist'] })
    ).toEqual(['/repo', '-d', '10', '-o', 'markdown', '-f', '/tmp/out.md', '--max-size', '10240', '--ignore', '*.log', 'dist']);
    expect(tool.buildArgs('/repo', '/tmp/out.md', { maxDepth: 2, maxFileSizeKb: 1, ignorePatterns: [] })).toEqual([
      '/repo', '-d', '2', '-o', 'markdown', '-f', '/tmp/out.md', '--max-size', '1',
    ]);
  });

  it('should be selected by the command tool setting', () => {
    expect(createDigestTool({ tool: 'command', command: 'my-digest' }).name).toBe('my-digest');
    expect(createDigestTool({ tool: 'builtin', command: 'cdigest' })).toBeInstanceOf(FileWalkerDigestTool);
  });
});

describe('DigestProducer', () => {
  const logger = new Logger({ quiet: true });

  it('should pass configured limits to the tool and return its output', async () => {
    const text = 'd'.repeat(150);
    const tool = new StubTool(async () => text);
    const producer = new DigestProducer({ ...baseConfig, ignorePatterns: ['*.log'] }, { tool, logger });

    expect(await producer.digest(copy)).toBe(text);
    expect(tool.calls[0].path).toBe(copy.path);
    expect(tool.calls[0].options).toMatchObject({ maxDepth: 10, maxFileSizeKb: 10240, ignorePatterns: ['*.log'] });
  });

  it('should fail when the tool returns nothing', async () => {
    const producer = new DigestProducer(baseConfig, { tool: new StubTool(async () => '  \n'), logger });

    const error = await captureError(producer.digest(copy));

    expect(isRepoDeckError(error) && error.code).toBe('DIGEST_TOOL_FAILURE');
  });

  it('should fail when the digest is too short', async () => {
    const producer = new DigestProducer(baseConfig, { tool: new StubTool(async () => 'tiny digest'), logger });

    const error = await captureError(producer.digest(copy));

    expect(isRepoDeckError(error)).toBe(true);
    if (!isRepoDeckError(error)) return;
    expect(error.code).toBe('DIGEST_TOO_SMALL');
    expect(error.message).toBe('Generated digest is too short (11 < 100 characters)');
  });

  it('should wrap tool errors', async () => {
    const tool = new StubTool(async () => {
      throw new Error('spawn cdigest ENOENT');
    });
    const producer = new DigestProducer(baseConfig, { tool, logger });

    const error = await captureError(producer.digest(copy));

    expect(isRepoDeckError(error) && error.message).toBe('Digest generation failed: spawn cdigest ENOENT');
  });

  it('should time out a slow tool', async () => {
    const producer = new DigestProducer({ ...baseConfig, timeoutMs: 20 }, { tool: new StubTool(hangUntilAborted), logger });

    const error = await captureError(producer.digest(copy));

    expect(isRepoDeckError(error) && error.code).toBe('DIGEST_TIMEOUT');
  });

  it('should report cancellation', async () => {
    const controller = new AbortController();
    const producer = new DigestProducer(baseConfig, { tool: new StubTool(hangUntilAborted), logger });

    const pending = captureError(producer.digest(copy, controller.signal));
    controller.abort();

    const error = await pending;
    expect(isRepoDeckError(error) && error.code).toBe('PIPELINE_CANCELLED');
  });

  it('should warn when truncating', () => {
    const warnings = new Logger({ quiet: true });
    const spy = vi.spyOn(warnings, 'warning');
    const producer = new DigestProducer({ ...baseConfig, maxLength: 10 }, { tool: new StubTool(async () => ''), logger: warnings });

    expect(producer.truncate('short')).toBe('short');
    expect(spy).not.toHaveBeenCalled();
    expect(producer.truncate('0123456789abc')).toBe('0123456789' + TRUNCATION_MARKER);
    expect(spy).toHaveBeenCalledWith('Digest too long (13 chars), truncated to 10');
  });
});

describe('FileWalkerDigestTool', () => {
  let dir: string;

  beforeEach(async () => {
    dir = join(tmpdir(), `repo-deck-digest-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(join(dir, 'src'), { recursive: true });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should produce a markdown digest of the working copy', async () => {
    await writeFile(join(dir, 'README.md'), '# Sample project\n');
    await writeFile(join(dir, 'src', 'main.ts'), 'console.log("hi");\n');

    const digest = await new FileWalkerDigestTool().run(dir, { maxDepth: 10, maxFileSizeKb: 100, ignorePatterns: [] });

    expect(digest).toContain('- Files: 2');
    expect(digest).toContain('### src/main.ts\n\n```ts\nconsole.log("hi");\n```');
  });
});
