/**
 * Tests for FileWalker service
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { walkDirectory } from './file-walker.js';

describe('FileWalker', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = join(tmpdir(), `repo-deck-walker-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    await mkdir(testDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it('should read files in name order across subdirectories', async () => {
    await mkdir(join(testDir, 'src'));
    await writeFile(join(testDir, 'src', 'main.ts'), 'console.log("hi");');
    await writeFile(join(testDir, 'README.md'), '# Test');

    const result = await walkDirectory(testDir);

    expect(result.files).toEqual([
      { path: 'README.md', size: 6, content: '# Test' },
      { path: 'src/main.ts', size: 18, content: 'console.log("hi");' },
    ]);
    expect(result.directoriesScanned).toBe(2);
    expect(result.totalSize).toBe(24);
  });

  it('should apply ignore patterns and the repository .gitignore', async () => {
    await mkdir(join(testDir, 'node_modules', 'lib'), { recursive: true });
    await mkdir(join(testDir, 'secret'));
    await writeFile(join(testDir, 'node_modules', 'lib', 'index.js'), 'x');
    await writeFile(join(testDir, 'secret', 'key.txt'), 'x');
    await writeFile(join(testDir, 'debug.log'), 'x');
    await writeFile(join(testDir, '.gitignore'), 'secret/\n');
    await writeFile(join(testDir, 'app.ts'), 'x');

    const result = await walkDirectory(testDir, { ignorePatterns: ['node_modules', '*.log', '.gitignore'] });

    expect(result.files.map(file => file.path)).toEqual(['app.ts']);
    expect(result.skipped.ignored).toBe(4);
  });

  it('should never descend into .git', async () => {
    await mkdir(join(testDir, '.git'));
    await writeFile(join(testDir, '.git', 'HEAD'), 'ref: refs/heads/main');

    const result = await walkDirectory(testDir);

    expect(result.files).toEqual([]);
  });

  it('should stop at the maximum depth', async () => {
    await mkdir(join(testDir, 'a', 'b'), { recursive: true });
    await writeFile(join(testDir, 'a', 'one.ts'), '1');
    await writeFile(join(testDir, 'a', 'b', 'two.ts'), '2');

    const result = await walkDirectory(testDir, { maxDepth: 1 });

    expect(result.files.map(file => file.path)).toEqual(['a/one.ts']);
    expect(result.skipped.depth).toBe(1);
  });

  it('should list binary and oversized files without content', async () => {
    await writeFile(join(testDir, 'blob.dat'), Buffer.from([0x50, 0x00, 0x51]));
    await writeFile(join(testDir, 'image.png'), 'not really an image');
    await writeFile(join(testDir, 'huge.txt'), 'z'.repeat(2048));

    const result = await walkDirectory(testDir, { maxFileSizeKb: 1 });

    expect(result.files).toEqual([
      { path: 'blob.dat', size: 3, content: null, skipReason: 'binary' },
      { path: 'huge.txt', size: 2048, content: null, skipReason: 'too-large' },
      { path: 'image.png', size: 19, content: null, skipReason: 'binary' },
    ]);
  });

  it('should reject when aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('stop'));

    await expect(walkDirectory(testDir, { signal: controller.signal })).rejects.toThrow('stop');
  });
});
