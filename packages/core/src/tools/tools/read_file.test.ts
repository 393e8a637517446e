import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { readFileTool, decodePrefix, READ_LIMIT_BYTES } from './read_file.js';
import { resolveAllowedPath, realpathExisting } from './path.utils.js';
import { ToolAccessError } from '../../errors.js';
import type { ToolContext } from '../tool.types.js';

let tmpDir: string;

const ctx = (): ToolContext => ({
  taskId: 'test',
  workDir: tmpDir,
  allowedRoots: [tmpDir],
});

beforeAll(async () => {
  tmpDir = await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), 'slotrun-read-file-')));
  await fs.writeFile(path.join(tmpDir, 'sample.py'), 'def is_prime(n):\n    return n > 1\n');
  await fs.writeFile(path.join(tmpDir, 'big.txt'), 'a'.repeat(READ_LIMIT_BYTES + 10));
  await fs.mkdir(path.join(tmpDir, 'sub'));
});

afterAll(async () => {
  await fs.rm(tmpDir, { recursive: true, force: true });
});

describe('read_file tool', () => {
  it('reads a whole file by absolute path', async () => {
    const result = await readFileTool.execute({ path: path.join(tmpDir, 'sample.py') }, ctx());
    expect(result).toEqual({
      tool: 'read_file',
      success: true,
      output: 'def is_prime(n):\n    return n > 1\n',
    });
  });

  it('resolves relative paths against the working directory', async () => {
    const result = await readFileTool.execute({ path: 'sample.py' }, ctx());
    expect(result.success).toBe(true);
  });

  it('truncates files over 50KB with a marker', async () => {
    const result = await readFileTool.execute({ path: 'big.txt' }, ctx());
    expect(result.output).toBe('a'.repeat(READ_LIMIT_BYTES) + '\n\n[TRUNCATED - file exceeds 50KB]');
  });

  it('reports a missing file as a failed result', async () => {
    const result = await readFileTool.execute({ path: 'nope.py' }, ctx());
    expect(result).toEqual({
      tool: 'read_file',
      success: false,
      output: '',
      error: `File not found: ${path.join(tmpDir, 'nope.py')}`,
    });
  });

  it('refuses to read a directory', async () => {
    const result = await readFileTool.execute({ path: 'sub' }, ctx());
    expect(result.error).toBe(`Not a file: ${path.join(tmpDir, 'sub')}`);
  });
});

describe('decodePrefix', () => {
  it('drops a multi-byte character cut at the boundary', () => {
    const bytes = Buffer.from('ab€', 'utf-8').subarray(0, 4);
    expect(decodePrefix(bytes)).toBe('ab');
  });
});

describe('resolveAllowedPath', () => {
  it('accepts paths that do not exist yet inside a root', async () => {
    await expect(resolveAllowedPath('new/dir/file.txt', ctx())).resolves.toBe(
      path.join(tmpDir, 'new', 'dir', 'file.txt'),
    );
  });

  it('rejects paths outside every root', async () => {
    await expect(resolveAllowedPath('/etc/passwd', ctx())).rejects.toBeInstanceOf(ToolAccessError);
  });

  it('rejects traversal out of the root', async () => {
    await expect(resolveAllowedPath('../../etc/passwd', ctx())).rejects.toThrow(
      'Access denied - path not in allowed directories: ',
    );
  });

  it('rejects a sibling directory sharing the root as a prefix', async () => {
    await expect(resolveAllowedPath(`${tmpDir}-other/x`, ctx())).rejects.toBeInstanceOf(ToolAccessError);
  });

  it('rejects a symlink that points outside the root', async () => {
    const link = path.join(tmpDir, 'escape');
    await fs.symlink('/etc', link);
    await expect(resolveAllowedPath('escape/hostname', ctx())).rejects.toBeInstanceOf(ToolAccessError);
  });

  it('realpathExisting re-appends the missing tail', async () => {
    await expect(realpathExisting(path.join(tmpDir, 'a', 'b'))).resolves.toBe(path.join(tmpDir, 'a', 'b'));
  });
});
