import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { ToolAccessError } from '../../errors.js';
import type { ToolContext } from '../tool.types.js';

/** Roots used when config lists none: the home directory and the OS temp directory. */
export function defaultAllowedRoots(): string[] {
  return [os.homedir(), os.tmpdir()];
}

/**
 * Resolve symlinks on the longest existing prefix of `absPath` and re-append
 * the part that does not exist yet, so new files can be checked too.
 */
export async function realpathExisting(absPath: string): Promise<string> {
  const missing: string[] = [];
  let current = absPath;
  for (;;) {
    try {
      const real = await fs.realpath(current);
      return missing.length > 0 ? path.join(real, ...missing.reverse()) : real;
    } catch (err) {
      if (!(err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR'))) {
        throw err;
      }
      const parent = path.dirname(current);
      if (parent === current) return absPath;
      missing.push(path.basename(current));
      current = parent;
    }
  }
}

function isWithin(candidate: string, root: string): boolean {
  return candidate === root || candidate.startsWith(root.endsWith(path.sep) ? root : root + path.sep);
}

/**
 * Resolve `filePath` to an absolute, symlink-free path and verify it stays
 * within one of the allowed roots.
 *
 * - Relative paths are resolved against the task's working directory.
 * - Throws ToolAccessError when the resolved path escapes every root.
 *
 * @returns The resolved, validated absolute path.
 */
export async function resolveAllowedPath(filePath: string, ctx: ToolContext): Promise<string> {
  const absolute = path.resolve(ctx.workDir, filePath);
  const resolved = await realpathExisting(absolute);
  const roots = await Promise.all(ctx.allowedRoots.map((root) => realpathExisting(path.resolve(root))));

  if (!roots.some((root) => isWithin(resolved, root))) {
    throw new ToolAccessError(absolute);
  }
  return resolved;
}
