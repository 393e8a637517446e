import * as crypto from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export const RUN_DIR_PREFIX = 'slotrun-';

export type ArtifactKind = 'decomposed' | 'mapped' | 'results' | 'quality' | 'synthesis';

/** Every persisted stage document names what it is and which run wrote it. */
export interface ArtifactDocument<T> {
  kind: ArtifactKind;
  runId: string;
  createdAt: string;
  data: T;
}

/** e.g. "2024-01-15T14-32-00-123Z-3f9a1c"; sorts chronologically. */
export function buildRunId(date: Date): string {
  const stamp = date.toISOString().replace(/[:.]/g, '-');
  return `${stamp}-${crypto.randomUUID().slice(0, 6)}`;
}

/**
 * The per-run working directory `<runsDir>/slotrun-<runId>/` with one JSON
 * document per stage, the agents' `outputs/` and `pipeline.log`.
 */
export class PipelineArtifacts {
  readonly workDir: string;
  readonly outputsDir: string;
  readonly logFile: string;

  private constructor(
    readonly runId: string,
    runsDir: string,
    private readonly now: () => Date,
  ) {
    this.workDir = path.join(runsDir, `${RUN_DIR_PREFIX}${runId}`);
    this.outputsDir = path.join(this.workDir, 'outputs');
    this.logFile = path.join(this.workDir, 'pipeline.log');
  }

  static async create(runsDir: string, now: () => Date = () => new Date()): Promise<PipelineArtifacts> {
    const artifacts = new PipelineArtifacts(buildRunId(now()), runsDir, now);
    await fs.mkdir(artifacts.outputsDir, { recursive: true });
    return artifacts;
  }

  pathFor(kind: ArtifactKind): string {
    return path.join(this.workDir, `${kind}.json`);
  }

  async save<T>(kind: ArtifactKind, data: T): Promise<string> {
    const doc: ArtifactDocument<T> = {
      kind,
      runId: this.runId,
      createdAt: this.now().toISOString(),
      data,
    };
    const file = this.pathFor(kind);
    await fs.writeFile(file, JSON.stringify(doc, null, 2) + '\n', 'utf-8');
    return file;
  }

  /**
   * Delete old run directories under `runsDir`, keeping the `keep` most
   * recent. Returns the removed paths.
   */
  static async prune(runsDir: string, keep: number): Promise<string[]> {
    let entries;
    try {
      entries = await fs.readdir(runsDir, { withFileTypes: true });
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
      throw err;
    }

    // Sort ascending (oldest first by timestamp in the name)
    const runs = entries
      .filter((e) => e.isDirectory() && e.name.startsWith(RUN_DIR_PREFIX))
      .map((e) => e.name)
      .sort();
    const toDelete = runs.slice(0, Math.max(0, runs.length - keep));

    const removed: string[] = [];
    for (const name of toDelete) {
      const dir = path.join(runsDir, name);
      await fs.rm(dir, { recursive: true, force: true });
      removed.push(dir);
    }
    return removed;
  }
}
