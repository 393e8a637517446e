import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { PipelineLogger, silentLogger } from './pipeline.logger.js';

describe('PipelineLogger', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'slotrun-log-'));
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('appends one JSON record per line in call order', async () => {
    const file = path.join(tmpDir, 'pipeline.log');
    const logger = new PipelineLogger({
      file,
      echo: false,
      now: () => new Date('2026-03-01T10:20:30.000Z'),
    });

    logger.info('probe', 'worker reachable', { slots: 4 });
    logger.warn('decompose', 'recovered plan');
    logger.error('execute', 'task failed', { taskId: 't1' });
    await logger.flush();

    const lines = (await fs.readFile(file, 'utf-8')).trim().split('\n');
    expect(lines).toHaveLength(3);
    expect(JSON.parse(lines[0])).toEqual({
      slots: 4,
      timestamp: '2026-03-01T10:20:30.000Z',
      level: 'info',
      stage: 'probe',
      message: 'worker reachable',
    });
    expect(JSON.parse(lines[1]).level).toBe('warn');
    expect(JSON.parse(lines[2]).taskId).toBe('t1');
  });

  it('echoes a short line to stderr', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = new PipelineLogger({ now: () => new Date('2026-03-01T10:20:30.000Z') });

    logger.info('map', '3 tasks in 2 batches');

    expect(write).toHaveBeenCalledWith('[slotrun] 10:20:30 map: 3 tasks in 2 batches\n');
  });

  it('does not echo records below the echo level', () => {
    const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const logger = new PipelineLogger({ echoLevel: 'warn' });

    logger.info('map', 'quiet');

    expect(write).not.toHaveBeenCalled();
  });

  it('silentLogger flushes immediately', async () => {
    silentLogger.info('any', 'thing');
    await expect(silentLogger.flush()).resolves.toBeUndefined();
  });
});
