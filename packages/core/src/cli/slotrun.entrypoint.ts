#!/usr/bin/env node
/**
 * slotrun: run one task through the full pipeline
 *
 * Probes the configured inference backends, decomposes the task, runs the
 * agents slot by slot, then reviews and synthesizes their results.
 *
 * Usage:
 *   slotrun <task|file> [--slots <number>] [--config-dir <path>]
 *
 * Progress goes to stderr; the final record is printed to stdout as JSON.
 */
import * as path from 'node:path';
import { loadConfig } from '../config/config.loader.js';
import { defaultConfigDir } from '../config/config.defaults.js';
import { PipelineOrchestrator, readTaskInput } from '../pipeline/pipeline.orchestrator.js';

const USAGE = 'Usage: slotrun <task|file> [--slots <number>] [--config-dir <path>]';

// ---------------------------------------------------------------------------
// Argument parsing
// ---------------------------------------------------------------------------

interface CliArgs {
  input: string;
  slots: number | undefined;
  configDir: string;
}

function parseArgs(argv: string[]): CliArgs {
  const args = argv.slice(2);
  const positional: string[] = [];
  let slots: number | undefined;
  let configDir = defaultConfigDir();

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const value = args[i + 1];
    if (arg === '--slots' && value !== undefined) {
      slots = parseInt(value, 10);
      if (!Number.isInteger(slots) || slots < 1) {
        throw new Error(`--slots must be a positive integer, got "${value}"`);
      }
      i++;
    } else if (arg === '--config-dir' && value !== undefined) {
      configDir = path.resolve(value);
      i++;
    } else {
      positional.push(arg);
    }
  }

  const input = positional.join(' ').trim();
  if (input === '') throw new Error(USAGE);
  return { input, slots, configDir };
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const { input, slots, configDir } = parseArgs(process.argv);

  const config = await loadConfig({ dir: configDir });
  const { task, fromFile } = await readTaskInput(input);
  if (fromFile !== null) process.stderr.write(`Task read from ${fromFile}\n`);

  const orchestrator = new PipelineOrchestrator({
    config,
    statusFile: path.join(configDir, 'status.json'),
  });
  const outcome = await orchestrator.run({ task, slots });

  process.stdout.write(JSON.stringify(outcome.synthesis, null, 2) + '\n');
  process.exitCode = outcome.status === 'aborted' ? 1 : 0;
}

main().catch((err: unknown) => {
  process.stderr.write((err instanceof Error ? err.message : String(err)) + '\n');
  process.exit(1);
});
