import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  log(level: LogLevel, stage: string, message: string, extra?: Record<string, unknown>): void;
  info(stage: string, message: string, extra?: Record<string, unknown>): void;
  warn(stage: string, message: string, extra?: Record<string, unknown>): void;
  error(stage: string, message: string, extra?: Record<string, unknown>): void;
  /** Resolve once every pending write has landed. */
  flush(): Promise<void>;
}

export interface LogRecord {
  timestamp: string;
  level: LogLevel;
  stage: string;
  message: string;
  [key: string]: unknown;
}

abstract class BaseLogger implements Logger {
  abstract log(level: LogLevel, stage: string, message: string, extra?: Record<string, unknown>): void;
  abstract flush(): Promise<void>;

  info(stage: string, message: string, extra?: Record<string, unknown>): void {
    this.log('info', stage, message, extra);
  }

  warn(stage: string, message: string, extra?: Record<string, unknown>): void {
    this.log('warn', stage, message, extra);
  }

  error(stage: string, message: string, extra?: Record<string, unknown>): void {
    this.log('error', stage, message, extra);
  }
}

class SilentLogger extends BaseLogger {
  log(): void {}

  flush(): Promise<void> {
    return Promise.resolve();
  }
}

/** Discards everything. Used by tests and by callers that only want return values. */
export const silentLogger: Logger = new SilentLogger();

function clock(date: Date): string {
  return date.toISOString().slice(11, 19);
}

export interface PipelineLoggerOptions {
  /** JSON-lines destination; omitted means stderr only. */
  file?: string;
  /** Echo a short human line to stderr. Defaults to true. */
  echo?: boolean;
  /** Lowest level echoed to stderr. The file receives every level. */
  echoLevel?: LogLevel;
  now?: () => Date;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * Writes one JSON object per line to the run's log file and a one-line
 * summary to stderr. File appends are chained so records keep their order.
 */
export class PipelineLogger extends BaseLogger {
  private chain: Promise<void> = Promise.resolve();
  private writeError: Error | null = null;
  private readonly echo: boolean;
  private readonly echoLevel: LogLevel;
  private readonly now: () => Date;

  constructor(private readonly options: PipelineLoggerOptions = {}) {
    super();
    this.echo = options.echo ?? true;
    this.echoLevel = options.echoLevel ?? 'info';
    this.now = options.now ?? (() => new Date());
  }

  log(level: LogLevel, stage: string, message: string, extra: Record<string, unknown> = {}): void {
    const date = this.now();
    const record: LogRecord = { ...extra, timestamp: date.toISOString(), level, stage, message };

    if (this.echo && LEVEL_RANK[level] >= LEVEL_RANK[this.echoLevel]) {
      process.stderr.write(`[slotrun] ${clock(date)} ${stage}: ${message}\n`);
    }

    const file = this.options.file;
    if (file === undefined) return;

    const line = JSON.stringify(record) + '\n';
    this.chain = this.chain
      .then(() => fs.mkdir(path.dirname(file), { recursive: true }))
      .then(() => fs.appendFile(file, line, 'utf-8'))
      .catch((err: unknown) => {
        // Keep the first failure; later records still try to land.
        if (this.writeError === null) {
          this.writeError = err instanceof Error ? err : new Error(String(err));
          process.stderr.write(`[slotrun] log write failed: ${this.writeError.message}\n`);
        }
      });
  }

  async flush(): Promise<void> {
    await this.chain;
  }

  /** The first error hit while appending to the log file, if any. */
  get lastWriteError(): Error | null {
    return this.writeError;
  }
}
