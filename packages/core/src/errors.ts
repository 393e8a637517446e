import type { TerminalState } from '@slotrun/shared';

/** A backend could not be reached, or no backend is available for a stage. */
export class ConnectivityError extends Error {
  override readonly name = 'ConnectivityError';
}

/** Model output could not be turned into the expected document. */
export class MalformedOutputError extends Error {
  override readonly name = 'MalformedOutputError';

  constructor(
    message: string,
    readonly raw: string = '',
  ) {
    super(message);
  }
}

/** The only error that aborts a pipeline run. */
export class DecompositionError extends Error {
  override readonly name = 'DecompositionError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ToolAccessError extends Error {
  override readonly name = 'ToolAccessError';

  constructor(readonly path: string) {
    super(`Access denied - path not in allowed directories: ${path}`);
  }
}

export class ToolTimeoutError extends Error {
  override readonly name = 'ToolTimeoutError';

  constructor(readonly timeoutMs: number) {
    super(`Tool execution timed out after ${Math.round(timeoutMs / 1000)} seconds`);
  }
}

export class AgentRuntimeError extends Error {
  override readonly name: string = 'AgentRuntimeError';

  constructor(
    message: string,
    readonly terminalState: TerminalState = 'failed',
  ) {
    super(message);
  }
}

export class AgentEmptyResponseError extends AgentRuntimeError {
  override readonly name = 'AgentEmptyResponseError';

  constructor(attempts: number) {
    super(`Model returned no usable response after ${attempts} attempts`, 'failed');
  }
}

export class AgentTimeoutError extends AgentRuntimeError {
  override readonly name = 'AgentTimeoutError';

  constructor(totalTimeoutMs: number) {
    super(`Agent exceeded total timeout of ${Math.round(totalTimeoutMs / 1000)} seconds`, 'timeout');
  }
}

export class AgentMaxIterationsError extends AgentRuntimeError {
  override readonly name = 'AgentMaxIterationsError';

  constructor(maxIterations: number) {
    super(`Agent did not complete within ${maxIterations} iterations`, 'max_iterations');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
