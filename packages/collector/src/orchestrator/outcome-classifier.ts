import {
  ExternalProcessCrash,
  ExternalProcessTimeout,
  type CollectorError,
} from '../errors.js';
import type { ProcessOutcome } from '../process/types.js';
import type { BatchOutcome } from '../store/types.js';

type ClassifyInput = {
  process: ProcessOutcome;
  timeoutSeconds: number;
  artifactError?: CollectorError;
  context?: Record<string, unknown>;
};

export function lastOutputLine(output: string): string {
  const lines = output.split('\n');
  for (let index = lines.length - 1; index >= 0; index -= 1) {
    const line = lines[index]?.trim();
    if (line && line !== '...') {
      return line;
    }
  }
  return '';
}

/**
 * Maps how the crawler ended, and whether its output was readable, onto the
 * outcome the progress store records. A timeout wins over the exit status
 * the killed process reports.
 */
export function classifyOutcome(input: ClassifyInput): BatchOutcome {
  const { process: outcome, context } = input;

  if (outcome.spawnError !== undefined) {
    return {
      kind: 'crash',
      error: new ExternalProcessCrash(null, outcome.spawnError, context),
    };
  }

  if (outcome.timedOut) {
    return {
      kind: 'timeout',
      error: new ExternalProcessTimeout(input.timeoutSeconds, context),
    };
  }

  if (outcome.exitCode !== 0) {
    return {
      kind: 'crash',
      error: new ExternalProcessCrash(
        outcome.exitCode,
        lastOutputLine(outcome.truncatedOutput),
        context,
        outcome.signal,
      ),
    };
  }

  if (input.artifactError) {
    return { kind: 'output-error', error: input.artifactError };
  }

  return { kind: 'clean' };
}

export type { ClassifyInput };
