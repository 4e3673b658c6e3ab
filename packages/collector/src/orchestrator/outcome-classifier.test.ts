import { describe, it, expect } from 'vitest';
import {
  ExternalProcessCrash,
  ExternalProcessTimeout,
  OutputParseError,
} from '../errors.js';
import type { ProcessOutcome } from '../process/types.js';
import { classifyOutcome, lastOutputLine } from './outcome-classifier.js';

function makeOutcome(overrides?: Partial<ProcessOutcome>): ProcessOutcome {
  return {
    exitCode: 0,
    signal: null,
    timedOut: false,
    truncatedOutput: '',
    durationMs: 10,
    ...overrides,
  };
}

describe('lastOutputLine', () => {
  it('returns the last non-blank line', () => {
    expect(lastOutputLine('...\nstarting\nError: cookie expired\n\n')).toBe(
      'Error: cookie expired',
    );
    expect(lastOutputLine('')).toBe('');
  });
});

describe('classifyOutcome', () => {
  it('is clean on exit 0 with readable output', () => {
    expect(classifyOutcome({ process: makeOutcome(), timeoutSeconds: 300 })).toEqual({
      kind: 'clean',
    });
  });

  it('turns a timeout into ExternalProcessTimeout even with an exit status', () => {
    const outcome = classifyOutcome({
      process: makeOutcome({ timedOut: true, exitCode: null, signal: 'SIGTERM' }),
      timeoutSeconds: 420,
    });

    expect(outcome.kind).toBe('timeout');
    if (outcome.kind === 'timeout') {
      expect(outcome.error).toBeInstanceOf(ExternalProcessTimeout);
      expect(outcome.error.message).toBe(
        'Crawler exceeded its 420s timeout and was terminated',
      );
    }
  });

  it('turns a non-zero exit into a crash carrying the last output line', () => {
    const outcome = classifyOutcome({
      process: makeOutcome({ exitCode: 2, truncatedOutput: 'loading\nlogin required' }),
      timeoutSeconds: 300,
    });

    expect(outcome.kind).toBe('crash');
    if (outcome.kind === 'crash') {
      expect(outcome.error).toBeInstanceOf(ExternalProcessCrash);
      expect(outcome.error.message).toBe('Crawler exited with code 2: login required');
    }
  });

  it('turns a launch failure into a crash', () => {
    const outcome = classifyOutcome({
      process: makeOutcome({ exitCode: null, spawnError: 'spawn ./missing ENOENT' }),
      timeoutSeconds: 300,
    });

    expect(outcome.kind === 'crash' && outcome.error.message).toBe(
      'Crawler could not be launched: spawn ./missing ENOENT',
    );
  });

  it('names the signal when the process was killed from outside', () => {
    const outcome = classifyOutcome({
      process: makeOutcome({ exitCode: null, signal: 'SIGKILL' }),
      timeoutSeconds: 300,
    });

    expect(outcome.kind === 'crash' && outcome.error.message).toBe(
      'Crawler was killed by SIGKILL',
    );
  });

  it('reports unreadable output after a clean exit', () => {
    const artifactError = new OutputParseError('No crawler output');
    const outcome = classifyOutcome({
      process: makeOutcome(),
      timeoutSeconds: 300,
      artifactError,
    });

    expect(outcome).toEqual({ kind: 'output-error', error: artifactError });
  });

  it('prefers the process outcome over an output problem', () => {
    const outcome = classifyOutcome({
      process: makeOutcome({ timedOut: true, exitCode: null }),
      timeoutSeconds: 300,
      artifactError: new OutputParseError('No crawler output'),
    });

    expect(outcome.kind).toBe('timeout');
  });
});
