import { spawn, type ChildProcess } from 'node:child_process';
import { createInterface } from 'node:readline';
import { createLogger } from '@workspace/logger';
import { errorMessage } from '../errors.js';
import { OutputTail } from './output-tail.js';
import type {
  OutputStream,
  ProcessCommand,
  ProcessOutcome,
  ProcessRunner,
  RunOptions,
} from './types.js';

const log = createLogger('process-runner');

type SpawnProcessRunnerConfig = {
  killGraceMs: number;
  /** How long to wait for the output pipes to close once the crawler has exited. */
  drainGraceMs: number;
  outputTailChars: number;
};

const DEFAULT_CONFIG: SpawnProcessRunnerConfig = {
  killGraceMs: 5_000,
  drainGraceMs: 2_000,
  outputTailChars: 8_000,
};

type ExitStatus = Pick<ProcessOutcome, 'exitCode' | 'signal'>;

const usesProcessGroups = process.platform !== 'win32';

/**
 * Signals the child's whole process group so helpers it spawned go down
 * with it. Falls back to the child alone where groups are unavailable.
 */
function signalTree(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid === undefined) {
    return;
  }

  if (usesProcessGroups) {
    try {
      process.kill(-child.pid, signal);
      return;
    } catch (error) {
      log.debug('Process group signal failed', {
        pid: child.pid,
        signal,
        error: errorMessage(error),
      });
    }
  }

  child.kill(signal);
}

export class SpawnProcessRunner implements ProcessRunner {
  private readonly config: SpawnProcessRunnerConfig;

  constructor(config?: Partial<SpawnProcessRunnerConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  run(
    command: ProcessCommand,
    timeoutMs: number,
    options?: RunOptions,
  ): Promise<ProcessOutcome> {
    const startedAt = performance.now();
    const tail = new OutputTail(this.config.outputTailChars);
    const graceMs = this.config.killGraceMs;

    return new Promise<ProcessOutcome>((resolve) => {
      let settled = false;
      let timedOut = false;
      let exited: ExitStatus | undefined;
      const timers: NodeJS.Timeout[] = [];

      const settle = (outcome: ExitStatus & { spawnError?: string }) => {
        if (settled) {
          return;
        }
        settled = true;
        for (const timer of timers) {
          clearTimeout(timer);
        }

        resolve({
          ...outcome,
          timedOut,
          truncatedOutput: tail.toString(),
          durationMs: Math.round(performance.now() - startedAt),
        });
      };

      let child: ChildProcess;
      try {
        child = spawn(command.executable, [...command.args], {
          cwd: command.cwd,
          env: { ...process.env, ...command.env },
          detached: usesProcessGroups,
          stdio: ['ignore', 'pipe', 'pipe'],
        });
      } catch (error) {
        settle({ exitCode: null, signal: null, spawnError: errorMessage(error) });
        return;
      }

      const attach = (stream: NodeJS.ReadableStream | null, name: OutputStream) => {
        if (!stream) {
          return;
        }

        const lines = createInterface({ input: stream, crlfDelay: Infinity });
        lines.on('line', (line) => {
          tail.push(line);
          options?.onLine?.(line, name);
        });
      };

      attach(child.stdout, 'stdout');
      attach(child.stderr, 'stderr');

      child.once('error', (error) => {
        // 'error' without a pid means the executable never started
        if (child.pid === undefined) {
          settle({ exitCode: null, signal: null, spawnError: error.message });
          return;
        }
        log.warn('Crawler process error', { pid: child.pid, error: error.message });
      });

      child.once('exit', (exitCode, signal) => {
        exited = { exitCode, signal };
        if (timedOut) {
          signalTree(child, 'SIGKILL');
        }

        // Helpers that inherited stdout keep the pipes open after the crawler is gone
        timers.push(
          setTimeout(() => {
            log.warn('Crawler exited but its output stayed open, killing leftover processes', {
              pid: child.pid,
              exitCode,
            });
            signalTree(child, 'SIGKILL');
            child.stdout?.destroy();
            child.stderr?.destroy();
            settle({ exitCode, signal });
          }, this.config.drainGraceMs),
        );
      });

      child.once('close', (exitCode, signal) => {
        settle(exited ?? { exitCode, signal });
      });

      timers.push(
        setTimeout(() => {
          if (exited) {
            return;
          }
          timedOut = true;
          log.warn('Crawler exceeded its timeout, terminating process tree', {
            pid: child.pid,
            timeoutMs,
          });
          signalTree(child, 'SIGTERM');

          timers.push(
            setTimeout(() => {
              signalTree(child, 'SIGKILL');

              // Something outside the group still holds the pipes open
              timers.push(
                setTimeout(() => {
                  child.stdout?.destroy();
                  child.stderr?.destroy();
                  settle(exited ?? { exitCode: child.exitCode, signal: 'SIGKILL' });
                }, graceMs),
              );
            }, graceMs),
          );
        }, Math.max(0, timeoutMs)),
      );
    });
  }
}

export type { SpawnProcessRunnerConfig };
