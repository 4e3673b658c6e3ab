type ProcessCommand = {
  executable: string;
  args: readonly string[];
  cwd?: string;
  env?: Record<string, string>;
};

type OutputStream = 'stdout' | 'stderr';

type ProcessOutcome = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  timedOut: boolean;
  truncatedOutput: string;
  durationMs: number;
  spawnError?: string;
};

type RunOptions = {
  onLine?: (line: string, stream: OutputStream) => void;
};

/**
 * Launches the crawler and reports how it ended. Implementations never
 * reject on timeout or non-zero exit; they resolve with the outcome.
 */
interface ProcessRunner {
  run(
    command: ProcessCommand,
    timeoutMs: number,
    options?: RunOptions,
  ): Promise<ProcessOutcome>;
}

export type {
  OutputStream,
  ProcessCommand,
  ProcessOutcome,
  ProcessRunner,
  RunOptions,
};
