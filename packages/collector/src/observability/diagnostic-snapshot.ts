import { existsSync, mkdirSync, readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { createLogger } from '@workspace/logger';
import { errorMessage } from '../errors.js';
import type { BatchOutcome } from '../store/types.js';

const log = createLogger('diagnostics');

type DiagnosticData = {
  runId: string;
  batchIndex: number;
  entityIds: string[];
  outcome: BatchOutcome['kind'];
  message: string;
  exitCode: number | null;
  signal: string | null;
  timedOut: boolean;
  timeoutSeconds: number;
  timestamp: number;
};

type DiagnosticSnapshotConfig = {
  directory: string;
  maxSnapshots: number;
};

const DEFAULT_CONFIG: DiagnosticSnapshotConfig = {
  directory: 'tmp/diagnostics',
  maxSnapshots: 100,
};

/**
 * Writes one JSON file per failed batch, plus a `.log` file with the tail of
 * the crawler's output when there is any.
 */
export class DiagnosticSnapshotWriter {
  private readonly config: DiagnosticSnapshotConfig;
  private snapshotCount: number;

  constructor(config?: Partial<DiagnosticSnapshotConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.snapshotCount = 0;
  }

  initialize(): void {
    if (!existsSync(this.config.directory)) {
      mkdirSync(this.config.directory, { recursive: true });
    }

    this.snapshotCount = this.countExistingSnapshots();
  }

  write(data: DiagnosticData, output?: string): string | undefined {
    if (this.snapshotCount >= this.config.maxSnapshots) {
      return undefined;
    }

    try {
      if (!existsSync(this.config.directory)) {
        mkdirSync(this.config.directory, { recursive: true });
      }

      const baseName = `${this.sanitizeFilename(data.runId)}-batch-${data.batchIndex + 1}-${data.outcome}`;
      const jsonPath = join(this.config.directory, `${baseName}.json`);
      writeFileSync(jsonPath, JSON.stringify(data, null, 2), 'utf-8');

      if (output) {
        writeFileSync(join(this.config.directory, `${baseName}.log`), output, 'utf-8');
      }

      this.snapshotCount += 1;
      return jsonPath;
    } catch (error) {
      log.warn('Could not write batch diagnostics', {
        directory: this.config.directory,
        error: errorMessage(error),
      });
      return undefined;
    }
  }

  getSnapshotCount(): number {
    return this.snapshotCount;
  }

  private countExistingSnapshots(): number {
    try {
      return readdirSync(this.config.directory).filter((file) =>
        file.endsWith('.json'),
      ).length;
    } catch (error) {
      log.debug('Diagnostics directory not readable', {
        directory: this.config.directory,
        error: errorMessage(error),
      });
      return 0;
    }
  }

  private sanitizeFilename(value: string): string {
    return value.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 100);
  }
}

export type { DiagnosticData, DiagnosticSnapshotConfig };
