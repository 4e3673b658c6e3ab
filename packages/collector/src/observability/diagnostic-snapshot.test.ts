import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, readdirSync, readFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { DiagnosticSnapshotWriter, type DiagnosticData } from './diagnostic-snapshot.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-diagnostics');

function cleanup(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

function makeData(overrides?: Partial<DiagnosticData>): DiagnosticData {
  return {
    runId: 'run-1',
    batchIndex: 0,
    entityIds: ['a'],
    outcome: 'crash',
    message: 'Crawler exited with code 1: boom',
    exitCode: 1,
    signal: null,
    timedOut: false,
    timeoutSeconds: 300,
    timestamp: 1,
    ...overrides,
  };
}

describe('DiagnosticSnapshotWriter', () => {
  beforeEach(() => {
    cleanup();
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    cleanup();
  });

  it('writes the diagnostic and the output tail', () => {
    const writer = new DiagnosticSnapshotWriter({ directory: TEST_DIR });
    writer.initialize();

    const path = writer.write(makeData(), 'line one\nboom');

    expect(path).toBe(join(TEST_DIR, 'run-1-batch-1-crash.json'));
    expect(JSON.parse(readFileSync(join(TEST_DIR, 'run-1-batch-1-crash.json'), 'utf-8'))).toEqual(
      makeData(),
    );
    expect(readFileSync(join(TEST_DIR, 'run-1-batch-1-crash.log'), 'utf-8')).toBe(
      'line one\nboom',
    );
  });

  it('skips the log file when there is no output', () => {
    const writer = new DiagnosticSnapshotWriter({ directory: TEST_DIR });
    writer.initialize();
    writer.write(makeData({ outcome: 'timeout', batchIndex: 2 }), '');

    expect(readdirSync(TEST_DIR)).toEqual(['run-1-batch-3-timeout.json']);
  });

  it('stops writing at the configured cap', () => {
    const writer = new DiagnosticSnapshotWriter({ directory: TEST_DIR, maxSnapshots: 2 });
    writer.initialize();

    writer.write(makeData({ batchIndex: 0 }));
    writer.write(makeData({ batchIndex: 1 }));
    const third = writer.write(makeData({ batchIndex: 2 }));

    expect(third).toBeUndefined();
    expect(writer.getSnapshotCount()).toBe(2);
  });

  it('counts snapshots already on disk', () => {
    new DiagnosticSnapshotWriter({ directory: TEST_DIR }).write(makeData());

    const writer = new DiagnosticSnapshotWriter({ directory: TEST_DIR });
    writer.initialize();

    expect(writer.getSnapshotCount()).toBe(1);
  });

  it('sanitizes the run id for file names', () => {
    const writer = new DiagnosticSnapshotWriter({ directory: TEST_DIR });

    expect(writer.write(makeData({ runId: 'run/1:x' }))).toBe(
      join(TEST_DIR, 'run_1_x-batch-1-crash.json'),
    );
  });
});
