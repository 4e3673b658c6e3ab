import type { Logger } from '@workspace/logger';
import type { BatchOutcome } from '../store/types.js';

type OutcomeKind = BatchOutcome['kind'];

type BatchRecord = {
  index: number;
  outcome: OutcomeKind;
  entities: number;
  itemsAdded: number;
  durationMs: number;
};

type BatchMetricsSnapshot = {
  batches: number;
  outcomes: Record<OutcomeKind, number>;
  entitiesAttempted: number;
  itemsAdded: number;
  durationMs: {
    min: number;
    max: number;
    avg: number;
    total: number;
  };
  slowestBatch: number | null;
};

function emptyOutcomes(): Record<OutcomeKind, number> {
  return { clean: 0, timeout: 0, 'output-error': 0, crash: 0 };
}

/**
 * Per-run batch statistics, logged once when the run ends.
 */
export class BatchMetrics {
  private readonly records: BatchRecord[];

  constructor() {
    this.records = [];
  }

  recordBatch(record: BatchRecord): void {
    this.records.push(record);
  }

  outcomeCount(kind: OutcomeKind): number {
    return this.records.filter((record) => record.outcome === kind).length;
  }

  snapshot(): BatchMetricsSnapshot {
    const outcomes = emptyOutcomes();
    let entitiesAttempted = 0;
    let itemsAdded = 0;
    let total = 0;
    let slowest: BatchRecord | undefined;

    for (const record of this.records) {
      outcomes[record.outcome] += 1;
      entitiesAttempted += record.entities;
      itemsAdded += record.itemsAdded;
      total += record.durationMs;
      if (!slowest || record.durationMs > slowest.durationMs) {
        slowest = record;
      }
    }

    const durations = this.records.map((record) => record.durationMs);
    const count = this.records.length;

    return {
      batches: count,
      outcomes,
      entitiesAttempted,
      itemsAdded,
      durationMs: {
        min: count > 0 ? Math.min(...durations) : 0,
        max: count > 0 ? Math.max(...durations) : 0,
        avg: count > 0 ? Math.round(total / count) : 0,
        total,
      },
      slowestBatch: slowest ? slowest.index + 1 : null,
    };
  }

  log(logger: Pick<Logger, 'info'>, context?: Record<string, unknown>): void {
    logger.info('Batch metrics', { ...context, ...this.snapshot() });
  }
}

export type { BatchMetricsSnapshot, BatchRecord };
