import type { EntityRecord } from '../store/types.js';
import type { Batch, RunPlan, TimeoutModel } from './types.js';

const MAX_BATCH_SIZE = 20;

const DEFAULT_TIMEOUT_MODEL: TimeoutModel = {
  perItemSeconds: 4,
  perEntityOverheadSeconds: 60,
  fixedOverheadSeconds: 0,
  safetyFactor: 1.5,
  minTimeoutSeconds: 300,
  maxTimeoutSeconds: 7200,
};

type BatchPlannerConfig = {
  batchSize: number;
  timeout?: Partial<TimeoutModel>;
};

export function remainingCeiling(entity: EntityRecord): number {
  return Math.max(1, entity.itemsTarget - entity.itemsCollected);
}

export class BatchPlanner {
  private readonly batchSize: number;
  private readonly timeoutModel: TimeoutModel;

  constructor(config: BatchPlannerConfig) {
    if (
      !Number.isInteger(config.batchSize) ||
      config.batchSize < 1 ||
      config.batchSize > MAX_BATCH_SIZE
    ) {
      throw new RangeError(
        `Invalid batch size ${config.batchSize}. Provide an integer between 1 and ${MAX_BATCH_SIZE}.`,
      );
    }

    this.batchSize = config.batchSize;
    this.timeoutModel = { ...DEFAULT_TIMEOUT_MODEL, ...config.timeout };

    if (this.timeoutModel.minTimeoutSeconds > this.timeoutModel.maxTimeoutSeconds) {
      throw new RangeError('minTimeoutSeconds must not exceed maxTimeoutSeconds');
    }
  }

  plan(entities: readonly EntityRecord[]): RunPlan {
    const batches: Batch[] = [];

    for (let start = 0; start < entities.length; start += this.batchSize) {
      const members = entities.slice(start, start + this.batchSize);
      const ceilings = new Map<string, number>();
      for (const entity of members) {
        ceilings.set(entity.id, remainingCeiling(entity));
      }

      const maxCeiling = Math.max(...ceilings.values());

      batches.push({
        index: batches.length,
        entities: members,
        ceilings,
        maxCeiling,
        timeoutSeconds: this.timeoutFor(members.length, maxCeiling),
      });
    }

    return {
      batches,
      entityCount: entities.length,
      totalTimeoutSeconds: batches.reduce(
        (sum, batch) => sum + batch.timeoutSeconds,
        0,
      ),
    };
  }

  /**
   * Crawler throughput is roughly linear in requested items, so the budget
   * grows with entity count and item ceiling, padded by the safety factor.
   */
  timeoutFor(entityCount: number, itemCeiling: number): number {
    const model = this.timeoutModel;
    const estimate =
      entityCount * itemCeiling * model.perItemSeconds +
      entityCount * model.perEntityOverheadSeconds +
      model.fixedOverheadSeconds;
    const padded = Math.ceil(estimate * model.safetyFactor);

    return Math.min(
      model.maxTimeoutSeconds,
      Math.max(model.minTimeoutSeconds, padded),
    );
  }
}

export { DEFAULT_TIMEOUT_MODEL, MAX_BATCH_SIZE };
export type { BatchPlannerConfig };
