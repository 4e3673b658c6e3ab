import { describe, it, expect } from 'vitest';
import type { EntityRecord } from '../store/types.js';
import { BatchPlanner, DEFAULT_TIMEOUT_MODEL, remainingCeiling } from './batch-planner.js';

function makeEntity(id: string, itemsCollected: number, itemsTarget: number): EntityRecord {
  return {
    id,
    name: id,
    tags: [],
    followers: null,
    status: itemsCollected > 0 ? 'partial' : 'not_started',
    itemsCollected,
    itemsTarget,
    lastRunTime: null,
    failureReason: null,
    createdAt: 1,
    updatedAt: 1,
  };
}

describe('remainingCeiling', () => {
  it('requests only what is left to reach the target', () => {
    expect(remainingCeiling(makeEntity('a', 0, 20))).toBe(20);
    expect(remainingCeiling(makeEntity('b', 79, 80))).toBe(1);
  });

  it('never goes below one', () => {
    expect(remainingCeiling(makeEntity('c', 120, 100))).toBe(1);
  });
});

describe('BatchPlanner', () => {
  it('splits entities into ceil(N/B) batches of at most B', () => {
    const planner = new BatchPlanner({ batchSize: 3 });
    const entities = Array.from({ length: 7 }, (_, index) =>
      makeEntity(`e${index}`, 0, 10),
    );

    const plan = planner.plan(entities);

    expect(plan.batches.map((batch) => batch.entities.map((entity) => entity.id))).toEqual([
      ['e0', 'e1', 'e2'],
      ['e3', 'e4', 'e5'],
      ['e6'],
    ]);
    expect(plan.batches.map((batch) => batch.index)).toEqual([0, 1, 2]);
    expect(plan.entityCount).toBe(7);
  });

  it('returns an empty plan for no entities', () => {
    const plan = new BatchPlanner({ batchSize: 5 }).plan([]);

    expect(plan.batches).toEqual([]);
    expect(plan.totalTimeoutSeconds).toBe(0);
  });

  it('carries per-entity ceilings and the batch maximum', () => {
    const plan = new BatchPlanner({ batchSize: 5 }).plan([
      makeEntity('a', 0, 20),
      makeEntity('b', 79, 80),
    ]);
    const batch = plan.batches[0];

    expect(batch?.ceilings).toEqual(new Map([['a', 20], ['b', 1]]));
    expect(batch?.maxCeiling).toBe(20);
  });

  it('sizes the timeout from entity count and item ceiling', () => {
    const planner = new BatchPlanner({ batchSize: 5 });

    // (2 * 20 * 4 + 2 * 60) * 1.5 = 420
    expect(planner.timeoutFor(2, 20)).toBe(420);
    // (1 * 1 * 4 + 60) * 1.5 = 96, raised to the 300s floor
    expect(planner.timeoutFor(1, 1)).toBe(300);
    // capped at the ceiling
    expect(planner.timeoutFor(20, 500)).toBe(DEFAULT_TIMEOUT_MODEL.maxTimeoutSeconds);
  });

  it('grows the timeout monotonically', () => {
    const planner = new BatchPlanner({ batchSize: 5 });
    let previous = 0;
    for (let ceiling = 1; ceiling <= 200; ceiling += 7) {
      const timeout = planner.timeoutFor(3, ceiling);
      expect(timeout).toBeGreaterThanOrEqual(previous);
      previous = timeout;
    }
  });

  it('accepts a custom timeout model', () => {
    const planner = new BatchPlanner({
      batchSize: 2,
      timeout: { perItemSeconds: 1, perEntityOverheadSeconds: 0, safetyFactor: 1, minTimeoutSeconds: 1 },
    });

    expect(planner.timeoutFor(2, 10)).toBe(20);
  });

  it('rejects batch sizes outside 1..20', () => {
    expect(() => new BatchPlanner({ batchSize: 0 })).toThrow(RangeError);
    expect(() => new BatchPlanner({ batchSize: 21 })).toThrow(RangeError);
    expect(() => new BatchPlanner({ batchSize: 2.5 })).toThrow(RangeError);
  });
});
