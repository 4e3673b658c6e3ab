import type { EntityRecord } from '../store/types.js';

type TimeoutModel = {
  perItemSeconds: number;
  perEntityOverheadSeconds: number;
  fixedOverheadSeconds: number;
  safetyFactor: number;
  minTimeoutSeconds: number;
  maxTimeoutSeconds: number;
};

type Batch = {
  index: number;
  entities: readonly EntityRecord[];
  ceilings: ReadonlyMap<string, number>;
  maxCeiling: number;
  timeoutSeconds: number;
};

type RunPlan = {
  batches: Batch[];
  entityCount: number;
  totalTimeoutSeconds: number;
};

type ExcludeFilter = Map<string, string[]>;

export type { Batch, ExcludeFilter, RunPlan, TimeoutModel };
