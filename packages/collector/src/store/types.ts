import type { CollectorError } from '../errors.js';

const ENTITY_STATUSES = [
  'not_started',
  'in_progress',
  'completed',
  'partial',
  'failed',
] as const;

type EntityStatus = (typeof ENTITY_STATUSES)[number];

type EntityRecord = {
  id: string;
  name: string;
  tags: string[];
  followers: number | null;
  status: EntityStatus;
  itemsCollected: number;
  itemsTarget: number;
  lastRunTime: number | null;
  failureReason: string | null;
  createdAt: number;
  updatedAt: number;
};

type CollectedItem = {
  id: string;
  entityId: string;
  title: string;
  description: string;
  kind: 'image' | 'video';
  likes: number;
  collects: number;
  comments: number;
  publishedAt: string | null;
  coverUrl: string;
  url: string | null;
  collectedAt: number;
};

/**
 * How a batch ended for the entities it carried.
 * `crash` is the only kind that moves an incomplete entity to `failed`.
 */
type BatchOutcome =
  | { kind: 'clean' }
  | { kind: 'timeout'; error: CollectorError }
  | { kind: 'output-error'; error: CollectorError }
  | { kind: 'crash'; error: CollectorError };

type EntityInput = {
  id: string;
  name?: string;
  tags?: string[];
  followers?: number | null;
  itemsTarget?: number;
};

type EntityProgress = {
  id: string;
  status: EntityStatus;
  itemsCollected: number;
  itemsTarget: number;
  remaining: number;
  percent: number;
  lastRunTime: number | null;
  failureReason: string | null;
};

type RecordResultInput = {
  items: readonly CollectedItem[];
  outcome: BatchOutcome;
};

type RecordResultOutput = {
  entity: EntityRecord;
  added: number;
};

type ListEntitiesOptions = {
  tag?: string;
};

type ResumableOptions = {
  includeFailed?: boolean;
};

type StatusCounts = Record<EntityStatus, number>;

/**
 * Durable per-entity progress. Every call reads the latest committed state;
 * every mutation is a single atomic commit.
 */
interface ProgressStore {
  upsertEntity(input: EntityInput): EntityRecord;
  getEntity(entityId: string): EntityRecord | undefined;
  listEntities(
    statusFilter?: EntityStatus | readonly EntityStatus[],
    options?: ListEntitiesOptions,
  ): EntityRecord[];
  progress(entityId: string): EntityProgress | undefined;
  resumableEntities(limit: number, options?: ResumableOptions): EntityRecord[];
  markInProgress(entityIds: readonly string[]): void;
  recordResult(entityId: string, input: RecordResultInput): RecordResultOutput;
  collectedItemIds(entityId: string): Set<string>;
  collectedItems(entityId: string): readonly CollectedItem[];
  setItemsTarget(entityIds: readonly string[], itemsTarget: number): void;
  updateFollowers(entityId: string, followers: number): void;
  resetEntity(entityId: string, options?: { dropItems?: boolean }): EntityRecord;
  removeEntity(entityId: string): boolean;
  countByStatus(): StatusCounts;
}

export { ENTITY_STATUSES };
export type {
  BatchOutcome,
  CollectedItem,
  EntityInput,
  EntityProgress,
  EntityRecord,
  EntityStatus,
  ListEntitiesOptions,
  ProgressStore,
  RecordResultInput,
  RecordResultOutput,
  ResumableOptions,
  StatusCounts,
};
