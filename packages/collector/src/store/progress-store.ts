import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  writeFileSync,
} from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { createLogger } from '@workspace/logger';
import { ErrorCode, ProgressStoreError, errorMessage } from '../errors.js';
import {
  ENTITY_STATUSES,
  type CollectedItem,
  type EntityInput,
  type EntityProgress,
  type EntityRecord,
  type EntityStatus,
  type ListEntitiesOptions,
  type ProgressStore,
  type RecordResultInput,
  type RecordResultOutput,
  type ResumableOptions,
  type StatusCounts,
} from './types.js';

const log = createLogger('progress-store');

const entityRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  tags: z.array(z.string()),
  followers: z.number().int().nonnegative().nullable(),
  status: z.enum(ENTITY_STATUSES),
  itemsCollected: z.number().int().nonnegative(),
  itemsTarget: z.number().int().positive(),
  lastRunTime: z.number().nullable(),
  failureReason: z.string().nullable(),
  createdAt: z.number(),
  updatedAt: z.number(),
});

const collectedItemSchema = z.object({
  id: z.string().min(1),
  entityId: z.string().min(1),
  title: z.string(),
  description: z.string(),
  kind: z.enum(['image', 'video']),
  likes: z.number(),
  collects: z.number(),
  comments: z.number(),
  publishedAt: z.string().nullable(),
  coverUrl: z.string(),
  url: z.string().nullable(),
  collectedAt: z.number(),
});

const storeDocumentSchema = z.object({
  version: z.literal(1),
  entities: z.record(z.string(), entityRecordSchema),
  items: z.record(z.string(), z.array(collectedItemSchema)),
});

type StoreDocument = z.infer<typeof storeDocumentSchema>;

type JsonProgressStoreOptions = {
  defaultItemsTarget?: number;
  clock?: () => number;
};

const RESUMABLE_STATUSES: readonly EntityStatus[] = ['partial', 'in_progress'];

function emptyDocument(): StoreDocument {
  return { version: 1, entities: {}, items: {} };
}

function emptyCounts(): StatusCounts {
  return {
    not_started: 0,
    in_progress: 0,
    completed: 0,
    partial: 0,
    failed: 0,
  };
}

function compareForResume(left: EntityRecord, right: EntityRecord): number {
  const leftRun = left.lastRunTime ?? Number.NEGATIVE_INFINITY;
  const rightRun = right.lastRunTime ?? Number.NEGATIVE_INFINITY;
  if (leftRun !== rightRun) {
    return leftRun < rightRun ? -1 : 1;
  }

  if (left.createdAt !== right.createdAt) {
    return left.createdAt - right.createdAt;
  }

  return left.id.localeCompare(right.id);
}

/**
 * Progress store backed by one JSON document. Reads always go to disk and
 * each mutation commits by writing a temp file and renaming it over the
 * document, so entity counters and item ids change together or not at all.
 */
export class JsonProgressStore implements ProgressStore {
  private readonly storePath: string;
  private readonly tmpPath: string;
  private readonly defaultItemsTarget: number;
  private readonly clock: () => number;

  constructor(storePath: string, options?: JsonProgressStoreOptions) {
    this.storePath = storePath;
    this.tmpPath = `${storePath}.tmp`;
    this.defaultItemsTarget = options?.defaultItemsTarget ?? 100;
    this.clock = options?.clock ?? Date.now;
  }

  upsertEntity(input: EntityInput): EntityRecord {
    return this.transact((doc) => {
      const now = this.clock();
      const existing = doc.entities[input.id];

      if (existing) {
        const updated: EntityRecord = {
          ...existing,
          name: input.name ?? existing.name,
          tags: input.tags ? mergeTags(existing.tags, input.tags) : existing.tags,
          followers:
            input.followers === undefined ? existing.followers : input.followers,
          itemsTarget: input.itemsTarget ?? existing.itemsTarget,
          updatedAt: now,
        };
        doc.entities[input.id] = updated;
        return updated;
      }

      const created: EntityRecord = {
        id: input.id,
        name: input.name ?? input.id,
        tags: input.tags ? mergeTags([], input.tags) : [],
        followers: input.followers ?? null,
        status: 'not_started',
        itemsCollected: 0,
        itemsTarget: input.itemsTarget ?? this.defaultItemsTarget,
        lastRunTime: null,
        failureReason: null,
        createdAt: now,
        updatedAt: now,
      };
      doc.entities[input.id] = created;
      return created;
    });
  }

  getEntity(entityId: string): EntityRecord | undefined {
    return this.read().entities[entityId];
  }

  listEntities(
    statusFilter?: EntityStatus | readonly EntityStatus[],
    options?: ListEntitiesOptions,
  ): EntityRecord[] {
    const statuses =
      statusFilter === undefined
        ? undefined
        : new Set<EntityStatus>(
            typeof statusFilter === 'string' ? [statusFilter] : statusFilter,
          );

    return Object.values(this.read().entities)
      .filter((entity) => !statuses || statuses.has(entity.status))
      .filter((entity) => !options?.tag || entity.tags.includes(options.tag))
      .sort((left, right) =>
        left.createdAt !== right.createdAt
          ? left.createdAt - right.createdAt
          : left.id.localeCompare(right.id),
      );
  }

  progress(entityId: string): EntityProgress | undefined {
    const entity = this.getEntity(entityId);
    if (!entity) {
      return undefined;
    }

    const remaining = Math.max(0, entity.itemsTarget - entity.itemsCollected);
    const percent = Math.min(
      100,
      Math.round((entity.itemsCollected / Math.max(entity.itemsTarget, 1)) * 100),
    );

    return {
      id: entity.id,
      status: entity.status,
      itemsCollected: entity.itemsCollected,
      itemsTarget: entity.itemsTarget,
      remaining,
      percent,
      lastRunTime: entity.lastRunTime,
      failureReason: entity.failureReason,
    };
  }

  resumableEntities(limit: number, options?: ResumableOptions): EntityRecord[] {
    const statuses: EntityStatus[] = [...RESUMABLE_STATUSES];
    if (options?.includeFailed) {
      statuses.push('failed');
    }

    return this.listEntities(statuses)
      .sort(compareForResume)
      .slice(0, Math.max(0, limit));
  }

  markInProgress(entityIds: readonly string[]): void {
    this.transact((doc) => {
      const now = this.clock();

      for (const entityId of entityIds) {
        const entity = this.requireEntity(doc, entityId);
        if (entity.status === 'completed') {
          throw new ProgressStoreError(
            `Entity ${entityId} is completed and cannot be collected again without a reset`,
            ErrorCode.STORE_INVALID_TRANSITION,
            { entityId, status: entity.status },
          );
        }

        entity.status = 'in_progress';
        entity.failureReason = null;
        entity.lastRunTime = now;
        entity.updatedAt = now;
      }
    });
  }

  recordResult(entityId: string, input: RecordResultInput): RecordResultOutput {
    return this.transact((doc) => {
      const entity = this.requireEntity(doc, entityId);
      const stored = doc.items[entityId] ?? [];
      const knownIds = new Set(stored.map((item) => item.id));

      let added = 0;
      for (const item of input.items) {
        if (item.entityId !== entityId || knownIds.has(item.id)) {
          continue;
        }

        knownIds.add(item.id);
        stored.push(item);
        added += 1;
      }

      doc.items[entityId] = stored;

      const now = this.clock();
      entity.itemsCollected += added;
      entity.lastRunTime = now;
      entity.updatedAt = now;

      if (entity.itemsCollected >= entity.itemsTarget) {
        entity.status = 'completed';
        entity.failureReason = null;
      } else if (input.outcome.kind === 'crash') {
        entity.status = 'failed';
        entity.failureReason = input.outcome.error.message;
      } else {
        entity.status = 'partial';
        entity.failureReason = null;
      }

      return { entity: { ...entity }, added };
    });
  }

  collectedItemIds(entityId: string): Set<string> {
    const items = this.read().items[entityId] ?? [];
    return new Set(items.map((item) => item.id));
  }

  collectedItems(entityId: string): readonly CollectedItem[] {
    return this.read().items[entityId] ?? [];
  }

  setItemsTarget(entityIds: readonly string[], itemsTarget: number): void {
    if (!Number.isInteger(itemsTarget) || itemsTarget < 1) {
      throw new ProgressStoreError(
        `Invalid items target ${itemsTarget}. Provide a positive integer.`,
      );
    }

    this.transact((doc) => {
      const now = this.clock();
      for (const entityId of entityIds) {
        const entity = this.requireEntity(doc, entityId);
        entity.itemsTarget = itemsTarget;
        entity.updatedAt = now;
      }
    });
  }

  updateFollowers(entityId: string, followers: number): void {
    this.transact((doc) => {
      const entity = this.requireEntity(doc, entityId);
      entity.followers = followers;
      entity.updatedAt = this.clock();
    });
  }

  resetEntity(
    entityId: string,
    options?: { dropItems?: boolean },
  ): EntityRecord {
    return this.transact((doc) => {
      const entity = this.requireEntity(doc, entityId);

      if (options?.dropItems) {
        delete doc.items[entityId];
        entity.itemsCollected = 0;
      }

      entity.status = 'not_started';
      entity.failureReason = null;
      entity.updatedAt = this.clock();
      return { ...entity };
    });
  }

  removeEntity(entityId: string): boolean {
    return this.transact((doc) => {
      if (!doc.entities[entityId]) {
        return false;
      }

      delete doc.entities[entityId];
      delete doc.items[entityId];
      return true;
    });
  }

  countByStatus(): StatusCounts {
    const counts = emptyCounts();
    for (const entity of Object.values(this.read().entities)) {
      counts[entity.status] += 1;
    }
    return counts;
  }

  private requireEntity(doc: StoreDocument, entityId: string): EntityRecord {
    const entity = doc.entities[entityId];
    if (!entity) {
      throw new ProgressStoreError(`Unknown entity: ${entityId}`, ErrorCode.STORE_FAILED, {
        entityId,
      });
    }
    return entity;
  }

  private read(): StoreDocument {
    if (!existsSync(this.storePath)) {
      return emptyDocument();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.storePath, 'utf-8'));
    } catch (error) {
      throw new ProgressStoreError(
        `Progress store ${this.storePath} is unreadable: ${errorMessage(error)}`,
        ErrorCode.STORE_FAILED,
        { storePath: this.storePath },
        { cause: error },
      );
    }

    const parsed = storeDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProgressStoreError(
        `Progress store ${this.storePath} is malformed: ${parsed.error.issues[0]?.message ?? 'invalid document'}`,
        ErrorCode.STORE_FAILED,
        { storePath: this.storePath },
      );
    }

    return parsed.data;
  }

  private transact<T>(mutate: (doc: StoreDocument) => T): T {
    const doc = this.read();
    const result = mutate(doc);
    this.commit(doc);
    return result;
  }

  private commit(doc: StoreDocument): void {
    try {
      const dir = dirname(this.storePath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }

      writeFileSync(this.tmpPath, JSON.stringify(doc, null, 2), 'utf-8');
      renameSync(this.tmpPath, this.storePath);
    } catch (error) {
      throw new ProgressStoreError(
        `Failed to commit progress store ${this.storePath}: ${errorMessage(error)}`,
        ErrorCode.STORE_FAILED,
        { storePath: this.storePath },
        { cause: error },
      );
    }

    log.debug('Committed progress store', {
      entities: Object.keys(doc.entities).length,
    });
  }
}

function mergeTags(current: readonly string[], incoming: readonly string[]): string[] {
  const merged = [...current];
  for (const tag of incoming) {
    const trimmed = tag.trim();
    if (trimmed && !merged.includes(trimmed)) {
      merged.push(trimmed);
    }
  }
  return merged;
}

export type { JsonProgressStoreOptions };
