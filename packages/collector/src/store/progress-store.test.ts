import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { ErrorCode, ExternalProcessCrash, ExternalProcessTimeout, ProgressStoreError } from '../errors.js';
import { JsonProgressStore } from './progress-store.js';
import type { CollectedItem } from './types.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-progress-store');
const STORE_PATH = join(TEST_DIR, 'progress.json');

function cleanup(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

function makeItem(entityId: string, id: string): CollectedItem {
  return {
    id,
    entityId,
    title: `title ${id}`,
    description: '',
    kind: 'image',
    likes: 1,
    collects: 0,
    comments: 0,
    publishedAt: null,
    coverUrl: '',
    url: null,
    collectedAt: 1,
  };
}

function makeItems(entityId: string, count: number, prefix = 'n'): CollectedItem[] {
  return Array.from({ length: count }, (_, index) =>
    makeItem(entityId, `${prefix}${index + 1}`),
  );
}

function tickingClock(start = 1_000): () => number {
  let now = start;
  return () => {
    now += 1;
    return now;
  };
}

describe('JsonProgressStore', () => {
  let store: JsonProgressStore;

  beforeEach(() => {
    cleanup();
    mkdirSync(TEST_DIR, { recursive: true });
    store = new JsonProgressStore(STORE_PATH, {
      defaultItemsTarget: 20,
      clock: tickingClock(),
    });
  });

  afterEach(() => {
    cleanup();
  });

  it('creates entities as not_started with the default target', () => {
    const entity = store.upsertEntity({ id: 'a', tags: ['baking'] });

    expect(entity).toMatchObject({
      id: 'a',
      name: 'a',
      tags: ['baking'],
      followers: null,
      status: 'not_started',
      itemsCollected: 0,
      itemsTarget: 20,
      lastRunTime: null,
      failureReason: null,
    });
  });

  it('merges tags and keeps status and counters on upsert of a known id', () => {
    store.upsertEntity({ id: 'a', tags: ['baking'] });
    store.markInProgress(['a']);
    const updated = store.upsertEntity({ id: 'a', name: 'Baker', tags: ['baking', 'bread'] });

    expect(updated.name).toBe('Baker');
    expect(updated.tags).toEqual(['baking', 'bread']);
    expect(updated.status).toBe('in_progress');
  });

  it('persists across instances', () => {
    store.upsertEntity({ id: 'a', itemsTarget: 5 });
    store.markInProgress(['a']);
    store.recordResult('a', { items: makeItems('a', 2), outcome: { kind: 'clean' } });

    const reopened = new JsonProgressStore(STORE_PATH);
    expect(reopened.getEntity('a')?.itemsCollected).toBe(2);
    expect(reopened.collectedItemIds('a')).toEqual(new Set(['n1', 'n2']));
  });

  it('marks an entity completed once collected reaches the target', () => {
    store.upsertEntity({ id: 'a', itemsTarget: 20 });
    store.markInProgress(['a']);
    const result = store.recordResult('a', {
      items: makeItems('a', 20),
      outcome: { kind: 'clean' },
    });

    expect(result.added).toBe(20);
    expect(result.entity.status).toBe('completed');
    expect(store.progress('a')).toMatchObject({ remaining: 0, percent: 100 });
  });

  it('counts only new ids and keeps partial below the target', () => {
    store.upsertEntity({ id: 'a', itemsTarget: 10 });
    store.markInProgress(['a']);
    store.recordResult('a', { items: makeItems('a', 4), outcome: { kind: 'clean' } });

    store.markInProgress(['a']);
    const second = store.recordResult('a', {
      items: [...makeItems('a', 4), makeItem('a', 'x1'), makeItem('a', 'x1')],
      outcome: { kind: 'clean' },
    });

    expect(second.added).toBe(1);
    expect(second.entity.itemsCollected).toBe(5);
    expect(second.entity.status).toBe('partial');
    expect(store.collectedItems('a')).toHaveLength(5);
  });

  it('ignores items that belong to another entity', () => {
    store.upsertEntity({ id: 'a' });
    store.markInProgress(['a']);
    const result = store.recordResult('a', {
      items: [makeItem('b', 'n1')],
      outcome: { kind: 'clean' },
    });

    expect(result.added).toBe(0);
  });

  it('records a crash below target as failed with the reason', () => {
    store.upsertEntity({ id: 'a' });
    store.markInProgress(['a']);
    const error = new ExternalProcessCrash(3, 'login expired');
    const result = store.recordResult('a', {
      items: [],
      outcome: { kind: 'crash', error },
    });

    expect(result.entity.status).toBe('failed');
    expect(result.entity.failureReason).toBe('Crawler exited with code 3: login expired');
  });

  it('records a timeout below target as partial', () => {
    store.upsertEntity({ id: 'a' });
    store.markInProgress(['a']);
    const result = store.recordResult('a', {
      items: makeItems('a', 3),
      outcome: { kind: 'timeout', error: new ExternalProcessTimeout(300) },
    });

    expect(result.entity.status).toBe('partial');
    expect(result.entity.failureReason).toBeNull();
  });

  it('completes even on a crash when the target is reached', () => {
    store.upsertEntity({ id: 'a', itemsTarget: 2 });
    store.markInProgress(['a']);
    const result = store.recordResult('a', {
      items: makeItems('a', 2),
      outcome: { kind: 'crash', error: new ExternalProcessCrash(1, 'boom') },
    });

    expect(result.entity.status).toBe('completed');
  });

  it('refuses to mark a completed entity in progress', () => {
    store.upsertEntity({ id: 'a', itemsTarget: 1 });
    store.markInProgress(['a']);
    store.recordResult('a', { items: makeItems('a', 1), outcome: { kind: 'clean' } });

    try {
      store.markInProgress(['a']);
      expect.unreachable('markInProgress should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ProgressStoreError);
      expect(error).toMatchObject({ code: ErrorCode.STORE_INVALID_TRANSITION });
    }
  });

  it('returns resumable entities with the oldest run first', () => {
    store.upsertEntity({ id: 'old' });
    store.upsertEntity({ id: 'new' });
    store.upsertEntity({ id: 'stale' });
    store.upsertEntity({ id: 'broken' });
    store.upsertEntity({ id: 'fresh' });

    store.markInProgress(['old']);
    store.recordResult('old', { items: [], outcome: { kind: 'clean' } });
    store.markInProgress(['new']);
    store.recordResult('new', { items: [], outcome: { kind: 'clean' } });
    store.markInProgress(['stale']);
    store.markInProgress(['broken']);
    store.recordResult('broken', {
      items: [],
      outcome: { kind: 'crash', error: new ExternalProcessCrash(1, '') },
    });

    expect(store.resumableEntities(10).map((entity) => entity.id)).toEqual([
      'old',
      'new',
      'stale',
    ]);
    expect(
      store.resumableEntities(10, { includeFailed: true }).map((entity) => entity.id),
    ).toEqual(['old', 'new', 'stale', 'broken']);
    expect(store.resumableEntities(1).map((entity) => entity.id)).toEqual(['old']);
  });

  it('filters listings by status and tag', () => {
    store.upsertEntity({ id: 'a', tags: ['baking'] });
    store.upsertEntity({ id: 'b', tags: ['travel'] });
    store.upsertEntity({ id: 'c', tags: ['baking'] });
    store.markInProgress(['c']);

    expect(store.listEntities('not_started').map((entity) => entity.id)).toEqual(['a', 'b']);
    expect(
      store.listEntities(undefined, { tag: 'baking' }).map((entity) => entity.id),
    ).toEqual(['a', 'c']);
    expect(
      store.listEntities(['in_progress', 'not_started'], { tag: 'baking' }).map(
        (entity) => entity.id,
      ),
    ).toEqual(['a', 'c']);
  });

  it('counts entities by status', () => {
    store.upsertEntity({ id: 'a' });
    store.upsertEntity({ id: 'b' });
    store.markInProgress(['b']);

    expect(store.countByStatus()).toEqual({
      not_started: 1,
      in_progress: 1,
      completed: 0,
      partial: 0,
      failed: 0,
    });
  });

  it('resets an entity, optionally dropping its items', () => {
    store.upsertEntity({ id: 'a', itemsTarget: 3 });
    store.markInProgress(['a']);
    store.recordResult('a', { items: makeItems('a', 3), outcome: { kind: 'clean' } });

    const kept = store.resetEntity('a');
    expect(kept.status).toBe('not_started');
    expect(kept.itemsCollected).toBe(3);

    const dropped = store.resetEntity('a', { dropItems: true });
    expect(dropped.itemsCollected).toBe(0);
    expect(store.collectedItems('a')).toEqual([]);
  });

  it('removes an entity with its items', () => {
    store.upsertEntity({ id: 'a' });

    expect(store.removeEntity('a')).toBe(true);
    expect(store.removeEntity('a')).toBe(false);
    expect(store.getEntity('a')).toBeUndefined();
  });

  it('updates targets and followers', () => {
    store.upsertEntity({ id: 'a' });
    store.setItemsTarget(['a'], 80);
    store.updateFollowers('a', 1234);

    expect(store.getEntity('a')).toMatchObject({ itemsTarget: 80, followers: 1234 });
    expect(() => store.setItemsTarget(['a'], 0)).toThrow(ProgressStoreError);
  });

  it('rejects a malformed document', () => {
    writeFileSync(STORE_PATH, JSON.stringify({ version: 2 }), 'utf-8');

    expect(() => store.listEntities()).toThrow(ProgressStoreError);
  });

  it('rejects updates for unknown entities', () => {
    expect(() => store.markInProgress(['ghost'])).toThrow('Unknown entity: ghost');
  });
});
