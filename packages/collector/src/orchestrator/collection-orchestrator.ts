import { randomUUID } from 'node:crypto';
import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { createLogger, type Logger } from '@workspace/logger';
import type { ConfigPatcher } from '../config-patcher/config-patcher.js';
import type { ConfigMutation } from '../config-patcher/types.js';
import {
  ConfigMutationError,
  ConfigRestoreError,
  ExternalProcessCrash,
  OutputParseError,
  errorMessage,
  type CollectorError,
} from '../errors.js';
import type { DiagnosticSnapshotWriter } from '../observability/diagnostic-snapshot.js';
import { BatchMetrics } from '../observability/metrics.js';
import type { ArtifactReader } from '../pipeline/artifact-reader.js';
import { RunJournal } from '../pipeline/run-journal.js';
import {
  BatchPlanner,
  type BatchPlannerConfig,
} from '../planning/batch-planner.js';
import {
  buildExcludeFilter,
  excludeFilterToRecord,
} from '../planning/exclude-filter.js';
import type { Batch, ExcludeFilter } from '../planning/types.js';
import type { ProcessOutcome, ProcessRunner } from '../process/types.js';
import type { RunLock } from '../store/run-lock.js';
import type {
  BatchOutcome,
  CollectedItem,
  EntityRecord,
  ProgressStore,
} from '../store/types.js';
import type { FollowerLookup } from './follower-lookup.js';
import { classifyOutcome } from './outcome-classifier.js';
import type {
  CollectionRequest,
  CrawlerInvocation,
  DelayRange,
  FreshRequest,
  RunSummary,
} from './types.js';

const log = createLogger('orchestrator');

type CollectionOrchestratorDeps = {
  store: ProgressStore;
  patcher: ConfigPatcher;
  runner: ProcessRunner;
  lock: RunLock;
  reader: ArtifactReader;
  crawler: CrawlerInvocation;
  planning: BatchPlannerConfig;
  outputRoot: string;
  journalDir?: string;
  followerLookup?: FollowerLookup;
  diagnostics?: DiagnosticSnapshotWriter;
  interBatchDelayMs?: DelayRange;
  clock?: () => number;
  random?: () => number;
  wait?: (ms: number) => Promise<unknown>;
  createRunId?: () => string;
};

type Selection = {
  entities: EntityRecord[];
  skipped: number;
};

type BatchResult = {
  outcome: BatchOutcome;
  itemsAdded: number;
  finalStatuses: EntityRecord['status'][];
  halted: boolean;
};

function defaultRunId(): string {
  const stamp = new Date().toISOString().replace(/[-:]/g, '').replace(/\..+$/, '');
  return `${stamp}-${randomUUID().slice(0, 8)}`;
}

/**
 * Items to keep for one entity: its own, not stored yet, no repeats, at most
 * `ceiling` of them.
 */
export function selectIngestible(
  items: readonly CollectedItem[],
  entityId: string,
  knownIds: ReadonlySet<string>,
  ceiling: number,
): CollectedItem[] {
  const seen = new Set<string>();
  const selected: CollectedItem[] = [];

  for (const item of items) {
    if (selected.length >= ceiling) {
      break;
    }
    if (item.entityId !== entityId || knownIds.has(item.id) || seen.has(item.id)) {
      continue;
    }
    seen.add(item.id);
    selected.push(item);
  }

  return selected;
}

export function buildBatchMutations(
  crawler: CrawlerInvocation,
  batch: Batch,
  exclusions: ExcludeFilter,
  outputDir: string,
): ConfigMutation[] {
  const { fields, modes } = crawler;
  const mutations: ConfigMutation[] = [
    { field: fields.entityIds, value: batch.entities.map((entity) => entity.id) },
  ];

  if (fields.runMode) {
    mutations.push({ field: fields.runMode, value: modes.collect });
  }
  if (fields.itemCeiling) {
    mutations.push({ field: fields.itemCeiling, value: batch.maxCeiling });
  }
  if (fields.itemCeilings) {
    mutations.push({
      field: fields.itemCeilings,
      value: Object.fromEntries(batch.ceilings),
    });
  }
  if (fields.exclusions) {
    mutations.push({
      field: fields.exclusions,
      value: excludeFilterToRecord(exclusions),
    });
  }
  if (fields.outputDir) {
    mutations.push({ field: fields.outputDir, value: outputDir });
  }

  return mutations;
}

/**
 * Drives the crawler over batches of entities, one batch at a time, and
 * records what each batch produced. Entity-scoped failures are recorded and
 * the run moves on; a configuration that cannot be restored halts it.
 */
export class CollectionOrchestrator {
  private readonly deps: CollectionOrchestratorDeps;
  private readonly clock: () => number;

  constructor(deps: CollectionOrchestratorDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? Date.now;
  }

  async run(request: CollectionRequest): Promise<RunSummary> {
    const runId = (this.deps.createRunId ?? defaultRunId)();
    const startedAt = this.clock();
    const metrics = new BatchMetrics();
    const runLog = log.child({ runId });

    const summary: RunSummary = {
      runId,
      mode: request.mode,
      batches: 0,
      entities: 0,
      skipped: 0,
      itemsAdded: 0,
      statusCounts: { completed: 0, partial: 0, failed: 0 },
      halted: false,
      integrityWarning: null,
      journalPath: null,
      durationMs: 0,
    };

    this.deps.lock.acquire(runId);
    let journal: RunJournal | undefined;

    try {
      try {
        if (this.deps.patcher.recoverStale()) {
          runLog.warn('Restored crawler configuration left patched by an earlier run');
        }
      } catch (error) {
        if (error instanceof ConfigRestoreError) {
          return this.halt(summary, error, runLog);
        }
        throw error;
      }

      let selection: Selection;
      try {
        selection = await this.select(request, runId);
      } catch (error) {
        if (error instanceof ConfigRestoreError) {
          return this.halt(summary, error, runLog);
        }
        throw error;
      }

      summary.entities = selection.entities.length;
      summary.skipped = selection.skipped;

      const planner = new BatchPlanner({
        ...this.deps.planning,
        batchSize: request.batchSize ?? this.deps.planning.batchSize,
      });
      const plan = planner.plan(selection.entities);

      runLog.info('Collection run planned', {
        mode: request.mode,
        entities: plan.entityCount,
        skipped: selection.skipped,
        batches: plan.batches.length,
        totalTimeoutSeconds: plan.totalTimeoutSeconds,
      });

      if (plan.batches.length === 0) {
        return summary;
      }

      if (this.deps.journalDir) {
        const journalPath = join(this.deps.journalDir, `${runId}.jsonl`);
        journal = new RunJournal(journalPath);
        journal.initialize();
        summary.journalPath = journalPath;
      }
      this.deps.diagnostics?.initialize();

      for (const batch of plan.batches) {
        if (batch.index > 0) {
          await this.pauseBetweenBatches();
        }

        const batchStartedAt = this.clock();
        const result = await this.runBatch(runId, batch, journal);
        const durationMs = this.clock() - batchStartedAt;

        summary.batches += 1;
        summary.itemsAdded += result.itemsAdded;
        for (const status of result.finalStatuses) {
          if (status === 'completed' || status === 'partial' || status === 'failed') {
            summary.statusCounts[status] += 1;
          }
        }

        metrics.recordBatch({
          index: batch.index,
          outcome: result.outcome.kind,
          entities: batch.entities.length,
          itemsAdded: result.itemsAdded,
          durationMs,
        });

        if (result.halted) {
          summary.halted = true;
          summary.integrityWarning =
            result.outcome.kind === 'clean' ? null : result.outcome.error.message;
          runLog.error('Run halted: crawler configuration could not be restored', {
            batch: batch.index + 1,
            snapshotRetained: true,
          });
          break;
        }
      }

      return summary;
    } finally {
      try {
        journal?.finalize();
        summary.durationMs = this.clock() - startedAt;
        metrics.log(runLog, { runDurationMs: summary.durationMs });
      } finally {
        this.deps.lock.release();
      }
    }
  }

  private halt(
    summary: RunSummary,
    error: ConfigRestoreError,
    runLog: Logger,
  ): RunSummary {
    summary.halted = true;
    summary.integrityWarning = error.message;
    runLog.error('Run halted before any batch: crawler configuration is not restorable', {
      error: error.message,
    });
    return summary;
  }

  private async select(request: CollectionRequest, runId: string): Promise<Selection> {
    const { store } = this.deps;
    const limit = request.limit ?? Number.POSITIVE_INFINITY;

    if (request.mode === 'resume') {
      return {
        entities: store.resumableEntities(limit, {
          includeFailed: request.includeFailed,
        }),
        skipped: 0,
      };
    }

    let candidates = store.listEntities('not_started', { tag: request.tag });
    let skipped = 0;

    if (request.minFollowers !== undefined) {
      const filtered = await this.filterByFollowers(candidates, request, runId);
      skipped = candidates.length - filtered.length;
      candidates = filtered;
    }

    candidates = candidates.slice(0, Math.max(0, limit));

    if (request.itemsTarget !== undefined && candidates.length > 0) {
      const ids = candidates.map((entity) => entity.id);
      store.setItemsTarget(ids, request.itemsTarget);
      candidates = ids.flatMap((id) => {
        const entity = store.getEntity(id);
        return entity ? [entity] : [];
      });
    }

    return { entities: candidates, skipped };
  }

  private async filterByFollowers(
    candidates: EntityRecord[],
    request: FreshRequest,
    runId: string,
  ): Promise<EntityRecord[]> {
    const minFollowers = request.minFollowers ?? 0;
    const unknown = candidates
      .filter((entity) => entity.followers === null)
      .map((entity) => entity.id);

    const resolved = new Map<string, number>();
    if (unknown.length > 0 && this.deps.followerLookup) {
      const found = await this.deps.followerLookup.lookup(unknown, { runId });
      for (const [entityId, followers] of found) {
        this.deps.store.updateFollowers(entityId, followers);
        resolved.set(entityId, followers);
      }
    }

    return candidates.filter((entity) => {
      const followers = entity.followers ?? resolved.get(entity.id);
      if (followers === undefined) {
        log.debug('Skipping entity with unknown followers', { entityId: entity.id });
        return false;
      }
      return followers >= minFollowers;
    });
  }

  private async runBatch(
    runId: string,
    batch: Batch,
    journal: RunJournal | undefined,
  ): Promise<BatchResult> {
    const { store, patcher, runner, crawler } = this.deps;
    const entityIds = batch.entities.map((entity) => entity.id);
    const batchLog = log.child({ runId, batch: batch.index + 1 });
    const startedAt = this.clock();

    store.markInProgress(entityIds);

    const knownIds = new Map<string, Set<string>>();
    for (const entityId of entityIds) {
      knownIds.set(entityId, store.collectedItemIds(entityId));
    }
    const exclusions = buildExcludeFilter(
      batch.entities,
      (entityId) => knownIds.get(entityId) ?? new Set<string>(),
    );

    const outputDir = join(this.deps.outputRoot, runId, `batch-${batch.index + 1}`);
    mkdirSync(outputDir, { recursive: true });

    batchLog.info('Starting batch', {
      entities: entityIds,
      maxCeiling: batch.maxCeiling,
      timeoutSeconds: batch.timeoutSeconds,
      excluded: exclusions.size,
    });

    let processOutcome: ProcessOutcome;
    try {
      processOutcome = await patcher.withPatchedConfig(
        buildBatchMutations(crawler, batch, exclusions, outputDir),
        () =>
          runner.run(crawler.command, batch.timeoutSeconds * 1000, {
            onLine: (line, stream) => batchLog.debug(line, { stream }),
          }),
      );
    } catch (error) {
      if (error instanceof ConfigMutationError) {
        throw error;
      }

      let halted = true;
      let failure: CollectorError;
      if (error instanceof ConfigRestoreError) {
        failure = error;
      } else {
        halted = false;
        failure = new ExternalProcessCrash(null, errorMessage(error), {
          runId,
          batch: batch.index + 1,
          entityIds,
        });
        batchLog.error('Crawler could not be run for this batch', { error: failure.message });
      }

      const outcome: BatchOutcome = { kind: 'crash', error: failure };

      const finalStatuses = entityIds.map(
        (entityId) => store.recordResult(entityId, { items: [], outcome }).entity.status,
      );
      this.journal(journal, runId, batch, outcome, null, 0, this.clock() - startedAt);
      return { outcome, itemsAdded: 0, finalStatuses, halted };
    }

    let items: CollectedItem[] = [];
    let artifactError: CollectorError | undefined;
    try {
      const result = this.deps.reader.read(outputDir);
      items = result.items;
      if (result.problems.length > 0) {
        batchLog.warn('Crawler output had unusable records', {
          problems: result.problems.length,
        });
      }
    } catch (error) {
      if (!(error instanceof OutputParseError)) {
        throw error;
      }
      artifactError = error;
    }

    const outcome = classifyOutcome({
      process: processOutcome,
      timeoutSeconds: batch.timeoutSeconds,
      artifactError,
      context: { runId, batch: batch.index + 1, entityIds },
    });

    let itemsAdded = 0;
    const finalStatuses: EntityRecord['status'][] = [];
    for (const entityId of entityIds) {
      const ceiling = batch.ceilings.get(entityId) ?? 0;
      const accepted = selectIngestible(
        items,
        entityId,
        knownIds.get(entityId) ?? new Set<string>(),
        ceiling,
      );
      const recorded = store.recordResult(entityId, { items: accepted, outcome });
      itemsAdded += recorded.added;
      finalStatuses.push(recorded.entity.status);
    }

    const durationMs = this.clock() - startedAt;

    if (outcome.kind === 'clean') {
      batchLog.info('Batch finished', { itemsAdded, durationMs });
    } else {
      batchLog.warn('Batch finished with problems', {
        outcome: outcome.kind,
        error: outcome.error.message,
        itemsAdded,
      });
      this.deps.diagnostics?.write(
        {
          runId,
          batchIndex: batch.index,
          entityIds,
          outcome: outcome.kind,
          message: outcome.error.message,
          exitCode: processOutcome.exitCode,
          signal: processOutcome.signal,
          timedOut: processOutcome.timedOut,
          timeoutSeconds: batch.timeoutSeconds,
          timestamp: this.clock(),
        },
        processOutcome.truncatedOutput,
      );
    }

    this.journal(
      journal,
      runId,
      batch,
      outcome,
      processOutcome.exitCode,
      itemsAdded,
      durationMs,
    );

    return { outcome, itemsAdded, finalStatuses, halted: false };
  }

  private journal(
    journal: RunJournal | undefined,
    runId: string,
    batch: Batch,
    outcome: BatchOutcome,
    exitCode: number | null,
    itemsAdded: number,
    durationMs: number,
  ): void {
    if (!journal) {
      return;
    }

    try {
      journal.append({
        runId,
        batchIndex: batch.index,
        entityIds: batch.entities.map((entity) => entity.id),
        ceilings: Object.fromEntries(batch.ceilings),
        timeoutSeconds: batch.timeoutSeconds,
        outcome: outcome.kind,
        message: outcome.kind === 'clean' ? null : outcome.error.message,
        exitCode,
        itemsAdded,
        durationMs,
        timestamp: this.clock(),
      });
    } catch (error) {
      log.warn('Could not append to run journal', { error: errorMessage(error) });
    }
  }

  private async pauseBetweenBatches(): Promise<void> {
    const range = this.deps.interBatchDelayMs;
    if (!range || range.max <= 0) {
      return;
    }

    const random = this.deps.random ?? Math.random;
    const delay = Math.round(range.min + random() * (range.max - range.min));
    if (delay <= 0) {
      return;
    }

    log.debug('Pausing between batches', { delayMs: delay });
    await (this.deps.wait ?? sleep)(delay);
  }
}

export type { CollectionOrchestratorDeps };
