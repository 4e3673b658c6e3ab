import { resolve } from 'node:path';
import { z } from 'zod';
import { createLogger } from '@workspace/logger';
import { ArtifactReader, type ArtifactProblem } from '../pipeline/artifact-reader.js';
import type { CollectedItem, EntityRecord } from '../store/types.js';
import { loadCollectorContext, withRunLock, type CollectorContext } from './context.js';
import { commonOptionsSchema, textOption } from './options.js';
import { printResult, reportFailure } from './report.js';

const log = createLogger('ingest');

const ingestArgsSchema = z.object({
  dir: z
    .string({ required_error: 'Missing required option: --dir' })
    .trim()
    .min(1, 'Missing required option: --dir'),
  pattern: textOption('pattern'),
  ...commonOptionsSchema.shape,
});

type IngestArgs = z.infer<typeof ingestArgsSchema>;

type IngestedEntity = {
  entityId: string;
  created: boolean;
  added: number;
  status: EntityRecord['status'];
};

type IngestSummary = {
  directory: string;
  files: number;
  itemsAdded: number;
  entities: IngestedEntity[];
  problems: ArtifactProblem[];
};

function groupByEntity(items: readonly CollectedItem[]): Map<string, CollectedItem[]> {
  const grouped = new Map<string, CollectedItem[]>();
  for (const item of items) {
    const group = grouped.get(item.entityId);
    if (group) {
      group.push(item);
    } else {
      grouped.set(item.entityId, [item]);
    }
  }
  return grouped;
}

/**
 * Loads crawler result files that already exist into the store, without
 * launching the crawler. Entities the store does not know yet are added.
 * Entities whose items are all stored already are left untouched.
 */
export function ingestArtifacts(
  context: Pick<CollectorContext, 'store' | 'lock' | 'settings'>,
  directory: string,
  pattern?: string,
): IngestSummary {
  const { store, lock, settings } = context;
  const reader = new ArtifactReader({
    pattern: pattern ?? settings.artifactPattern,
    itemUrlTemplate: settings.itemUrlTemplate,
  });

  return withRunLock(lock, 'ingest', () => {
    const result = reader.read(directory);
    const entities: IngestedEntity[] = [];
    let itemsAdded = 0;

    for (const [entityId, items] of groupByEntity(result.items)) {
      const created = store.getEntity(entityId) === undefined;
      if (created) {
        store.upsertEntity({ id: entityId });
      }

      const knownIds = store.collectedItemIds(entityId);
      const fresh = items.filter((item) => !knownIds.has(item.id));
      if (fresh.length === 0) {
        const entity = store.getEntity(entityId);
        entities.push({
          entityId,
          created,
          added: 0,
          status: entity?.status ?? 'not_started',
        });
        continue;
      }

      const recorded = store.recordResult(entityId, {
        items: fresh,
        outcome: { kind: 'clean' },
      });
      itemsAdded += recorded.added;
      entities.push({
        entityId,
        created,
        added: recorded.added,
        status: recorded.entity.status,
      });
    }

    log.info('Ingested existing crawler output', {
      directory,
      files: result.files.length,
      entities: entities.length,
      itemsAdded,
      problems: result.problems.length,
    });

    return {
      directory,
      files: result.files.length,
      itemsAdded,
      entities,
      problems: result.problems,
    };
  });
}

export function runIngestAction(args: IngestArgs): number {
  try {
    const context = loadCollectorContext(args.config);
    printResult(ingestArtifacts(context, resolve(args.dir), args.pattern), args.pretty);
    return 0;
  } catch (error) {
    return reportFailure('ingest', error);
  }
}

export { ingestArgsSchema };
export type { IngestArgs, IngestSummary };
