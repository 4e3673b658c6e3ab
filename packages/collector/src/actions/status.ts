import { existsSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import { RunJournal } from '../pipeline/run-journal.js';
import { ENTITY_STATUSES, type EntityStatus } from '../store/types.js';
import { loadCollectorContext, type CollectorContext } from './context.js';
import { commonOptionsSchema, listOption, requiredIdOption, textOption } from './options.js';
import { printResult, reportFailure } from './report.js';

const entityStatusSchema = z.enum(ENTITY_STATUSES, {
  errorMap: () => ({
    message: `Invalid --status. Use one or more of: ${ENTITY_STATUSES.join(', ')}.`,
  }),
});

const statusArgsSchema = z.object({
  status: listOption('status').pipe(z.array(entityStatusSchema).optional()),
  tag: textOption('tag'),
  ...commonOptionsSchema.shape,
});

const entityIdArgsSchema = z.object({
  id: requiredIdOption(),
  ...commonOptionsSchema.shape,
});

const runsArgsSchema = z.object({
  id: textOption('id'),
  ...commonOptionsSchema.shape,
});

type StatusArgs = z.infer<typeof statusArgsSchema>;
type EntityIdArgs = z.infer<typeof entityIdArgsSchema>;
type RunsArgs = z.infer<typeof runsArgsSchema>;

export function buildStatusReport(
  context: Pick<CollectorContext, 'store'>,
  filter: { status?: EntityStatus[]; tag?: string },
) {
  const { store } = context;
  const entities = store.listEntities(filter.status, { tag: filter.tag });

  return {
    counts: store.countByStatus(),
    entities: entities.map((entity) => ({
      name: entity.name,
      tags: entity.tags,
      followers: entity.followers,
      ...store.progress(entity.id),
    })),
  };
}

export function listRuns(journalDir: string): string[] {
  if (!existsSync(journalDir)) {
    return [];
  }

  const runIds = new Set<string>();
  for (const file of readdirSync(journalDir)) {
    const match = /^(.+)\.jsonl(?:\.tmp)?$/.exec(file);
    if (match?.[1]) {
      runIds.add(match[1]);
    }
  }

  return [...runIds].sort();
}

export function runStatusAction(args: StatusArgs): number {
  try {
    const context = loadCollectorContext(args.config);
    printResult(
      buildStatusReport(context, { status: args.status, tag: args.tag }),
      args.pretty,
    );
    return 0;
  } catch (error) {
    return reportFailure('status', error);
  }
}

export function runProgressAction(args: EntityIdArgs): number {
  try {
    const { store } = loadCollectorContext(args.config);
    const progress = store.progress(args.id);
    if (!progress) {
      console.error(`Unknown entity: ${args.id}`);
      return 1;
    }

    printResult(progress, args.pretty);
    return 0;
  } catch (error) {
    return reportFailure('progress', error);
  }
}

export function runItemsAction(args: EntityIdArgs): number {
  try {
    const { store } = loadCollectorContext(args.config);
    if (!store.getEntity(args.id)) {
      console.error(`Unknown entity: ${args.id}`);
      return 1;
    }

    printResult(store.collectedItems(args.id), args.pretty);
    return 0;
  } catch (error) {
    return reportFailure('items', error);
  }
}

export function runRunsAction(args: RunsArgs): number {
  try {
    const { settings } = loadCollectorContext(args.config);

    if (!args.id) {
      printResult(listRuns(settings.journalDir), args.pretty);
      return 0;
    }

    const journal = new RunJournal(join(settings.journalDir, `${args.id}.jsonl`));
    const entries = journal.readAll();
    if (entries.length === 0 && !journal.isFinalized()) {
      console.error(`Unknown run: ${args.id}`);
      return 1;
    }

    printResult(entries, args.pretty);
    return 0;
  } catch (error) {
    return reportFailure('runs', error);
  }
}

export { entityIdArgsSchema, runsArgsSchema, statusArgsSchema };
export type { EntityIdArgs, RunsArgs, StatusArgs };
