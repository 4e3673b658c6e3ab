import { z } from 'zod';
import { MAX_BATCH_SIZE } from '../planning/batch-planner.js';
import type { CollectionRequest, RunSummary } from '../orchestrator/types.js';
import { loadCollectorContext, type CollectorContext } from './context.js';
import {
  commonOptionsSchema,
  flagOption,
  integerOption,
  textOption,
} from './options.js';
import { printResult, reportFailure } from './report.js';

const batchSizeOption = () =>
  integerOption('batchSize', 1).refine(
    (value) => value === undefined || value <= MAX_BATCH_SIZE,
    `Invalid --batchSize. Provide an integer between 1 and ${MAX_BATCH_SIZE}.`,
  );

const collectArgsSchema = z.object({
  limit: integerOption('limit', 1),
  tag: textOption('tag'),
  minFollowers: integerOption('minFollowers', 0),
  target: integerOption('target', 1),
  batchSize: batchSizeOption(),
  ...commonOptionsSchema.shape,
});

const resumeArgsSchema = z.object({
  limit: integerOption('limit', 1),
  includeFailed: flagOption(),
  batchSize: batchSizeOption(),
  ...commonOptionsSchema.shape,
});

type CollectArgs = z.infer<typeof collectArgsSchema>;
type ResumeArgs = z.infer<typeof resumeArgsSchema>;

export function exitCodeFor(summary: RunSummary): number {
  return summary.halted ? 2 : 0;
}

export function collectRequestFromArgs(args: CollectArgs): CollectionRequest {
  return {
    mode: 'fresh',
    limit: args.limit,
    tag: args.tag,
    minFollowers: args.minFollowers,
    itemsTarget: args.target,
    batchSize: args.batchSize,
  };
}

export function resumeRequestFromArgs(args: ResumeArgs): CollectionRequest {
  return {
    mode: 'resume',
    limit: args.limit,
    includeFailed: args.includeFailed,
    batchSize: args.batchSize,
  };
}

export async function runCollection(
  context: CollectorContext,
  request: CollectionRequest,
  pretty: boolean,
): Promise<number> {
  const summary = await context.orchestrator.run(request);
  printResult(summary, pretty);

  if (summary.halted) {
    console.error(
      `Run halted: ${summary.integrityWarning ?? 'crawler configuration could not be restored'}. ` +
        'Repair the crawler configuration, then run restore-config.',
    );
  }

  return exitCodeFor(summary);
}

export async function runCollectAction(args: CollectArgs): Promise<number> {
  try {
    const context = loadCollectorContext(args.config);
    return await runCollection(context, collectRequestFromArgs(args), args.pretty);
  } catch (error) {
    return reportFailure('collect', error);
  }
}

export async function runResumeAction(args: ResumeArgs): Promise<number> {
  try {
    const context = loadCollectorContext(args.config);
    return await runCollection(context, resumeRequestFromArgs(args), args.pretty);
  } catch (error) {
    return reportFailure('resume', error);
  }
}

export { collectArgsSchema, resumeArgsSchema };
export type { CollectArgs, ResumeArgs };
