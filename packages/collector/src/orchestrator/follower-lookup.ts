import { mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { createLogger } from '@workspace/logger';
import { z } from 'zod';
import type { ConfigPatcher } from '../config-patcher/config-patcher.js';
import type { ConfigMutation } from '../config-patcher/types.js';
import { errorMessage } from '../errors.js';
import { listArtifacts, readJsonArray } from '../pipeline/artifact-reader.js';
import { parseCount } from '../pipeline/item-normalizer.js';
import type { ProcessRunner } from '../process/types.js';
import type { CrawlerInvocation } from './types.js';

const log = createLogger('follower-lookup');

const rawProfileSchema = z
  .object({
    user_id: z.string().min(1),
    fans: z.union([z.string(), z.number()]),
  })
  .passthrough();

type LookupContext = {
  runId: string;
};

/**
 * Resolves follower counts for entities the store has none for.
 * Ids the lookup cannot resolve are absent from the result.
 */
interface FollowerLookup {
  lookup(
    entityIds: readonly string[],
    context: LookupContext,
  ): Promise<Map<string, number>>;
}

type CrawlerFollowerLookupConfig = {
  patcher: ConfigPatcher;
  runner: ProcessRunner;
  crawler: CrawlerInvocation;
  outputRoot: string;
  artifactPattern: string;
  timeoutSeconds: number;
};

export function readProfiles(
  directory: string,
  pattern: string,
  wanted: ReadonlySet<string>,
): Map<string, number> {
  const followers = new Map<string, number>();

  for (const file of listArtifacts(directory, pattern)) {
    let records: unknown[];
    try {
      records = readJsonArray(file);
    } catch (error) {
      log.warn('Skipping unreadable profile output', {
        file,
        error: errorMessage(error),
      });
      continue;
    }

    for (const record of records) {
      const parsed = rawProfileSchema.safeParse(record);
      if (parsed.success && wanted.has(parsed.data.user_id)) {
        followers.set(parsed.data.user_id, parseCount(parsed.data.fans));
      }
    }
  }

  return followers;
}

/**
 * One preliminary crawler call in profile mode, under the same
 * patch-and-restore discipline as a collection batch.
 */
export class CrawlerFollowerLookup implements FollowerLookup {
  private readonly config: CrawlerFollowerLookupConfig;

  constructor(config: CrawlerFollowerLookupConfig) {
    this.config = config;
  }

  async lookup(
    entityIds: readonly string[],
    context: LookupContext,
  ): Promise<Map<string, number>> {
    if (entityIds.length === 0) {
      return new Map();
    }

    const { crawler, patcher, runner } = this.config;
    const outputDir = join(this.config.outputRoot, context.runId, 'profiles');
    mkdirSync(outputDir, { recursive: true });

    const mutations: ConfigMutation[] = [
      { field: crawler.fields.entityIds, value: [...entityIds] },
    ];
    if (crawler.fields.runMode) {
      mutations.push({ field: crawler.fields.runMode, value: crawler.modes.profile });
    }
    if (crawler.fields.outputDir) {
      mutations.push({ field: crawler.fields.outputDir, value: outputDir });
    }

    log.info('Looking up follower counts', { entities: entityIds.length });

    const outcome = await patcher.withPatchedConfig(mutations, () =>
      runner.run(crawler.command, this.config.timeoutSeconds * 1000, {
        onLine: (line, stream) => log.debug(line, { stream, runId: context.runId }),
      }),
    );

    if (outcome.timedOut || outcome.exitCode !== 0) {
      log.warn('Profile lookup did not finish cleanly', {
        exitCode: outcome.exitCode,
        timedOut: outcome.timedOut,
        spawnError: outcome.spawnError,
      });
    }

    const followers = readProfiles(
      outputDir,
      this.config.artifactPattern,
      new Set(entityIds),
    );

    log.debug('Follower lookup finished', {
      requested: entityIds.length,
      resolved: followers.size,
    });

    return followers;
  }
}

export type { CrawlerFollowerLookupConfig, FollowerLookup, LookupContext };
