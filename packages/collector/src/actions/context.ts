import { ConfigPatcher } from '../config-patcher/config-patcher.js';
import {
  loadSettings,
  resolveSettingsPath,
  type ResolvedSettings,
} from '../config/settings.js';
import { DiagnosticSnapshotWriter } from '../observability/diagnostic-snapshot.js';
import { CollectionOrchestrator } from '../orchestrator/collection-orchestrator.js';
import { CrawlerFollowerLookup } from '../orchestrator/follower-lookup.js';
import type { CrawlerInvocation } from '../orchestrator/types.js';
import { ArtifactReader } from '../pipeline/artifact-reader.js';
import { SpawnProcessRunner } from '../process/process-runner.js';
import type { ProcessRunner } from '../process/types.js';
import { JsonProgressStore } from '../store/progress-store.js';
import { RunLock } from '../store/run-lock.js';
import type { ProgressStore } from '../store/types.js';

type CollectorContext = {
  settings: ResolvedSettings;
  store: ProgressStore;
  lock: RunLock;
  patcher: ConfigPatcher;
  orchestrator: CollectionOrchestrator;
};

type ContextOverrides = {
  runner?: ProcessRunner;
};

export function crawlerInvocation(settings: ResolvedSettings): CrawlerInvocation {
  return {
    command: {
      executable: settings.crawler.command,
      args: settings.crawler.args,
      cwd: settings.crawler.cwd,
      env: settings.crawler.env,
    },
    fields: settings.crawler.fields,
    modes: settings.crawler.modes,
  };
}

export function createCollectorContext(
  settings: ResolvedSettings,
  overrides?: ContextOverrides,
): CollectorContext {
  const store = new JsonProgressStore(settings.storePath, {
    defaultItemsTarget: settings.defaultItemsTarget,
  });
  const lock = new RunLock(settings.lockPath);
  const patcher = new ConfigPatcher({
    artifactPath: settings.crawler.configPath,
    snapshotPath: settings.snapshotPath,
    literals: settings.crawler.literals,
  });
  const runner =
    overrides?.runner ??
    new SpawnProcessRunner({
      killGraceMs: settings.killGraceMs,
      drainGraceMs: settings.drainGraceMs,
      outputTailChars: settings.outputTailChars,
    });
  const crawler = crawlerInvocation(settings);

  const orchestrator = new CollectionOrchestrator({
    store,
    patcher,
    runner,
    lock,
    crawler,
    reader: new ArtifactReader({
      pattern: settings.artifactPattern,
      itemUrlTemplate: settings.itemUrlTemplate,
    }),
    planning: {
      batchSize: settings.batchSize,
      timeout: settings.timeout,
    },
    outputRoot: settings.outputRoot,
    journalDir: settings.journalDir,
    followerLookup: new CrawlerFollowerLookup({
      patcher,
      runner,
      crawler,
      outputRoot: settings.outputRoot,
      artifactPattern: settings.profileArtifactPattern,
      timeoutSeconds: settings.profileTimeoutSeconds,
    }),
    diagnostics: new DiagnosticSnapshotWriter({
      directory: settings.diagnosticsDir,
      maxSnapshots: settings.maxDiagnostics,
    }),
    interBatchDelayMs: settings.interBatchDelayMs,
  });

  return { settings, store, lock, patcher, orchestrator };
}

export function loadCollectorContext(configPath?: string): CollectorContext {
  return createCollectorContext(loadSettings(resolveSettingsPath(configPath)));
}

/**
 * Runs an administrative store mutation under the run lock so it cannot
 * interleave with a collection run.
 */
export function withRunLock<T>(lock: RunLock, label: string, action: () => T): T {
  lock.acquire(label);
  try {
    return action();
  } finally {
    lock.release();
  }
}

export type { CollectorContext, ContextOverrides };
