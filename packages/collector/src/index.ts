export { ConfigPatcher } from './config-patcher/config-patcher.js';
export {
  DEFAULT_LITERALS,
  applyMutations,
  renderValue,
  substituteField,
} from './config-patcher/field-substitution.js';
export type {
  ConfigMutation,
  ConfigSnapshot,
  ConfigValue,
  LiteralStyle,
  PatchHandle,
} from './config-patcher/types.js';
export { loadSettings, parseSettings, resolveSettingsPath } from './config/settings.js';
export type { ResolvedSettings, Settings, SettingsInput } from './config/settings.js';
export * from './errors.js';
export { BatchMetrics } from './observability/metrics.js';
export { DiagnosticSnapshotWriter } from './observability/diagnostic-snapshot.js';
export { CollectionOrchestrator } from './orchestrator/collection-orchestrator.js';
export type { CollectionOrchestratorDeps } from './orchestrator/collection-orchestrator.js';
export { CrawlerFollowerLookup } from './orchestrator/follower-lookup.js';
export type { FollowerLookup } from './orchestrator/follower-lookup.js';
export { classifyOutcome } from './orchestrator/outcome-classifier.js';
export type {
  CollectionRequest,
  CrawlerInvocation,
  RunSummary,
} from './orchestrator/types.js';
export { ArtifactReader } from './pipeline/artifact-reader.js';
export { normalizeItem, parseCount } from './pipeline/item-normalizer.js';
export { RunJournal } from './pipeline/run-journal.js';
export type { JournalEntry } from './pipeline/types.js';
export { BatchPlanner, DEFAULT_TIMEOUT_MODEL, MAX_BATCH_SIZE } from './planning/batch-planner.js';
export { buildExcludeFilter } from './planning/exclude-filter.js';
export type { Batch, RunPlan, TimeoutModel } from './planning/types.js';
export { SpawnProcessRunner } from './process/process-runner.js';
export type { ProcessCommand, ProcessOutcome, ProcessRunner } from './process/types.js';
export { JsonProgressStore } from './store/progress-store.js';
export { RunLock } from './store/run-lock.js';
export { ENTITY_STATUSES } from './store/types.js';
export type {
  BatchOutcome,
  CollectedItem,
  EntityRecord,
  EntityStatus,
  ProgressStore,
} from './store/types.js';
export { createCollectorContext } from './actions/context.js';
