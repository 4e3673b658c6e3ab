import type { ProcessCommand } from '../process/types.js';

type CrawlerFields = {
  runMode?: string;
  entityIds: string;
  itemCeiling?: string;
  itemCeilings?: string;
  exclusions?: string;
  outputDir?: string;
};

type CrawlerModes = {
  collect: string;
  profile: string;
};

/**
 * How to launch the crawler and which configuration fields carry its inputs.
 */
type CrawlerInvocation = {
  command: ProcessCommand;
  fields: CrawlerFields;
  modes: CrawlerModes;
};

type FreshRequest = {
  mode: 'fresh';
  limit?: number;
  tag?: string;
  minFollowers?: number;
  itemsTarget?: number;
  batchSize?: number;
};

type ResumeRequest = {
  mode: 'resume';
  limit?: number;
  includeFailed?: boolean;
  batchSize?: number;
};

type CollectionRequest = FreshRequest | ResumeRequest;

type RunSummary = {
  runId: string;
  mode: CollectionRequest['mode'];
  batches: number;
  entities: number;
  skipped: number;
  itemsAdded: number;
  statusCounts: {
    completed: number;
    partial: number;
    failed: number;
  };
  halted: boolean;
  integrityWarning: string | null;
  journalPath: string | null;
  durationMs: number;
};

type DelayRange = {
  min: number;
  max: number;
};

export type {
  CollectionRequest,
  CrawlerFields,
  CrawlerInvocation,
  CrawlerModes,
  DelayRange,
  FreshRequest,
  ResumeRequest,
  RunSummary,
};
