import type { BatchOutcome } from '../store/types.js';

type JournalEntry = {
  runId: string;
  batchIndex: number;
  entityIds: string[];
  ceilings: Record<string, number>;
  timeoutSeconds: number;
  outcome: BatchOutcome['kind'];
  message: string | null;
  exitCode: number | null;
  itemsAdded: number;
  durationMs: number;
  timestamp: number;
};

export type { JournalEntry };
