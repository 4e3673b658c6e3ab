import {
  appendFileSync,
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  writeFileSync,
} from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import type { JournalEntry } from './types.js';

const journalEntrySchema = z.object({
  runId: z.string(),
  batchIndex: z.number(),
  entityIds: z.array(z.string()),
  ceilings: z.record(z.string(), z.number()),
  timeoutSeconds: z.number(),
  outcome: z.enum(['clean', 'timeout', 'output-error', 'crash']),
  message: z.string().nullable(),
  exitCode: z.number().nullable(),
  itemsAdded: z.number(),
  durationMs: z.number(),
  timestamp: z.number(),
});

/**
 * Append-only JSONL record of the batches of one run. Lines go to a `.tmp`
 * file while the run is live; `finalize` renames it into place.
 */
export class RunJournal {
  private readonly outputPath: string;
  private readonly tmpPath: string;

  constructor(outputPath: string) {
    this.outputPath = outputPath;
    this.tmpPath = `${outputPath}.tmp`;
  }

  initialize(): void {
    const dir = dirname(this.tmpPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    if (!existsSync(this.tmpPath)) {
      writeFileSync(this.tmpPath, '', 'utf-8');
    }
  }

  append(entry: JournalEntry): void {
    appendFileSync(this.tmpPath, JSON.stringify(entry) + '\n', 'utf-8');
  }

  finalize(): void {
    if (existsSync(this.tmpPath)) {
      renameSync(this.tmpPath, this.outputPath);
    }
  }

  readAll(): JournalEntry[] {
    return this.readEntries();
  }

  isFinalized(): boolean {
    return !existsSync(this.tmpPath) && existsSync(this.outputPath);
  }

  private readEntries(): JournalEntry[] {
    const filePath = existsSync(this.tmpPath) ? this.tmpPath : this.outputPath;

    if (!existsSync(filePath)) {
      return [];
    }

    const content = readFileSync(filePath, 'utf-8').trim();
    if (!content) {
      return [];
    }

    const entries: JournalEntry[] = [];
    for (const line of content.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed) {
        continue;
      }

      let raw: unknown;
      try {
        raw = JSON.parse(trimmed);
      } catch {
        // torn final line from an interrupted append
        continue;
      }

      const parsed = journalEntrySchema.safeParse(raw);
      if (parsed.success) {
        entries.push(parsed.data);
      }
    }

    return entries;
  }
}
