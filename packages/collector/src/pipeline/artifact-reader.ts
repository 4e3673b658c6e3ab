import { existsSync, readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { createLogger } from '@workspace/logger';
import { OutputParseError, errorMessage } from '../errors.js';
import type { CollectedItem } from '../store/types.js';
import { parseRawItem } from './item-normalizer.js';

const log = createLogger('artifact-reader');

type ArtifactReaderConfig = {
  pattern: string;
  itemUrlTemplate?: string;
  clock?: () => number;
};

type ArtifactProblem = {
  file: string;
  message: string;
};

type ArtifactReadResult = {
  files: string[];
  items: CollectedItem[];
  problems: ArtifactProblem[];
};

export function patternToRegExp(pattern: string): RegExp {
  const escaped = pattern
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${escaped}$`);
}

export function listArtifacts(directory: string, pattern: string): string[] {
  if (!existsSync(directory)) {
    return [];
  }

  const matcher = patternToRegExp(pattern);
  return readdirSync(directory)
    .filter((file) => matcher.test(file))
    .sort()
    .map((file) => join(directory, file));
}

export function readJsonArray(file: string): unknown[] {
  const parsed: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  if (!Array.isArray(parsed)) {
    throw new Error('expected a JSON array of records');
  }
  return parsed;
}

/**
 * Reads the result files the crawler left in a batch output directory.
 * Bad records and bad files are reported and skipped; a directory with no
 * usable file at all raises OutputParseError.
 */
export class ArtifactReader {
  private readonly config: ArtifactReaderConfig;

  constructor(config: ArtifactReaderConfig) {
    this.config = config;
  }

  read(directory: string): ArtifactReadResult {
    const files = listArtifacts(directory, this.config.pattern);
    if (files.length === 0) {
      throw new OutputParseError(
        `No crawler output matching ${this.config.pattern} in ${directory}`,
        { directory, pattern: this.config.pattern },
      );
    }

    const collectedAt = (this.config.clock ?? Date.now)();
    const items: CollectedItem[] = [];
    const problems: ArtifactProblem[] = [];
    let usableFiles = 0;

    for (const file of files) {
      let records: unknown[];
      try {
        records = readJsonArray(file);
      } catch (error) {
        problems.push({ file, message: errorMessage(error) });
        log.warn('Skipping unreadable crawler output', {
          file,
          error: errorMessage(error),
        });
        continue;
      }

      usableFiles += 1;
      for (const [index, record] of records.entries()) {
        const parsed = parseRawItem(record, {
          itemUrlTemplate: this.config.itemUrlTemplate,
          collectedAt,
        });

        if (parsed.success) {
          items.push(parsed.item);
        } else {
          problems.push({ file, message: `record ${index}: ${parsed.error}` });
        }
      }
    }

    if (usableFiles === 0) {
      throw new OutputParseError(
        `All ${files.length} crawler output file(s) in ${directory} are malformed`,
        { directory, problems },
      );
    }

    return { files, items, problems };
  }
}

export type { ArtifactProblem, ArtifactReadResult, ArtifactReaderConfig };
