import { createHash, randomUUID } from 'node:crypto';
import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { createLogger } from '@workspace/logger';
import {
  ConfigMutationError,
  ConfigRestoreError,
  errorMessage,
} from '../errors.js';
import { DEFAULT_LITERALS, applyMutations } from './field-substitution.js';
import type {
  ConfigMutation,
  ConfigSnapshot,
  LiteralStyle,
  PatchHandle,
} from './types.js';

const log = createLogger('config-patcher');

const snapshotSchema = z.object({
  id: z.string().min(1),
  artifactPath: z.string().min(1),
  checksum: z.string().regex(/^[0-9a-f]{64}$/),
  takenAt: z.number(),
  content: z.string(),
});

type ConfigPatcherOptions = {
  artifactPath: string;
  snapshotPath: string;
  literals?: Partial<LiteralStyle>;
};

type ActivePatch = {
  handle: PatchHandle;
  original: Buffer;
};

function sha256(content: Buffer): string {
  return createHash('sha256').update(content).digest('hex');
}

function writeAtomic(path: string, content: Buffer | string): void {
  const dir = dirname(path);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const tmpPath = `${path}.${process.pid}.tmp`;
  writeFileSync(tmpPath, content);
  renameSync(tmpPath, path);
}

/**
 * Scoped mutation of the crawler's configuration file.
 *
 * `apply` persists a snapshot of the exact original bytes before touching
 * the file; `restore` writes them back and verifies the checksum. The
 * snapshot file outlives a crash so the next run can repair the artifact
 * with `recoverStale` before anything else happens. Only one patch may be
 * active at a time.
 */
export class ConfigPatcher {
  private readonly artifactPath: string;
  private readonly snapshotPath: string;
  private readonly literals: LiteralStyle;
  private active: ActivePatch | undefined;

  constructor(options: ConfigPatcherOptions) {
    this.artifactPath = options.artifactPath;
    this.snapshotPath = options.snapshotPath;
    this.literals = { ...DEFAULT_LITERALS, ...options.literals };
    this.active = undefined;
  }

  apply(mutations: readonly ConfigMutation[]): PatchHandle {
    if (this.active) {
      throw new ConfigMutationError(
        'A configuration patch is already active; configuration mutation is not reentrant',
        { activeHandle: this.active.handle.id },
      );
    }

    if (existsSync(this.snapshotPath)) {
      throw new ConfigMutationError(
        'A stale configuration snapshot exists; restore it before patching again',
        { snapshotPath: this.snapshotPath },
      );
    }

    let original: Buffer;
    try {
      original = readFileSync(this.artifactPath);
    } catch (error) {
      throw new ConfigMutationError(
        `Cannot read crawler configuration ${this.artifactPath}: ${errorMessage(error)}`,
        { artifactPath: this.artifactPath },
        { cause: error },
      );
    }

    const patched = applyMutations(
      original.toString('utf-8'),
      mutations,
      this.literals,
    );

    const handle: PatchHandle = {
      id: randomUUID(),
      artifactPath: this.artifactPath,
      checksum: sha256(original),
      takenAt: Date.now(),
    };

    const snapshot: ConfigSnapshot = {
      ...handle,
      content: original.toString('base64'),
    };

    try {
      writeAtomic(this.snapshotPath, JSON.stringify(snapshot));
    } catch (error) {
      throw new ConfigMutationError(
        `Cannot write configuration snapshot ${this.snapshotPath}: ${errorMessage(error)}`,
        { snapshotPath: this.snapshotPath },
        { cause: error },
      );
    }

    this.active = { handle, original };

    try {
      writeAtomic(this.artifactPath, patched);
    } catch (error) {
      this.restore(handle);
      throw new ConfigMutationError(
        `Cannot write crawler configuration ${this.artifactPath}: ${errorMessage(error)}`,
        { artifactPath: this.artifactPath },
        { cause: error },
      );
    }

    log.debug('Applied configuration patch', {
      handle: handle.id,
      fields: mutations.map((mutation) => mutation.field),
    });

    return handle;
  }

  restore(handle: PatchHandle): void {
    const active = this.active;
    if (!active || active.handle.id !== handle.id) {
      throw new ConfigRestoreError(
        `Configuration patch ${handle.id} is not active in this patcher`,
        { handle: handle.id },
      );
    }

    // Cleared first: a failed restore leaves the snapshot file on disk, which
    // blocks further patches until recoverStale succeeds.
    this.active = undefined;
    this.writeBack(handle.artifactPath, active.original, handle.checksum);
    this.discardSnapshot();

    log.debug('Restored configuration', { handle: handle.id });
  }

  async withPatchedConfig<T>(
    mutations: readonly ConfigMutation[],
    action: (handle: PatchHandle) => Promise<T>,
  ): Promise<T> {
    const handle = this.apply(mutations);
    try {
      return await action(handle);
    } finally {
      this.restore(handle);
    }
  }

  hasStaleSnapshot(): boolean {
    return !this.active && existsSync(this.snapshotPath);
  }

  /**
   * Restores a snapshot left behind by a run that ended before its restore
   * ran. Returns whether anything was restored.
   */
  recoverStale(): boolean {
    if (!this.hasStaleSnapshot()) {
      return false;
    }

    const snapshot = this.readSnapshot();
    const original = Buffer.from(snapshot.content, 'base64');

    log.warn('Restoring configuration left patched by an interrupted run', {
      artifactPath: snapshot.artifactPath,
      takenAt: new Date(snapshot.takenAt).toISOString(),
    });

    this.writeBack(snapshot.artifactPath, original, snapshot.checksum);
    this.discardSnapshot();
    return true;
  }

  private readSnapshot(): ConfigSnapshot {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.snapshotPath, 'utf-8'));
    } catch (error) {
      throw new ConfigRestoreError(
        `Configuration snapshot ${this.snapshotPath} is unreadable: ${errorMessage(error)}`,
        { snapshotPath: this.snapshotPath },
        { cause: error },
      );
    }

    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigRestoreError(
        `Configuration snapshot ${this.snapshotPath} is malformed`,
        { snapshotPath: this.snapshotPath },
      );
    }

    if (sha256(Buffer.from(parsed.data.content, 'base64')) !== parsed.data.checksum) {
      throw new ConfigRestoreError(
        `Configuration snapshot ${this.snapshotPath} does not match its checksum`,
        { snapshotPath: this.snapshotPath },
      );
    }

    return parsed.data;
  }

  private writeBack(path: string, original: Buffer, checksum: string): void {
    try {
      writeAtomic(path, original);
    } catch (error) {
      throw new ConfigRestoreError(
        `Cannot restore crawler configuration ${path}: ${errorMessage(error)}`,
        { artifactPath: path, snapshotPath: this.snapshotPath },
        { cause: error },
      );
    }

    let restored: Buffer;
    try {
      restored = readFileSync(path);
    } catch (error) {
      throw new ConfigRestoreError(
        `Cannot verify restored configuration ${path}: ${errorMessage(error)}`,
        { artifactPath: path, snapshotPath: this.snapshotPath },
        { cause: error },
      );
    }

    if (sha256(restored) !== checksum) {
      throw new ConfigRestoreError(
        `Restored configuration ${path} differs from its snapshot`,
        { artifactPath: path, snapshotPath: this.snapshotPath },
      );
    }
  }

  private discardSnapshot(): void {
    try {
      rmSync(this.snapshotPath, { force: true });
    } catch (error) {
      // The artifact is already verified; a leftover snapshot only makes
      // the next run restore the same bytes again.
      log.warn('Could not remove configuration snapshot', {
        snapshotPath: this.snapshotPath,
        error: errorMessage(error),
      });
    }
  }
}

export type { ConfigPatcherOptions };
