import { existsSync, readFileSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { z } from 'zod';
import { SettingsError, errorMessage } from '../errors.js';
import { DEFAULT_LITERALS } from '../config-patcher/field-substitution.js';
import { DEFAULT_TIMEOUT_MODEL, MAX_BATCH_SIZE } from '../planning/batch-planner.js';

const DEFAULT_SETTINGS_FILE = 'collector.config.json';

const fieldNameSchema = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_.]*$/, 'Invalid configuration field name');

const crawlerFieldsSchema = z.object({
  runMode: fieldNameSchema.optional(),
  entityIds: fieldNameSchema,
  itemCeiling: fieldNameSchema.optional(),
  itemCeilings: fieldNameSchema.optional(),
  exclusions: fieldNameSchema.optional(),
  outputDir: fieldNameSchema.optional(),
});

const delayRangeSchema = z
  .object({
    min: z.number().int().nonnegative(),
    max: z.number().int().nonnegative(),
  })
  .refine((range) => range.min <= range.max, {
    message: 'interBatchDelayMs.min must not exceed interBatchDelayMs.max',
  });

const settingsSchema = z.object({
  crawler: z.object({
    command: z.string().trim().min(1, 'crawler.command is required'),
    args: z.array(z.string()).default([]),
    cwd: z.string().optional(),
    env: z.record(z.string(), z.string()).default({}),
    configPath: z.string().trim().min(1, 'crawler.configPath is required'),
    fields: crawlerFieldsSchema.default({
      runMode: 'CRAWLER_TYPE',
      entityIds: 'CREATOR_ID_LIST',
      itemCeiling: 'CRAWLER_MAX_NOTES_COUNT',
      itemCeilings: 'CRAWLER_MAX_NOTES_PER_CREATOR',
      exclusions: 'CRAWLER_EXCLUDE_NOTE_IDS',
      outputDir: 'SAVE_DATA_DIR',
    }),
    modes: z
      .object({
        collect: z.string().default('creator'),
        profile: z.string().default('creator_profile'),
      })
      .default({}),
    literals: z
      .object({
        true: z.string().min(1),
        false: z.string().min(1),
        null: z.string().min(1),
      })
      .default(DEFAULT_LITERALS),
  }),
  stateDir: z.string().default('data'),
  outputRoot: z.string().default('data/output'),
  artifactPattern: z.string().min(1).default('creator_contents_*.json'),
  profileArtifactPattern: z.string().min(1).default('creator_profiles_*.json'),
  itemUrlTemplate: z.string().optional(),
  batchSize: z.number().int().min(1).max(MAX_BATCH_SIZE).default(5),
  timeout: z
    .object({
      perItemSeconds: z.number().nonnegative(),
      perEntityOverheadSeconds: z.number().nonnegative(),
      fixedOverheadSeconds: z.number().nonnegative(),
      safetyFactor: z.number().positive(),
      minTimeoutSeconds: z.number().int().positive(),
      maxTimeoutSeconds: z.number().int().positive(),
    })
    .partial()
    .default({}),
  profileTimeoutSeconds: z.number().int().positive().default(
    DEFAULT_TIMEOUT_MODEL.minTimeoutSeconds,
  ),
  defaultItemsTarget: z.number().int().positive().default(100),
  killGraceMs: z.number().int().nonnegative().default(5000),
  drainGraceMs: z.number().int().nonnegative().default(2000),
  outputTailChars: z.number().int().positive().default(8000),
  interBatchDelayMs: delayRangeSchema.default({ min: 0, max: 0 }),
  maxDiagnostics: z.number().int().nonnegative().default(100),
});

type Settings = z.infer<typeof settingsSchema>;
type SettingsInput = z.input<typeof settingsSchema>;

type ResolvedSettings = Settings & {
  settingsPath: string | undefined;
  storePath: string;
  lockPath: string;
  snapshotPath: string;
  journalDir: string;
  diagnosticsDir: string;
};

function resolveFrom(baseDir: string, path: string): string {
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/**
 * Validates raw settings and anchors every relative path at `baseDir`.
 */
export function parseSettings(
  raw: unknown,
  baseDir: string,
  settingsPath?: string,
): ResolvedSettings {
  const parsed = settingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new SettingsError(
      `Invalid settings${settingsPath ? ` in ${settingsPath}` : ''}: ${describeIssues(parsed.error)}`,
      { settingsPath },
    );
  }

  const settings = parsed.data;
  const stateDir = resolveFrom(baseDir, settings.stateDir);

  const timeoutModel = { ...DEFAULT_TIMEOUT_MODEL, ...settings.timeout };
  if (timeoutModel.minTimeoutSeconds > timeoutModel.maxTimeoutSeconds) {
    throw new SettingsError(
      'timeout.minTimeoutSeconds must not exceed timeout.maxTimeoutSeconds',
      { settingsPath },
    );
  }

  return {
    ...settings,
    crawler: {
      ...settings.crawler,
      cwd: settings.crawler.cwd ? resolveFrom(baseDir, settings.crawler.cwd) : undefined,
      configPath: resolveFrom(baseDir, settings.crawler.configPath),
    },
    stateDir,
    outputRoot: resolveFrom(baseDir, settings.outputRoot),
    settingsPath,
    storePath: resolve(stateDir, 'progress.json'),
    lockPath: resolve(stateDir, 'run.lock'),
    snapshotPath: resolve(stateDir, 'config-snapshot.json'),
    journalDir: resolve(stateDir, 'runs'),
    diagnosticsDir: resolve(stateDir, 'diagnostics'),
  };
}

export function resolveSettingsPath(
  explicitPath: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const candidate = explicitPath ?? env['COLLECTOR_CONFIG'] ?? DEFAULT_SETTINGS_FILE;
  return resolveFrom(cwd, candidate);
}

export function loadSettings(settingsPath: string): ResolvedSettings {
  if (!existsSync(settingsPath)) {
    throw new SettingsError(`Settings file not found: ${settingsPath}`, {
      settingsPath,
    });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(settingsPath, 'utf-8'));
  } catch (error) {
    throw new SettingsError(
      `Settings file ${settingsPath} is not valid JSON: ${errorMessage(error)}`,
      { settingsPath },
    );
  }

  return parseSettings(raw, dirname(settingsPath), settingsPath);
}

export { DEFAULT_SETTINGS_FILE, settingsSchema };
export type { ResolvedSettings, Settings, SettingsInput };
