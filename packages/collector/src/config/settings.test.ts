import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { SettingsError } from '../errors.js';
import { loadSettings, parseSettings, resolveSettingsPath } from './settings.js';

const TEST_DIR = join(process.cwd(), 'tmp', 'test-settings');

function cleanup(): void {
  if (existsSync(TEST_DIR)) {
    rmSync(TEST_DIR, { recursive: true, force: true });
  }
}

const minimal = {
  crawler: {
    command: './run-crawler.sh',
    configPath: 'crawler/base_config.conf',
  },
};

describe('parseSettings', () => {
  it('fills defaults and resolves paths against the base directory', () => {
    const settings = parseSettings(minimal, '/srv/collector');

    expect(settings.crawler.configPath).toBe('/srv/collector/crawler/base_config.conf');
    expect(settings.crawler.args).toEqual([]);
    expect(settings.crawler.fields.entityIds).toBe('CREATOR_ID_LIST');
    expect(settings.crawler.literals).toEqual({ true: 'true', false: 'false', null: 'null' });
    expect(settings.stateDir).toBe('/srv/collector/data');
    expect(settings.outputRoot).toBe('/srv/collector/data/output');
    expect(settings.storePath).toBe('/srv/collector/data/progress.json');
    expect(settings.lockPath).toBe('/srv/collector/data/run.lock');
    expect(settings.snapshotPath).toBe('/srv/collector/data/config-snapshot.json');
    expect(settings.journalDir).toBe('/srv/collector/data/runs');
    expect(settings.batchSize).toBe(5);
    expect(settings.artifactPattern).toBe('creator_contents_*.json');
    expect(settings.interBatchDelayMs).toEqual({ min: 0, max: 0 });
    expect(settings.killGraceMs).toBe(5000);
    expect(settings.drainGraceMs).toBe(2000);
  });

  it('keeps absolute paths as given', () => {
    const settings = parseSettings(
      { ...minimal, stateDir: '/var/lib/collector', crawler: { ...minimal.crawler, cwd: '/opt/crawler' } },
      '/srv/collector',
    );

    expect(settings.stateDir).toBe('/var/lib/collector');
    expect(settings.crawler.cwd).toBe('/opt/crawler');
  });

  it('rejects a missing crawler command', () => {
    expect(() =>
      parseSettings({ crawler: { configPath: 'x.conf' } }, '/srv'),
    ).toThrow(SettingsError);
  });

  it('rejects batch sizes above 20', () => {
    expect(() => parseSettings({ ...minimal, batchSize: 21 }, '/srv')).toThrow(
      /^Invalid settings: batchSize: /,
    );
  });

  it('rejects an inverted delay range', () => {
    expect(() =>
      parseSettings({ ...minimal, interBatchDelayMs: { min: 10, max: 5 } }, '/srv'),
    ).toThrow('interBatchDelayMs.min must not exceed interBatchDelayMs.max');
  });

  it('rejects an inverted timeout range', () => {
    expect(() =>
      parseSettings(
        { ...minimal, timeout: { minTimeoutSeconds: 900, maxTimeoutSeconds: 600 } },
        '/srv',
      ),
    ).toThrow('timeout.minTimeoutSeconds must not exceed timeout.maxTimeoutSeconds');
  });
});

describe('resolveSettingsPath', () => {
  it('prefers the explicit path, then the environment, then the default', () => {
    expect(resolveSettingsPath('custom.json', {}, '/work')).toBe('/work/custom.json');
    expect(resolveSettingsPath(undefined, { COLLECTOR_CONFIG: '/etc/c.json' }, '/work')).toBe(
      '/etc/c.json',
    );
    expect(resolveSettingsPath(undefined, {}, '/work')).toBe('/work/collector.config.json');
  });
});

describe('loadSettings', () => {
  beforeEach(() => {
    cleanup();
    mkdirSync(TEST_DIR, { recursive: true });
  });

  afterEach(() => {
    cleanup();
  });

  it('reads the file and resolves paths against its directory', () => {
    const path = join(TEST_DIR, 'collector.config.json');
    writeFileSync(path, JSON.stringify(minimal), 'utf-8');

    const settings = loadSettings(path);

    expect(settings.settingsPath).toBe(path);
    expect(settings.crawler.configPath).toBe(resolve(TEST_DIR, 'crawler/base_config.conf'));
  });

  it('reports a missing file', () => {
    expect(() => loadSettings(join(TEST_DIR, 'absent.json'))).toThrow(
      `Settings file not found: ${join(TEST_DIR, 'absent.json')}`,
    );
  });

  it('reports invalid JSON', () => {
    const path = join(TEST_DIR, 'broken.json');
    writeFileSync(path, '{ nope', 'utf-8');

    expect(() => loadSettings(path)).toThrow(SettingsError);
  });
});
