import { describe, it, expect, vi } from 'vitest';
import { existsSync, readFileSync } from 'node:fs';
import { setTimeout as sleep } from 'node:timers/promises';
import { SpawnProcessRunner } from './process-runner.js';
import type { ProcessCommand } from './types.js';

const { debug } = vi.hoisted(() => ({ debug: vi.fn() }));

vi.mock('@workspace/logger', () => {
  const logger: Record<string, unknown> = {
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug,
    trace: vi.fn(),
    child: () => logger,
  };
  return { createLogger: () => logger, log: logger };
});

function nodeScript(source: string, env?: Record<string, string>): ProcessCommand {
  return { executable: process.execPath, args: ['-e', source], env };
}

// A killed process whose parent already exited may linger as a zombie until reaped
function isRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
  } catch {
    return false;
  }

  const statPath = `/proc/${pid}/stat`;
  if (!existsSync(statPath)) {
    return true;
  }
  const state = readFileSync(statPath, 'utf-8').split(') ')[1]?.charAt(0);
  return state !== 'Z';
}

async function waitUntilStopped(pid: number, timeoutMs: number): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (!isRunning(pid)) {
      return true;
    }
    await sleep(50);
  }
  return !isRunning(pid);
}

const spawnHelper = (stdio: string) =>
  `const helper = require("node:child_process").spawn(process.execPath, ` +
  `["-e", "setInterval(() => {}, 1000)"], { stdio: "${stdio}" }); ` +
  `console.log("helper " + helper.pid);`;

describe('SpawnProcessRunner', () => {
  it('reports a clean exit with every output line', async () => {
    const runner = new SpawnProcessRunner();
    const lines: string[] = [];

    const outcome = await runner.run(
      nodeScript('console.log("one"); console.error("two");'),
      10_000,
      { onLine: (line, stream) => lines.push(`${stream}:${line}`) },
    );

    expect(outcome.exitCode).toBe(0);
    expect(outcome.timedOut).toBe(false);
    expect(outcome.spawnError).toBeUndefined();
    expect(lines.sort()).toEqual(['stderr:two', 'stdout:one']);
  });

  it('hands output lines to the caller without logging them itself', async () => {
    debug.mockClear();

    await new SpawnProcessRunner().run(nodeScript('console.log("only once");'), 10_000, {
      onLine: () => {},
    });

    expect(debug).not.toHaveBeenCalled();
  });

  it('reports a non-zero exit code', async () => {
    const outcome = await new SpawnProcessRunner().run(
      nodeScript('console.error("login expired"); process.exit(3);'),
      10_000,
    );

    expect(outcome.exitCode).toBe(3);
    expect(outcome.timedOut).toBe(false);
    expect(outcome.truncatedOutput).toBe('login expired');
  });

  it('passes extra environment variables', async () => {
    const outcome = await new SpawnProcessRunner().run(
      nodeScript('console.log(process.env.COLLECTOR_TEST_VALUE);', {
        COLLECTOR_TEST_VALUE: 'placeholder',
      }),
      10_000,
    );

    expect(outcome.truncatedOutput).toBe('placeholder');
  });

  it('terminates a process that outlives its timeout', async () => {
    const runner = new SpawnProcessRunner({ killGraceMs: 500 });

    const outcome = await runner.run(nodeScript('setInterval(() => {}, 1000);'), 200);

    expect(outcome.timedOut).toBe(true);
    expect(outcome.exitCode).toBeNull();
    expect(outcome.signal).toBe('SIGTERM');
  });

  it('escalates to SIGKILL when SIGTERM is ignored', async () => {
    const runner = new SpawnProcessRunner({ killGraceMs: 300 });

    const outcome = await runner.run(
      nodeScript(
        'process.on("SIGTERM", () => {}); console.log("ready"); setInterval(() => {}, 1000);',
      ),
      500,
    );

    expect(outcome.timedOut).toBe(true);
    expect(outcome.signal).toBe('SIGKILL');
  });

  it('resolves with a spawn error when the executable is missing', async () => {
    const outcome = await new SpawnProcessRunner().run(
      { executable: '/nonexistent/crawler-binary', args: [] },
      10_000,
    );

    expect(outcome.exitCode).toBeNull();
    expect(outcome.timedOut).toBe(false);
    expect(outcome.spawnError).toContain('ENOENT');
  });

  it('keeps only the tail of long output', async () => {
    const outcome = await new SpawnProcessRunner({ outputTailChars: 30 }).run(
      nodeScript('for (let i = 0; i < 100; i += 1) console.log(`line-${i}`);'),
      10_000,
    );

    expect(outcome.truncatedOutput.startsWith('...\n')).toBe(true);
    expect(outcome.truncatedOutput.endsWith('line-99')).toBe(true);
  });

  it('resolves once the crawler exits even when a helper keeps its output open', async () => {
    const runner = new SpawnProcessRunner({ drainGraceMs: 200 });
    const helperPids: number[] = [];

    const outcome = await runner.run(
      nodeScript(`${spawnHelper('inherit')} console.log("done"); process.exit(0);`),
      10_000,
      {
        onLine: (line) => {
          if (line.startsWith('helper ')) {
            helperPids.push(Number(line.slice('helper '.length)));
          }
        },
      },
    );

    expect(outcome.exitCode).toBe(0);
    expect(outcome.signal).toBeNull();
    expect(outcome.timedOut).toBe(false);
    expect(outcome.durationMs).toBeLessThan(5_000);
    expect(outcome.truncatedOutput.split('\n').at(-1)).toBe('done');
    expect(helperPids).toHaveLength(1);
    expect(await waitUntilStopped(helperPids[0] ?? 0, 2_000)).toBe(true);
  });

  it.skipIf(process.platform === 'win32')(
    'kills helpers the crawler spawned when it times out',
    async () => {
      const runner = new SpawnProcessRunner({ killGraceMs: 300, drainGraceMs: 200 });
      const helperPids: number[] = [];

      const outcome = await runner.run(
        nodeScript(`${spawnHelper('ignore')} setInterval(() => {}, 1000);`),
        500,
        {
          onLine: (line) => {
            if (line.startsWith('helper ')) {
              helperPids.push(Number(line.slice('helper '.length)));
            }
          },
        },
      );

      expect(outcome.timedOut).toBe(true);
      expect(helperPids).toHaveLength(1);
      expect(await waitUntilStopped(helperPids[0] ?? 0, 2_000)).toBe(true);
    },
  );

  it('resolves with a spawn error when spawn rejects its options', async () => {
    const outcome = await new SpawnProcessRunner().run(
      nodeScript('console.log("unreachable");', { COLLECTOR_TEST_VALUE: 'bad\0value' }),
      10_000,
    );

    expect(outcome.exitCode).toBeNull();
    expect(outcome.timedOut).toBe(false);
    expect(outcome.truncatedOutput).toBe('');
    expect(outcome.spawnError).toMatch(/null bytes/);
  });
});
