import { z } from 'zod';
import { ConfigRestoreError } from '../errors.js';
import { loadCollectorContext, withRunLock, type CollectorContext } from './context.js';
import { commonOptionsSchema } from './options.js';
import { printResult, reportFailure } from './report.js';

const restoreConfigArgsSchema = z.object({
  ...commonOptionsSchema.shape,
});

type RestoreConfigArgs = z.infer<typeof restoreConfigArgsSchema>;

export function restoreCrawlerConfig(
  context: Pick<CollectorContext, 'patcher' | 'lock' | 'settings'>,
): { restored: boolean; configPath: string } {
  const restored = withRunLock(context.lock, 'restore-config', () =>
    context.patcher.recoverStale(),
  );
  return { restored, configPath: context.settings.crawler.configPath };
}

export function runRestoreConfigAction(args: RestoreConfigArgs): number {
  try {
    const context = loadCollectorContext(args.config);
    printResult(restoreCrawlerConfig(context), args.pretty);
    return 0;
  } catch (error) {
    if (error instanceof ConfigRestoreError) {
      reportFailure('restore-config', error);
      return 2;
    }
    return reportFailure('restore-config', error);
  }
}

export { restoreConfigArgsSchema };
export type { RestoreConfigArgs };
