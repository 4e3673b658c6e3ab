import { log } from '@workspace/logger';
import { CollectorError, errorMessage } from '../errors.js';

export function formatJson(value: unknown, pretty: boolean): string {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

export function printResult(value: unknown, pretty: boolean): void {
  console.log(formatJson(value, pretty));
}

export function reportFailure(action: string, error: unknown): number {
  log.error(`${action} failed`, {
    error: errorMessage(error),
    code: error instanceof CollectorError ? error.code : undefined,
    context: error instanceof CollectorError ? error.context : undefined,
  });
  console.error(errorMessage(error));
  return 1;
}
