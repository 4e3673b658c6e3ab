import pino from 'pino'

/**
 * Log levels:
 * - fatal (60): Run aborted, configuration integrity in doubt
 * - error (50): Batch or resource failures
 * - warn (40): Recoverable problems (timeouts, unparsable artifacts)
 * - info (30): Run and batch lifecycle (default)
 * - debug (20): Crawler output lines, store transactions
 * - trace (10): Very detailed trace messages
 */

type LogData = Record<string, unknown> | Error

type Logger = {
  fatal: (msg: string, data?: LogData) => void
  error: (msg: string, data?: LogData) => void
  warn: (msg: string, data?: LogData) => void
  info: (msg: string, data?: LogData) => void
  debug: (msg: string, data?: LogData) => void
  trace: (msg: string, data?: LogData) => void
  child: (bindings: pino.Bindings) => Logger
}

const knownLevels: readonly pino.LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']

function resolveLevel(raw: string | undefined): pino.LevelWithSilent {
  const value = raw?.trim().toLowerCase() ?? 'info'
  return knownLevels.find(level => level === value) ?? 'info'
}

const logLevel = resolveLevel(process.env.LOG_LEVEL)

// No transport worker when logging is off (tests run with LOG_LEVEL=silent)
const baseLogger =
  logLevel === 'silent'
    ? pino({ level: logLevel })
    : pino({
        level: logLevel,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
            messageFormat: '[{context}] {msg}',
            customColors: 'fatal:bgRed,error:red,warn:yellow,info:cyan,debug:green,trace:gray'
          }
        }
      })

const wrapLogger = (logger: pino.Logger): Logger => {
  const wrap = (level: pino.Level) => {
    return (msg: string, data?: LogData) => {
      if (data === undefined) {
        logger[level](msg)
        return
      }

      if (data instanceof Error) {
        logger[level]({ err: data }, msg)
        return
      }

      logger[level](data, msg)
    }
  }

  return {
    fatal: wrap('fatal'),
    error: wrap('error'),
    warn: wrap('warn'),
    info: wrap('info'),
    debug: wrap('debug'),
    trace: wrap('trace'),
    child: (bindings: pino.Bindings) => wrapLogger(logger.child(bindings))
  }
}

/**
 * Logger instance for the application
 *
 * Usage:
 * ```typescript
 * import { log } from '@workspace/logger';
 *
 * log.info('Run started', { runId, batches: plan.batches.length });
 * log.error('Batch failed', error);
 * ```
 *
 * Set log level via environment variable:
 * ```bash
 * LOG_LEVEL=debug npm run collector -- resume --limit=5
 * ```
 */
export const log = wrapLogger(baseLogger.child({ context: 'collector' }))

/**
 * Create a child logger with a specific context
 *
 * @example
 * ```typescript
 * const runnerLog = createLogger('process-runner');
 * runnerLog.debug('crawler output', { line });
 * ```
 */
export function createLogger(context: string): Logger {
  return wrapLogger(baseLogger.child({ context }))
}

export type { Logger, LogData }
