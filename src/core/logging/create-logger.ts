import pino from 'pino';
import type { Logger, ILoggerFactory, LogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Create the root pino logger instance.
 *
 * - Sync JSON output to stderr (stdout is reserved for CLI results)
 * - Redaction of credential material
 */
export function createRootLogger(level: LogLevel): Logger {
  return pino(
    {
      level,

      redact: REDACTION_CONFIG,

      timestamp: pino.stdTimeFunctions.isoTime,

      serializers: {
        err: pino.stdSerializers.err,
      },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/**
 * Logger factory - creates component loggers.
 *
 * Registered once per container with the configured level.
 */
export class PinoLoggerFactory implements ILoggerFactory {
  private readonly _root: Logger;

  constructor(level: LogLevel) {
    this._root = createRootLogger(level);
  }

  get root(): Logger {
    return this._root;
  }

  create(component: string): Logger {
    return this._root.child({ component });
  }
}
