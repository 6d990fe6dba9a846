import pino from 'pino';
import type { Logger } from './types.js';
import { isLogLevel } from './types.js';
import { REDACTION_CONFIG } from './redaction.js';

/**
 * Bootstrap logger for use BEFORE the DI container is initialized
 * (event parsing in the Lambda handler, config failures).
 *
 * After DI is ready, use the injected ILoggerFactory instead.
 */
let _bootstrapLogger: Logger | null = null;

export function getBootstrapLogger(): Logger {
  if (!_bootstrapLogger) {
    const raw = process.env['ROTATION_LOG_LEVEL']?.toLowerCase() ?? 'info';

    _bootstrapLogger = pino(
      {
        level: isLogLevel(raw) ? raw : 'info',
        redact: REDACTION_CONFIG,
        timestamp: pino.stdTimeFunctions.isoTime,
      },
      pino.destination({ dest: 2, sync: true })
    );
  }

  return _bootstrapLogger;
}

export function createBootstrapLogger(component: string): Logger {
  return getBootstrapLogger().child({ component });
}
