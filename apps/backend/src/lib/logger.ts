import pino from 'pino';
import { mkdirSync } from 'fs';
import { env } from '../config/env.js';

/**
 * Logger utilities for the Enfyra back end.
 *
 * In development the logger writes to `.run/backend.log` and to stdout through
 * `pino-pretty`. Production writes JSON lines to stdout for the process
 * supervisor to collect. Tests run silent unless LOG_LEVEL says otherwise.
 *
 * @example
 * import { logger } from './lib/logger.js';
 * const log = logger.child({ module: 'extensions' });
 * log.info({ extensionId }, 'Extension compiled');
 */

function resolveLevel(): pino.LevelWithSilent {
    if (env.LOG_LEVEL) {
        return env.LOG_LEVEL;
    }
    if (env.NODE_ENV === 'test') {
        return 'silent';
    }
    return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Creates a Pino logger configured for the current NODE_ENV.
 *
 * @returns Configured Pino logger instance
 */
export function createLogger(): pino.Logger {
    const level = resolveLevel();
    const options: pino.LoggerOptions = {
        level,
        base: {
            service: 'enfyra-backend'
        }
    };

    if (env.NODE_ENV !== 'development') {
        return pino(options);
    }

    try {
        mkdirSync('.run', { recursive: true });
    } catch (err) {
        console.error('Warning: Could not create .run directory:', err);
    }

    const transport = pino.transport({
        targets: [
            {
                level,
                target: 'pino/file',
                options: { destination: '.run/backend.log' }
            },
            {
                level,
                target: 'pino-pretty',
                options: {
                    colorize: true,
                    singleLine: false,
                    translateTime: 'SYS:standard',
                    ignore: 'pid,hostname'
                }
            }
        ]
    });

    return pino(options, transport);
}

/**
 * Application logger singleton. Modules derive child loggers from it.
 */
export const logger = createLogger();
