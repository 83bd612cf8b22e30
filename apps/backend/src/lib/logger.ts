import pino from 'pino';
import { env } from '../config/env.js';

/**
 * Logger utilities for the Everly backend.
 *
 * One Pino instance serves the whole process. Feature modules never import it
 * directly: the module manager lends it through `ISharedInfrastructure` and
 * each module binds its own child (`logger.child({ module: 'diaries' })`).
 *
 * **Log levels:**
 *
 * - `LOG_LEVEL` wins when set
 * - Test: `silent`
 * - Production: `info` and above
 * - Development: `debug` and above
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
 * Creates a Pino logger with the standard Everly configuration.
 *
 * Production writes newline-delimited JSON to stdout for the log shipper.
 * Everywhere else output goes through `pino-pretty` for readable, colorized
 * lines; under test no transport is started so no worker thread outlives the
 * run.
 *
 * @returns Configured Pino logger instance
 */
export function createLogger(): pino.Logger {
    const level = resolveLevel();
    const options: pino.LoggerOptions = {
        level,
        base: {
            service: 'everly-backend'
        }
    };

    if (env.NODE_ENV === 'production' || env.NODE_ENV === 'test') {
        return pino(options);
    }

    const transport = pino.transport({
        target: 'pino-pretty',
        options: {
            colorize: true,
            singleLine: false,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname'
        }
    });

    return pino(options, transport);
}

/**
 * Application logger singleton.
 *
 * @example
 * import { logger } from './lib/logger.js';
 * logger.info('Server started');
 * logger.error({ error }, 'Failed to connect');
 */
export const logger = createLogger();
