import pino from 'pino';
import { env } from '../config/env.js';

/**
 * Logger utilities for the Quire backend.
 *
 * Development builds write colourised output through `pino-pretty`, production
 * writes newline-delimited JSON to stdout, and the test environment is
 * silenced unless LOG_LEVEL overrides it. Modules take a child of the shared
 * `logger` so every entry carries a `module` binding:
 *
 * ```typescript
 * import { logger } from './lib/logger.js';
 *
 * const moduleLogger = logger.child({ module: 'user' });
 * moduleLogger.info({ userId }, 'User created');
 * ```
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
 * Creates a Pino logger instance with the standard Quire configuration.
 *
 * @returns Configured Pino logger instance
 */
export function createLogger(): pino.Logger {
    const level = resolveLevel();
    const options: pino.LoggerOptions = {
        level,
        base: {
            service: 'quire-backend'
        }
    };

    if (env.NODE_ENV !== 'development') {
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
