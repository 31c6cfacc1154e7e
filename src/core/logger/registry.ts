/**
 * Global Logger
 *
 * One process-wide logger slot for code that should not pass a logger
 * around. Building, deleting and reading the slot is not serialized:
 * set it up at startup and tear it down at exit, not from concurrent
 * tasks.
 *
 * @example
 * ```typescript
 * await buildGlobalLogger({ file: 'run.log', sessionName: 'nightly' })
 *
 * await getGlobalLogger()?.reportMessage({ function: 'main' }, 'started')
 *
 * await deleteGlobalLogger()  // final flush
 * ```
 */
import { Logger } from './logger.js';
import type { LoggerOptions, Status } from './types.js';

// ─────────────────────────────────────────────────────────────
// Singleton
// ─────────────────────────────────────────────────────────────

let globalLogger: Logger | null = null;

/**
 * Replace the global logger with a new one.
 *
 * The previous logger, if any, is closed first so its queue is flushed.
 */
export async function buildGlobalLogger(options: LoggerOptions = {}): Promise<Logger> {

    if (globalLogger) {

        const previous = globalLogger;
        globalLogger = null;

        await previous.close();

    }

    globalLogger = new Logger(options);

    return globalLogger;

}

/**
 * Close and remove the global logger.
 *
 * @returns invalid-use when there is none, else the status of the final flush
 */
export async function deleteGlobalLogger(): Promise<Status> {

    if (!globalLogger) {

        return 'invalid-use';

    }

    const logger = globalLogger;
    globalLogger = null;

    return logger.close();

}

/**
 * The global logger, or null when none was built.
 */
export function getGlobalLogger(): Logger | null {

    return globalLogger;

}
