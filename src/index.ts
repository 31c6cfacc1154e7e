/**
 * linelog
 *
 * Process-local text logger: formatted terminal output mirrored into a
 * log file through a bounded queue.
 *
 * @example
 * ```typescript
 * import { Logger } from 'linelog'
 *
 * const logger = new Logger({ file: 'run.log', sessionName: 'nightly' })
 *
 * await logger.reportMessage({ file: 'main.ts', line: 3 }, 'starting')
 * await logger.close()
 * ```
 */
export * from './core/index.js';
