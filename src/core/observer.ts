/**
 * Central event system for linelog.
 *
 * Loggers announce their file lifecycle here so applications can react
 * to flushes and I/O failures without wrapping every call.
 *
 * @example
 * ```typescript
 * // Count entries written to disk
 * const cleanup = observer.on('logger:flushed', ({ entries }) => {
 *     written += entries
 * })
 *
 * // Surface I/O failures in a status bar
 * observer.on('logger:error', ({ file, error }) => showWarning(file, error.message))
 *
 * // Clean up when done
 * cleanup()
 * ```
 */
import {
    ObserverEngine,
    type Events
} from '@logosdx/observer'

import { isDebug } from './environment.js'
import type { Status } from './logger/types.js'
import type { Settings } from './settings/schema.js'


/**
 * All events emitted by linelog.
 *
 * - `logger:header` - A session header was written
 * - `logger:flushed` - Queued messages were appended to the file
 * - `logger:error` - A file operation failed
 * - `logger:file-changed` - setLogFile() switched the target
 * - `logger:closed` - A logger performed its final flush
 * - `settings:loaded` - Settings were resolved from file, env and overrides
 */
export interface LinelogEvents {

    'logger:header': { file: string; session: string | null }
    'logger:flushed': { file: string; entries: number }
    'logger:error': { file: string; error: Error }
    'logger:file-changed': { previous: string | null; file: string | null; append: boolean }
    'logger:closed': { file: string | null; status: Status }

    'settings:loaded': { path: string | null; settings: Settings }
}

export type LinelogEventNames = Events<LinelogEvents>;

/**
 * Global observer instance for linelog.
 *
 * Enable debug mode with `LINELOG_DEBUG=1` to see all events as they occur.
 */
export const observer = new ObserverEngine<LinelogEvents>({
    name: 'linelog',
    spy: isDebug()
        ? (action) => console.error(`[linelog:${action.fn}] ${String(action.event)}`)
        : undefined
});
