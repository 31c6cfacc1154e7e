/**
 * Logger Types
 *
 * Type definitions for the linelog logging system.
 * A logger prints formatted messages to stdout/stderr and mirrors
 * them into a log file through a bounded in-memory queue.
 */
import type { Writable } from 'node:stream';

import type { Painter } from './color.js';

/**
 * Result of a logger operation.
 *
 * - ok: Operation succeeded
 * - no-log-file: Valid call, but no log file is configured (not a failure)
 * - open-failed: The log file could not be opened
 * - write-failed: The log file could not be written
 * - invalid-use: Unknown stream selector, closed logger, or empty registry
 */
export type Status = 'ok' | 'no-log-file' | 'open-failed' | 'write-failed' | 'invalid-use';

/**
 * Standard streams a logger prints to.
 */
export type OutputStream = 'stdout' | 'stderr';

/**
 * Stream selector accepted by the raw operations.
 *
 * File descriptors 1 and 2 are accepted as aliases of stdout and stderr,
 * any other number is rejected with `invalid-use`.
 */
export type StreamSelector = OutputStream | number;

/**
 * Which parts of the current time go into a timestamp.
 */
export type TimestampFormat = 'datetime' | 'date' | 'time';

/**
 * Where a message comes from.
 *
 * Every field is optional on its own. Empty strings count as absent.
 *
 * @example
 * ```typescript
 * { file: 'src/main.ts', line: 10, function: 'main' }  // [src/main.ts | 10 | main()]:
 * { file: 'src/main.ts', line: 10 }                    // [src/main.ts | 10]:
 * { function: 'main' }                                 // [main()]:
 * {}                                                   // no tag
 * ```
 */
export interface Origin {

    file?: string;

    line?: number;

    function?: string;
}

/**
 * Output properties controlling how messages are rendered.
 */
export interface LoggerProperties {

    /** Use color escapes on interactive terminals */
    color: boolean;

    /** Prefix file entries with a timestamp */
    timestamp: boolean;

    /** Parts of the time used by the timestamp prefix */
    timestampFormat: TimestampFormat;

    /** Break long lines for show* output */
    wrapTTY: boolean;

    /** Break long lines for log* output */
    wrapFile: boolean;

    /** Number of spaces in front of every line */
    indent: number;

    /** Maximum terminal line width, 0 = probe the terminal */
    maxLineWidthTTY: number;

    /** Maximum file line width, 0 = use maxLineWidthTTY */
    maxLineWidthFile: number;

    /** Align continuation lines under the message text */
    extraIndent: boolean;
}

/**
 * Default output properties.
 */
export const DEFAULT_PROPERTIES: LoggerProperties = {
    color: true,
    timestamp: true,
    timestampFormat: 'datetime',
    wrapTTY: true,
    wrapFile: true,
    indent: 0,
    maxLineWidthTTY: 0,
    maxLineWidthFile: 0,
    extraIndent: true,
};

/**
 * Default number of queued messages that triggers a flush.
 */
export const DEFAULT_MAX_QUEUE_LENGTH = 10;

/**
 * Options for Logger construction.
 */
export interface LoggerOptions {

    /** Log file path (omit or null for console-only) */
    file?: string | null;

    /** Append to an existing file instead of truncating it */
    append?: boolean;

    /** Name shown in the session header written before the first flush */
    sessionName?: string;

    /** Output properties, merged over DEFAULT_PROPERTIES */
    properties?: Partial<LoggerProperties>;

    /** Queue length that triggers a flush */
    maxQueueLength?: number;

    /** Stream for messages (defaults to process.stdout) */
    stdout?: Writable;

    /** Stream for errors and diagnostics (defaults to process.stderr) */
    stderr?: Writable;

    /** Color encoder used on interactive streams */
    painter?: Painter;

    /** Terminal width probe, queried when a configured width is 0 */
    terminalWidth?: () => number;

    /** Clock used for timestamps and headers */
    now?: () => Date;
}

/**
 * Lifecycle state of a Logger instance.
 */
export type LoggerState = 'open' | 'closed';

/**
 * Derived state of the log file.
 *
 * - no-file: No file configured
 * - header-pending: File configured, session header not yet written
 * - header-written: File configured, session header written
 */
export type FileState = 'no-file' | 'header-pending' | 'header-written';
