/**
 * Logger Module
 *
 * Prints formatted messages to the terminal and mirrors them into a
 * log file through a bounded queue.
 *
 * Features:
 * - Origin tags, timestamps and line wrapping with aligned continuations
 * - Lazy session header, written before the first flush
 * - One mutex per logger; concurrent callers keep their call order
 * - Process-wide logger with `rep*` shorthands
 */

// Types
export type {
    Status,
    OutputStream,
    StreamSelector,
    TimestampFormat,
    Origin,
    LoggerProperties,
    LoggerOptions,
    LoggerState,
    FileState,
} from './types.js';

export { DEFAULT_PROPERTIES, DEFAULT_MAX_QUEUE_LENGTH } from './types.js';

// Errors
export { FileOpenError, WriteError } from './errors.js';

// Formatting
export {
    composeMessage,
    buildTag,
    resolveLineWidth,
    splitLogicalLines,
    chunkLine,
    DEFAULT_LINE_WIDTH,
    type ComposeOptions,
} from './formatter.js';
export { ansiPainter, plainPainter, type Painter, type TagStyle } from './color.js';
export { makeDateTimeString, makeLogName } from './time.js';

// Building blocks
export { MessageQueue } from './queue.js';
export { Mutex } from './mutex.js';
export { FileSink, buildHeader } from './sink.js';

// Logger
export { Logger } from './logger.js';

// Global logger
export { buildGlobalLogger, deleteGlobalLogger, getGlobalLogger } from './registry.js';
export {
    repRaw,
    repMsg,
    repErr,
    captureOrigin,
    parseStackFrame,
    formatFallbackTag,
} from './report.js';
