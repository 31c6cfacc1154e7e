/**
 * Logger
 *
 * Prints formatted messages to stdout/stderr and mirrors them into a
 * log file through a bounded queue. The file is only touched when the
 * queue reaches its maximum length, on flush(), on setLogFile() and on
 * close().
 *
 * All queue and file state is guarded by one mutex. Public methods
 * acquire it; the private `#...Locked` methods assume it is held and
 * never take it again.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ file: 'run.log', append: false, sessionName: 'nightly' })
 *
 * await logger.reportMessage({ file: 'main.ts', line: 10 }, 'starting')
 * await logger.reportError({ function: 'connect' }, 'connection refused')
 *
 * await logger.close()  // header + both messages land in run.log
 * ```
 */
import type { Writable } from 'node:stream';
import { attempt } from '@logosdx/utils';

import { observer } from '../observer.js';
import { getTerminalWidth, isInteractive } from '../environment.js';
import { ansiPainter, type Painter } from './color.js';
import { FileOpenError } from './errors.js';
import { composeMessage } from './formatter.js';
import { MessageQueue } from './queue.js';
import { Mutex } from './mutex.js';
import { FileSink } from './sink.js';
import type {
    FileState,
    LoggerOptions,
    LoggerProperties,
    LoggerState,
    Origin,
    Status,
    StreamSelector,
} from './types.js';
import { DEFAULT_MAX_QUEUE_LENGTH, DEFAULT_PROPERTIES } from './types.js';

/**
 * Thread-safe (in the async sense) text logger.
 *
 * Console output is written synchronously when a `show*` or `report*`
 * method is called. File entries are rendered at call time and queued
 * in call order.
 */
export class Logger {

    #properties: LoggerProperties;
    #maxQueueLength: number;
    #sessionName: string;
    #state: LoggerState = 'open';

    #queue = new MessageQueue();
    #mutex = new Mutex();
    #sink: FileSink;

    #stdout: Writable;
    #stderr: Writable;
    #painter: Painter;
    #terminalWidth: () => number;
    #now: () => Date;

    constructor(options: LoggerOptions = {}) {

        this.#properties = { ...DEFAULT_PROPERTIES, ...options.properties };
        this.#maxQueueLength = normalizeQueueLength(options.maxQueueLength ?? DEFAULT_MAX_QUEUE_LENGTH);
        this.#sessionName = options.sessionName ?? '';
        this.#sink = new FileSink(options.file ?? null, options.append ?? true);

        this.#stdout = options.stdout ?? process.stdout;
        this.#stderr = options.stderr ?? process.stderr;
        this.#painter = options.painter ?? ansiPainter;
        this.#terminalWidth = options.terminalWidth ?? getTerminalWidth;
        this.#now = options.now ?? (() => new Date());

    }

    // ─────────────────────────────────────────────────────────────
    // Accessors
    // ─────────────────────────────────────────────────────────────

    /**
     * Current log file, or null when logging to the console only.
     */
    get logFile(): string | null {

        return this.#sink.path;

    }

    /**
     * Header state of the current log file.
     */
    get fileState(): FileState {

        if (this.#sink.path === null) {

            return 'no-file';

        }

        return this.#sink.headerWritten ? 'header-written' : 'header-pending';

    }

    /**
     * Number of messages waiting for the next flush.
     */
    get pending(): number {

        return this.#queue.length;

    }

    get state(): LoggerState {

        return this.#state;

    }

    get sessionName(): string {

        return this.#sessionName;

    }

    get maxQueueLength(): number {

        return this.#maxQueueLength;

    }

    /**
     * Change the queue length that triggers a flush.
     *
     * Takes effect on the next enqueue; a queue already above the new
     * maximum is flushed by the next log call, not now.
     */
    setMaxQueueLength(length: number): void {

        this.#maxQueueLength = normalizeQueueLength(length);

    }

    /**
     * Copy of the current output properties.
     */
    getProperties(): LoggerProperties {

        return { ...this.#properties };

    }

    /**
     * Merge properties into the current output properties.
     */
    setProperties(properties: Partial<LoggerProperties>): void {

        this.#properties = { ...this.#properties, ...properties };

    }

    // ─────────────────────────────────────────────────────────────
    // Print and log
    // ─────────────────────────────────────────────────────────────

    /**
     * Print a message and queue it for the log file.
     *
     * @returns no-log-file without a file, the print status if printing
     * failed, else the log status
     */
    async reportRaw(message: string, stream: StreamSelector = 'stdout'): Promise<Status> {

        const shown = this.showRaw(message, stream);
        const logged = await this.logRaw(message);

        if (logged === 'no-log-file') {

            return logged;

        }

        return shown === 'ok' ? logged : shown;

    }

    /**
     * Print a message with its origin tag to stdout and queue it.
     */
    reportMessage(origin: Origin, message: string, properties?: Partial<LoggerProperties>): Promise<Status> {

        this.showMessage(origin, message, properties);

        return this.logMessage(origin, message, properties);

    }

    /**
     * Print an error with its origin tag to stderr and queue it.
     */
    reportError(origin: Origin, message: string, properties?: Partial<LoggerProperties>): Promise<Status> {

        this.showError(origin, message, properties);

        return this.logError(origin, message, properties);

    }

    /**
     * Print a message verbatim.
     *
     * @returns invalid-use for a stream other than stdout/stderr (or 1/2)
     */
    showRaw(message: string, stream: StreamSelector = 'stdout'): Status {

        const target = this.#selectStream(stream);

        if (!target) {

            this.#stderr.write(`Logger: Unknown stream '${String(stream)}'\n`);

            return 'invalid-use';

        }

        target.write(message + '\n');

        return 'ok';

    }

    showMessage(origin: Origin, message: string, properties?: Partial<LoggerProperties>): void {

        this.#show(this.#stdout, origin, message, false, properties);

    }

    showError(origin: Origin, message: string, properties?: Partial<LoggerProperties>): void {

        this.#show(this.#stderr, origin, message, true, properties);

    }

    /**
     * Queue a message verbatim.
     */
    logRaw(message: string): Promise<Status> {

        return this.#mutex.run(() => this.#enqueueLocked(message));

    }

    /**
     * Queue a message rendered for the file.
     *
     * The entry is rendered (and timestamped) now, before waiting for
     * the mutex.
     */
    logMessage(origin: Origin, message: string, properties?: Partial<LoggerProperties>): Promise<Status> {

        const rendered = this.#render(origin, message, false, properties);

        return this.#mutex.run(() => this.#enqueueLocked(rendered));

    }

    logError(origin: Origin, message: string, properties?: Partial<LoggerProperties>): Promise<Status> {

        const rendered = this.#render(origin, message, true, properties);

        return this.#mutex.run(() => this.#enqueueLocked(rendered));

    }

    // ─────────────────────────────────────────────────────────────
    // File lifecycle
    // ─────────────────────────────────────────────────────────────

    /**
     * Write every queued message to the log file.
     *
     * Writes the session header first if this file has none yet. When
     * the header cannot be written the queue is kept.
     */
    flush(): Promise<Status> {

        return this.#mutex.run<Status>(() => {

            if (this.#state === 'closed') {

                return 'invalid-use';

            }

            return this.#flushLocked();

        });

    }

    /**
     * Switch to another log file, or to console only with null.
     *
     * Pending messages are flushed to the old file first.
     *
     * @returns the status of that flush
     */
    setLogFile(file: string | null, append = true): Promise<Status> {

        return this.#mutex.run<Status>(async () => {

            if (this.#state === 'closed') {

                return 'invalid-use';

            }

            const previous = this.#sink.path;
            const status = previous === null ? 'ok' : await this.#flushLocked();

            this.#sink.setTarget(file, append);

            observer.emit('logger:file-changed', {
                previous,
                file: this.#sink.path,
                append,
            });

            return status;

        });

    }

    /**
     * Write a session header now instead of before the next flush.
     *
     * @param sessionName - Name shown in the header (defaults to the logger's)
     */
    prepareLogFile(sessionName?: string): Promise<Status> {

        return this.#mutex.run<Status>(async () => {

            if (this.#state === 'closed') {

                return 'invalid-use';

            }

            const file = this.#sink.path;

            if (file === null) {

                return 'no-log-file';

            }

            const session = sessionName ?? this.#sessionName;
            const [, err] = await attempt(() => this.#sink.writeHeader(session, this.#now()));

            if (err) {

                return this.#fail(file, err);

            }

            observer.emit('logger:header', { file, session: session || null });

            return 'ok';

        });

    }

    /**
     * Flush what is left and stop file logging.
     *
     * A closed logger still prints; its file operations return
     * invalid-use. Closing twice is a no-op.
     */
    close(): Promise<Status> {

        return this.#mutex.run<Status>(async () => {

            if (this.#state === 'closed') {

                return 'ok';

            }

            const status = await this.#flushLocked();

            this.#state = 'closed';

            observer.emit('logger:closed', { file: this.#sink.path, status });

            return status;

        });

    }

    // ─────────────────────────────────────────────────────────────
    // Internals
    // ─────────────────────────────────────────────────────────────

    async #enqueueLocked(entry: string): Promise<Status> {

        if (this.#state === 'closed') {

            return 'invalid-use';

        }

        if (this.#sink.path === null) {

            return 'no-log-file';

        }

        if (this.#queue.push(entry) >= this.#maxQueueLength) {

            return this.#flushLocked();

        }

        return 'ok';

    }

    async #flushLocked(): Promise<Status> {

        const file = this.#sink.path;

        if (file === null) {

            return 'no-log-file';

        }

        if (this.#queue.length === 0) {

            return 'ok';

        }

        if (!this.#sink.headerWritten) {

            const [, headerErr] = await attempt(
                () => this.#sink.ensureHeader(this.#sessionName, this.#now()),
            );

            if (headerErr) {

                return this.#fail(file, headerErr);

            }

            observer.emit('logger:header', { file, session: this.#sessionName || null });

        }

        const entries = this.#queue.drainAll();
        const [, appendErr] = await attempt(() => this.#sink.appendLines(entries));

        if (appendErr) {

            return this.#fail(file, appendErr);

        }

        observer.emit('logger:flushed', { file, entries: entries.length });

        return 'ok';

    }

    #fail(file: string, error: Error): Status {

        this.#stderr.write(`Logger: ${error.message}\n`);

        observer.emit('logger:error', { file, error });

        return error instanceof FileOpenError ? 'open-failed' : 'write-failed';

    }

    #show(
        stream: Writable,
        origin: Origin,
        message: string,
        error: boolean,
        properties?: Partial<LoggerProperties>,
    ): void {

        const rendered = composeMessage(origin, message, this.#resolve(properties), {
            error,
            toFile: false,
            interactive: isInteractive(stream),
            painter: this.#painter,
            terminalWidth: this.#terminalWidth,
            now: this.#now,
        });

        stream.write(rendered + '\n');

    }

    #render(
        origin: Origin,
        message: string,
        error: boolean,
        properties?: Partial<LoggerProperties>,
    ): string {

        return composeMessage(origin, message, this.#resolve(properties), {
            error,
            toFile: true,
            interactive: false,
            terminalWidth: this.#terminalWidth,
            now: this.#now,
        });

    }

    #resolve(properties?: Partial<LoggerProperties>): LoggerProperties {

        return properties ? { ...this.#properties, ...properties } : this.#properties;

    }

    #selectStream(stream: StreamSelector): Writable | null {

        if (stream === 'stdout' || stream === 1) {

            return this.#stdout;

        }

        if (stream === 'stderr' || stream === 2) {

            return this.#stderr;

        }

        return null;

    }

}

function normalizeQueueLength(length: number): number {

    return Number.isFinite(length) ? Math.max(1, Math.floor(length)) : DEFAULT_MAX_QUEUE_LENGTH;

}
