/**
 * Log file errors.
 *
 * The sink throws these; the logger turns them into a Status and
 * echoes the message to the error stream.
 */


/**
 * Error when the log file cannot be opened.
 *
 * @example
 * ```typescript
 * const [, err] = await attempt(() => sink.appendLines(lines))
 * if (err instanceof FileOpenError) {
 *     console.error(`cannot open ${err.filepath}`)
 * }
 * ```
 */
export class FileOpenError extends Error {

    override readonly name = 'FileOpenError' as const

    constructor(
        public readonly filepath: string,
        cause: Error,
    ) {

        super(`Could not open log file '${filepath}': ${cause.message}`, { cause })
    }
}


/**
 * Error when an opened log file cannot be written.
 */
export class WriteError extends Error {

    override readonly name = 'WriteError' as const

    constructor(
        public readonly filepath: string,
        cause: Error,
    ) {

        super(`Error writing to log file '${filepath}': ${cause.message}`, { cause })
    }
}
