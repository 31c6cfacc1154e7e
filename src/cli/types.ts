/**
 * CLI type definitions for the linelog command.
 */
import type { Readable, Writable } from 'node:stream'


/**
 * Command line flags.
 *
 * Flags left undefined fall back to the settings file and the
 * LINELOG_* environment.
 */
export interface CliFlags {

    /** Log file to mirror messages into */
    file?: string

    /** Append to the log file (--no-append truncates it) */
    append?: boolean

    /** Session name written in the header */
    name?: string

    /** Origin file shown in the message tag */
    source?: string

    /** Report messages as errors (stderr, ERROR tag) */
    error: boolean

    /** Only log to the file, print nothing */
    quiet: boolean

    /** Settings file */
    config?: string
}


/**
 * Streams and environment the command runs against.
 */
export interface CliIo {

    stdin: Readable
    stdout: Writable
    stderr: Writable
    env: NodeJS.ProcessEnv
    cwd: string
}
