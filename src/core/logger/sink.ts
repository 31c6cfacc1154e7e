/**
 * File Sink
 *
 * Owns the log file target and its header state. The file is opened
 * and closed on every call; no descriptor outlives an operation.
 *
 * Header layout:
 *
 * ```
 * -----------------------------
 *      nightly
 *      2024-01-15|10:30:05
 * -----------------------------
 * ```
 *
 * The rule is `max(19, name.length) + 10` dashes long. In append mode
 * a blank line separates the header from earlier content.
 */
import { open } from 'node:fs/promises'
import { attempt } from '@logosdx/utils'

import { FileOpenError, WriteError } from './errors.js'
import { makeDateTimeString } from './time.js'


const TIMESTAMP_WIDTH = 19
const HEADER_PADDING = 5


/**
 * Build the header block for a session.
 *
 * @example
 * ```typescript
 * buildHeader('', new Date(2024, 0, 15, 10, 30, 5))
 * // '-----------------------------\n     2024-01-15|10:30:05\n-----------------------------\n'
 * ```
 */
export function buildHeader(sessionName: string, now: Date): string {

    const rule = '-'.repeat(Math.max(TIMESTAMP_WIDTH, sessionName.length) + 2 * HEADER_PADDING)
    const pad = ' '.repeat(HEADER_PADDING)

    const lines = [rule]

    if (sessionName) {

        lines.push(pad + sessionName)
    }

    lines.push(pad + makeDateTimeString(now), rule)

    return lines.join('\n') + '\n'
}


/**
 * Log file target with lazy session header.
 *
 * @example
 * ```typescript
 * const sink = new FileSink('run.log', false)
 *
 * await sink.ensureHeader('nightly', new Date())  // truncates, writes header
 * await sink.appendLines(['a', 'b'])
 * await sink.ensureHeader('nightly', new Date())  // no-op
 * ```
 */
export class FileSink {

    #path: string | null
    #append: boolean
    #headerWritten = false
    #truncatePending: boolean

    constructor(path: string | null, append = true) {

        this.#path = path || null
        this.#append = append
        this.#truncatePending = !append
    }


    get path(): string | null {

        return this.#path
    }


    get append(): boolean {

        return this.#append
    }


    get headerWritten(): boolean {

        return this.#headerWritten
    }


    /**
     * Switch to another file (or none) and reset the header state.
     *
     * Content already written to either file is left alone.
     */
    setTarget(path: string | null, append = true): void {

        this.#path = path || null
        this.#append = append
        this.#headerWritten = false
        this.#truncatePending = !append
    }


    /**
     * Write the session header unless this session already has one.
     */
    async ensureHeader(sessionName = '', now: Date = new Date()): Promise<void> {

        if (this.#headerWritten) {

            return
        }

        await this.writeHeader(sessionName, now)
    }


    /**
     * Write a session header now.
     *
     * The first header of a session in truncate mode replaces the file
     * content; every other header is appended after a blank line.
     */
    async writeHeader(sessionName = '', now: Date = new Date()): Promise<void> {

        const truncate = this.#truncatePending
        const header = buildHeader(sessionName, now)

        await this.#write(truncate ? header : '\n' + header, truncate ? 'w' : 'a')

        this.#headerWritten = true
        this.#truncatePending = false
    }


    /**
     * Append lines to the file in a single write.
     */
    async appendLines(lines: readonly string[]): Promise<void> {

        if (lines.length === 0) {

            return
        }

        await this.#write(lines.map((line) => line + '\n').join(''), 'a')
    }


    async #write(content: string, flag: 'a' | 'w'): Promise<void> {

        const path = this.#path

        if (path === null) {

            throw new Error('No log file configured')
        }

        const [handle, openErr] = await attempt(() => open(path, flag))

        if (openErr) {

            throw new FileOpenError(path, openErr)
        }

        const file = handle

        const [, writeErr] = await attempt(() => file.writeFile(content, 'utf-8'))
        const [, closeErr] = await attempt(() => file.close())

        if (writeErr) {

            throw new WriteError(path, writeErr)
        }

        if (closeErr) {

            throw new WriteError(path, closeErr)
        }
    }
}
