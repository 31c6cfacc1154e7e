/**
 * Report Helpers
 *
 * Shorthands that tag a message with the caller's location and send it
 * through the global logger. Without a global logger the message is
 * printed to the console and nothing is logged.
 *
 * @example
 * ```typescript
 * await buildGlobalLogger({ file: 'run.log' })
 *
 * await repMsg('loading config')    // [src/main.ts | 12 | main()]: loading config
 * await repErr('config not found')  //  ERROR  [src/main.ts | 14 | main()]: config not found
 * ```
 */
import { isAbsolute, relative } from 'node:path'
import { fileURLToPath } from 'node:url'

import { getGlobalLogger } from './registry.js'
import type { Origin, Status } from './types.js'


const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):\d+\)?$/


/**
 * Parse one line of a V8 stack trace.
 *
 * Understands `at fn (path:line:col)`, `at path:line:col`,
 * `at async fn (...)` and `file://` URLs.
 *
 * @example
 * ```typescript
 * parseStackFrame('    at main (/app/src/main.ts:12:5)')
 * // { file: '/app/src/main.ts', line: 12, function: 'main' }
 *
 * parseStackFrame('    at file:///app/src/main.js:3:1')
 * // { file: '/app/src/main.js', line: 3 }
 * ```
 */
export function parseStackFrame(frame: string): Origin | null {

    const match = FRAME_PATTERN.exec(frame)

    if (!match) {

        return null
    }

    const [, fn, location = '', line = ''] = match

    const file = location.startsWith('file://')
        ? fileURLToPath(location)
        : location

    const origin: Origin = { file, line: Number(line) }
    const name = fn?.replace(/^async /, '')

    if (name) {

        origin.function = name
    }

    return origin
}


/**
 * Location of the function that called `captureOrigin()`.
 *
 * @param skip - Additional frames to skip, for helpers that wrap this call
 * @returns file relative to the working directory, line and function name;
 * empty when the stack is not available
 */
export function captureOrigin(skip = 0): Origin {

    const frames = (new Error().stack ?? '').split('\n').slice(1)
    const frame = frames[1 + skip]
    const origin = frame ? parseStackFrame(frame) : null

    if (!origin) {

        return {}
    }

    if (origin.file && isAbsolute(origin.file)) {

        origin.file = relative(process.cwd(), origin.file)
    }

    return origin
}


/**
 * Print and log a message without a tag through the global logger.
 */
export async function repRaw(message: string): Promise<Status> {

    const logger = getGlobalLogger()

    if (!logger) {

        console.log(message)

        return 'no-log-file'
    }

    return logger.reportRaw(message)
}


/**
 * Print and log a message tagged with the caller's location.
 */
export async function repMsg(message: string): Promise<Status> {

    const origin = captureOrigin(1)
    const logger = getGlobalLogger()

    if (!logger) {

        console.log(`${formatFallbackTag(origin)}${message}`)

        return 'no-log-file'
    }

    return logger.reportMessage(origin, message)
}


/**
 * Print and log an error tagged with the caller's location.
 */
export async function repErr(message: string): Promise<Status> {

    const origin = captureOrigin(1)
    const logger = getGlobalLogger()

    if (!logger) {

        console.error(`ERROR ${formatFallbackTag(origin)}${message}`)

        return 'no-log-file'
    }

    return logger.reportError(origin, message)
}


/**
 * Console tag used when there is no global logger.
 *
 * @example
 * ```typescript
 * formatFallbackTag({ file: 'main.ts', line: 3, function: 'main' })  // '[main.ts | 3 | main]: '
 * formatFallbackTag({})                                              // ''
 * ```
 */
export function formatFallbackTag(origin: Origin): string {

    const parts = [origin.file, origin.line, origin.function]
        .filter((part) => part !== undefined && part !== '')
        .map(String)

    return parts.length ? `[${parts.join(' | ')}]: ` : ''
}
