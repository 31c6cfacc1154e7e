/**
 * linelog command.
 *
 * Tees messages to the terminal and a log file. Messages come from the
 * positional arguments (joined into one message) or, without
 * arguments, from stdin, one message per line.
 *
 * @example
 * ```bash
 * linelog -f build.log -n nightly "starting build"
 * make 2>&1 | linelog -f build.log --source make
 * linelog -e -f build.log "build failed"
 * ```
 */
import { createInterface } from 'node:readline'
import { attempt } from '@logosdx/utils'

import { buildGlobalLogger, deleteGlobalLogger } from '../core/logger/registry.js'
import type { Logger } from '../core/logger/logger.js'
import type { Origin, Status } from '../core/logger/types.js'
import { loadSettings, toLoggerOptions } from '../core/settings/loader.js'
import type { SettingsInput } from '../core/settings/schema.js'
import type { CliFlags, CliIo } from './types.js'


/**
 * Statuses that make the command exit with code 1.
 */
const FAILURES = new Set<Status>(['open-failed', 'write-failed', 'invalid-use'])


/**
 * Run the command.
 *
 * @returns process exit code
 */
export async function runCli(input: string[], flags: CliFlags, io: CliIo): Promise<number> {

    const [settings, settingsErr] = await attempt(() => loadSettings({
        path: flags.config,
        cwd: io.cwd,
        env: io.env,
        overrides: flagsToSettings(flags),
    }))

    if (settingsErr) {

        io.stderr.write(`linelog: ${settingsErr.message}\n`)

        return 1
    }

    const logger = await buildGlobalLogger({
        ...toLoggerOptions(settings),
        stdout: io.stdout,
        stderr: io.stderr,
    })

    const origin: Origin = flags.source ? { file: flags.source } : {}
    let failed = false

    const emit = async (message: string): Promise<void> => {

        const status = await sendMessage(logger, origin, message, flags)

        if (FAILURES.has(status)) {

            failed = true
        }
    }

    if (input.length > 0) {

        await emit(input.join(' '))
    }
    else {

        const lines = createInterface({ input: io.stdin, crlfDelay: Infinity })

        for await (const line of lines) {

            await emit(line)
        }
    }

    const closed = await deleteGlobalLogger()

    return failed || FAILURES.has(closed) ? 1 : 0
}


/**
 * Settings overrides for the flags that were given.
 */
export function flagsToSettings(flags: CliFlags): SettingsInput {

    const file: NonNullable<SettingsInput['file']> = {}

    if (flags.file !== undefined) {

        file.path = flags.file
    }

    if (flags.append !== undefined) {

        file.append = flags.append
    }

    if (flags.name !== undefined) {

        file.session = flags.name
    }

    return Object.keys(file).length ? { file } : {}
}


function sendMessage(logger: Logger, origin: Origin, message: string, flags: CliFlags): Promise<Status> {

    if (flags.quiet) {

        return flags.error
            ? logger.logError(origin, message)
            : logger.logMessage(origin, message)
    }

    return flags.error
        ? logger.reportError(origin, message)
        : logger.reportMessage(origin, message)
}
