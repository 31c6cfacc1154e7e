/**
 * Command line parsing for linelog.
 */
import meow from 'meow'

import type { CliFlags } from './types.js'


/**
 * Help text for the CLI.
 */
const HELP_TEXT = `
  Usage
    $ linelog [message...]

  Without a message, every line read from stdin is a message.

  Options
    --file, -f <path>    Mirror messages into a log file
    --no-append          Truncate the log file instead of appending
    --name, -n <name>    Session name written in the file header
    --source, -s <file>  Origin shown in the message tag
    --error, -e          Report messages as errors
    --quiet, -q          Only write the log file
    --config, -c <path>  Settings file (default: linelog.yml)
    --help, -h           Show this help
    --version            Show version

  Environment
    LINELOG_<SECTION>_<KEY>  Override a setting, e.g. LINELOG_QUEUE_MAX=50
    LINELOG_DEBUG=1          Print logger events to stderr

  Examples
    $ linelog -f build.log -n nightly "starting build"
    $ make 2>&1 | linelog -f build.log --source make
`


/**
 * Parse CLI arguments with meow.
 *
 * Boolean flags without a default stay undefined when absent, so an
 * omitted `--append` leaves the settings file and environment in charge.
 *
 * @example
 * ```typescript
 * parseCli(['-f', 'run.log', 'hello'])
 * // { input: ['hello'], flags: { file: 'run.log', append: undefined, ... } }
 * ```
 */
export function parseCli(argv: readonly string[] = process.argv.slice(2)): { input: string[]; flags: CliFlags } {

    const cli = meow(HELP_TEXT, {
        importMeta: import.meta,
        argv,
        booleanDefault: undefined,
        flags: {
            file: {
                type: 'string',
                shortFlag: 'f'
            },
            append: {
                type: 'boolean'
            },
            name: {
                type: 'string',
                shortFlag: 'n'
            },
            source: {
                type: 'string',
                shortFlag: 's'
            },
            error: {
                type: 'boolean',
                shortFlag: 'e',
                default: false
            },
            quiet: {
                type: 'boolean',
                shortFlag: 'q',
                default: false
            },
            config: {
                type: 'string',
                shortFlag: 'c'
            }
        }
    })

    const flags: CliFlags = {
        file: cli.flags.file,
        append: cli.flags.append,
        name: cli.flags.name,
        source: cli.flags.source,
        error: cli.flags.error,
        quiet: cli.flags.quiet,
        config: cli.flags.config
    }

    return { input: cli.input, flags }
}
