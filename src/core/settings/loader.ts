/**
 * Settings loader.
 *
 * Priority order (highest to lowest):
 * 1. Overrides (CLI flags)
 * 2. Environment variables
 * 3. Settings file
 * 4. Defaults
 */
import { access, readFile } from 'node:fs/promises'
import { resolve } from 'node:path'
import { attempt, clone, merge } from '@logosdx/utils'
import { parse as parseYaml } from 'yaml'

import { observer } from '../observer.js'
import type { LoggerOptions } from '../logger/types.js'
import { getEnvSettings, getEnvSettingsPath } from './env.js'
import { parseSettings, type Settings, type SettingsInput } from './schema.js'


/**
 * Settings file looked up in the working directory when none is named.
 */
export const DEFAULT_SETTINGS_FILE = 'linelog.yml'


export interface LoadSettingsOptions {

    /** Settings file; a named file must exist */
    path?: string

    /** Directory searched for the default settings file */
    cwd?: string

    /** Environment to read LINELOG_* overrides from */
    env?: NodeJS.ProcessEnv

    /** Highest priority values, typically from CLI flags */
    overrides?: SettingsInput
}


/**
 * Read and validate a settings file.
 *
 * An empty file yields the defaults.
 *
 * @throws Error if the file cannot be read or is not valid YAML
 * @throws SettingsValidationError if the content violates the schema
 */
export async function readSettingsFile(path: string): Promise<Settings> {

    const [content, readErr] = await attempt(() => readFile(path, 'utf-8'))

    if (readErr) {

        throw new Error(`Failed to read settings file: ${readErr.message}`, { cause: readErr })
    }

    const text = content
    const [parsed, yamlErr] = await attempt(async () => parseYaml(text))

    if (yamlErr) {

        throw new Error(`Invalid YAML in settings file: ${yamlErr.message}`, { cause: yamlErr })
    }

    return parseSettings(parsed ?? {})
}


/**
 * Load settings from file, environment and overrides.
 *
 * @example
 * ```typescript
 * const settings = await loadSettings({ path: 'linelog.yml' })
 * const logger = new Logger(toLoggerOptions(settings))
 * ```
 */
export async function loadSettings(options: LoadSettingsOptions = {}): Promise<Settings> {

    const env = options.env ?? process.env
    const path = await findSettingsFile(options, env)

    const fromFile = path ? await readSettingsFile(path) : parseSettings({})

    const merged = merge(
        merge(clone(fromFile), getEnvSettings(env)),
        options.overrides ?? {}
    )

    const settings = parseSettings(merged)

    observer.emit('settings:loaded', { path, settings })

    return settings
}


/**
 * Map settings to logger construction options.
 */
export function toLoggerOptions(settings: Settings): LoggerOptions {

    return {
        file: settings.file.path ?? null,
        append: settings.file.append,
        sessionName: settings.file.session,
        maxQueueLength: settings.queue.max,
        properties: {
            color: settings.format.color,
            timestamp: settings.format.timestamp,
            timestampFormat: settings.format.clock,
            indent: settings.format.indent,
            extraIndent: settings.format.align,
            wrapTTY: settings.wrap.tty,
            wrapFile: settings.wrap.file,
            maxLineWidthTTY: settings.width.tty,
            maxLineWidthFile: settings.width.file,
        },
    }
}


async function findSettingsFile(
    options: LoadSettingsOptions,
    env: NodeJS.ProcessEnv,
): Promise<string | null> {

    const named = options.path ?? getEnvSettingsPath(env)

    if (named) {

        return named
    }

    const fallback = resolve(options.cwd ?? process.cwd(), DEFAULT_SETTINGS_FILE)
    const [, missing] = await attempt(() => access(fallback))

    return missing ? null : fallback
}
