/**
 * Environment variable overrides for settings.
 *
 * Uses makeNestedConfig to turn flat LINELOG_* variables into the
 * nested settings structure. Underscores map to object nesting.
 *
 * @example
 * ```bash
 * LINELOG_FILE_PATH=./logs/run.log
 * LINELOG_FILE_APPEND=false
 * LINELOG_FILE_SESSION=nightly
 * LINELOG_QUEUE_MAX=50
 * LINELOG_FORMAT_CLOCK=time
 * LINELOG_WRAP_TTY=false
 * LINELOG_WIDTH_FILE=120
 * ```
 */
import { makeNestedConfig } from '@logosdx/utils'

import type { SettingsInput } from './schema.js'


/**
 * Meta env vars that control tooling, not settings values.
 * These are excluded from makeNestedConfig processing.
 */
const META_ENV_VARS = new Set([
    'LINELOG_DEBUG',   // Observer spy
    'LINELOG_CONFIG',  // Settings file selection
])


/**
 * Read settings overrides from environment variables.
 *
 * Values of path-like keys are kept as strings.
 *
 * @example
 * ```typescript
 * // LINELOG_FILE_PATH=run.log LINELOG_QUEUE_MAX=50
 * getEnvSettings()
 * // { file: { path: 'run.log' }, queue: { max: 50 } }
 * ```
 */
export function getEnvSettings(env: NodeJS.ProcessEnv = process.env): SettingsInput {

    const vars: Record<string, string> = {}

    for (const [key, value] of Object.entries(env)) {

        if (value !== undefined) {

            vars[key] = value
        }
    }

    const { allConfigs } = makeNestedConfig<SettingsInput>(
        vars,
        {
            filter: (key) => key.startsWith('LINELOG_') && !META_ENV_VARS.has(key),
            stripPrefix: 'LINELOG_',
            forceAllCapToLower: true,
            skipConversion: (key) => /_(path|session)$/i.test(key),
        }
    )

    return allConfigs()
}


/**
 * Settings file named by LINELOG_CONFIG, if any.
 */
export function getEnvSettingsPath(env: NodeJS.ProcessEnv = process.env): string | undefined {

    return env['LINELOG_CONFIG'] || undefined
}
