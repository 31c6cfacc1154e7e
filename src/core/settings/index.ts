/**
 * Settings Module
 *
 * Logger settings from a YAML file, LINELOG_* environment variables
 * and command line flags.
 */

// Schemas and Validation
export {
    SettingsSchema,
    SettingsValidationError,
    parseSettings,
} from './schema.js';

export type { Settings, SettingsInput } from './schema.js';

// Environment
export { getEnvSettings, getEnvSettingsPath } from './env.js';

// Loading
export {
    DEFAULT_SETTINGS_FILE,
    loadSettings,
    readSettingsFile,
    toLoggerOptions,
    type LoadSettingsOptions,
} from './loader.js';
