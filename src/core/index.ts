/**
 * Core module exports.
 *
 * Everything the package offers is exported from here.
 * The CLI imports the modules it needs directly.
 */

// Observer
export { observer } from './observer.js'
export type { LinelogEvents, LinelogEventNames } from './observer.js'

// Environment
export { getTerminalWidth, isInteractive, FALLBACK_TERMINAL_WIDTH } from './environment.js'

// Logger
export * from './logger/index.js'

// Settings
export * from './settings/index.js'
