/**
 * Environment Detection
 *
 * Utilities for inspecting the terminal the process writes to.
 * Used by the logger to pick line widths and to decide whether
 * color escapes make sense for a stream.
 */
import type { Writable } from 'node:stream';

/**
 * Width used when no terminal is attached.
 */
export const FALLBACK_TERMINAL_WIDTH = 80;

/**
 * Probe the width of the terminal attached to stdout.
 *
 * @example
 * ```typescript
 * getTerminalWidth()  // 120 in a wide terminal, 80 when piped
 * ```
 */
export function getTerminalWidth(): number {

    const columns = process.stdout.columns;

    if (typeof columns === 'number' && columns > 0) {

        return columns;

    }

    return FALLBACK_TERMINAL_WIDTH;

}

/**
 * Check whether a stream is connected to an interactive terminal.
 *
 * Plain `Writable` streams (files, pipes, test doubles) are never
 * interactive; `tty.WriteStream` exposes `isTTY`.
 */
export function isInteractive(stream: Writable): boolean {

    return 'isTTY' in stream && stream.isTTY === true;

}

/**
 * Check if debug output of the event bus is enabled.
 *
 * @returns true if LINELOG_DEBUG is set
 */
export function isDebug(): boolean {

    const debug = process.env['LINELOG_DEBUG'];

    return debug === '1' || debug === 'true';

}
