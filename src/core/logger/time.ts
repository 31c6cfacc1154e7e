/**
 * Time Helpers
 *
 * Locale independent date/time strings for message timestamps,
 * session headers and generated log file names.
 */
import dayjs from 'dayjs'

import type { TimestampFormat } from './types.js'


const FORMATS: Record<TimestampFormat, string> = {
    datetime: 'YYYY-MM-DD|HH:mm:ss',
    date: 'YYYY-MM-DD',
    time: 'HH:mm:ss',
}


/**
 * Format a date in local time.
 *
 * @example
 * ```typescript
 * makeDateTimeString(new Date(2024, 0, 15, 10, 30, 5))
 * // '2024-01-15|10:30:05'
 *
 * makeDateTimeString(new Date(2024, 0, 15, 10, 30, 5), 'time')
 * // '10:30:05'
 * ```
 */
export function makeDateTimeString(
    date: Date = new Date(),
    format: TimestampFormat = 'datetime',
): string {

    return dayjs(date).format(FORMATS[format])
}


/**
 * Make a name for a log file.
 *
 * Format: `<name>_<date>T<time>.log`, with `:` replaced by `-` so the
 * result is valid on every filesystem. The underscore is omitted
 * when no name is given.
 *
 * @example
 * ```typescript
 * makeLogName('nightly', new Date(2024, 0, 15, 10, 30, 5))
 * // 'nightly_2024-01-15T10-30-05.log'
 *
 * makeLogName('', new Date(2024, 0, 15, 10, 30, 5))
 * // '2024-01-15T10-30-05.log'
 * ```
 */
export function makeLogName(name = '', date: Date = new Date()): string {

    const stamp = makeDateTimeString(date)
        .replace(/:/g, '-')
        .replace(/\|/g, 'T')

    return name ? `${name}_${stamp}.log` : `${stamp}.log`
}
