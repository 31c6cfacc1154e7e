/**
 * Message Formatter
 *
 * Renders a message with its origin tag into one or more physical
 * lines. Pure: the clock, the width probe and the color encoder are
 * passed in.
 *
 * Layout of a rendered message:
 *
 * ```
 * <indent>(<timestamp>)  ERROR  [file | line | function()]: text........
 * <indent><extra indent>                                    continued....
 * ```
 *
 * The extra indent aligns continuation lines under the message text.
 * When the tag is wider than two thirds of the content width the
 * extra indent shrinks to one third.
 */
import { plainPainter, type Painter, type TagStyle } from './color.js'
import { makeDateTimeString } from './time.js'
import type { LoggerProperties, Origin } from './types.js'


/**
 * Width used when wrapping is off and no width applies.
 */
export const DEFAULT_LINE_WIDTH = 80


/**
 * How and where a message is rendered.
 */
export interface ComposeOptions {

    /** Add the ERROR tag */
    error: boolean

    /** Rendering for the log file (timestamp, never colored) */
    toFile: boolean

    /** Destination stream is a terminal */
    interactive: boolean

    /** Color encoder for tag segments */
    painter?: Painter

    /** Terminal width probe */
    terminalWidth?: () => number

    /** Clock for the timestamp */
    now?: () => Date
}


interface TagSegment {

    text: string
    style?: TagStyle
}


/**
 * Build the tag segments for a message.
 *
 * Empty strings count as absent. A line number without a file is dropped.
 *
 * @example
 * ```typescript
 * buildTag({ file: 'a.ts', line: 3 }, false, null)
 * // [{ text: '[' }, { text: 'a.ts', style: 'file' }, { text: ' | ' },
 * //  { text: '3', style: 'line' }, { text: ']: ' }]
 * ```
 */
export function buildTag(origin: Origin, error: boolean, timestamp: string | null): TagSegment[] {

    const segments: TagSegment[] = []

    if (timestamp !== null) {

        segments.push({ text: `(${timestamp}) ` })
    }

    if (error) {

        segments.push({ text: ' ERROR  ', style: 'error' })
    }

    const file = origin.file || ''
    const fn = origin.function || ''

    if (file) {

        segments.push({ text: '[' }, { text: file, style: 'file' })

        if (origin.line !== undefined) {

            segments.push({ text: ' | ' }, { text: String(origin.line), style: 'line' })
        }

        segments.push({ text: fn ? ' | ' : ']: ' })
    }

    if (fn) {

        segments.push({ text: file ? `${fn}()]: ` : `[${fn}()]: ` })
    }

    return segments
}


/**
 * Resolve the line width for a rendering target.
 */
export function resolveLineWidth(
    props: LoggerProperties,
    toFile: boolean,
    terminalWidth: () => number,
): number {

    const wrap = toFile ? props.wrapFile : props.wrapTTY

    if (!wrap) {

        return DEFAULT_LINE_WIDTH
    }

    if (toFile && props.maxLineWidthFile > 0) {

        return props.maxLineWidthFile
    }

    if (props.maxLineWidthTTY > 0) {

        return props.maxLineWidthTTY
    }

    return terminalWidth()
}


/**
 * Split text into logical lines.
 *
 * A trailing newline does not produce a trailing empty line.
 */
export function splitLogicalLines(text: string): string[] {

    if (text === '') {

        return []
    }

    const lines = text.split('\n')

    if (lines[lines.length - 1] === '') {

        lines.pop()
    }

    return lines
}


/**
 * Cut a line into chunks, the first `firstWidth` characters long and
 * the rest `restWidth` long. Always returns at least one chunk.
 *
 * Widths count code points; a surrogate pair is never split.
 */
export function chunkLine(line: string, firstWidth: number, restWidth: number): string[] {

    const first = Math.max(1, firstWidth)
    const rest = Math.max(1, restWidth)
    const chars = Array.from(line)

    const chunks = [chars.slice(0, first).join('')]

    for (let pos = first; pos < chars.length; pos += rest) {

        chunks.push(chars.slice(pos, pos + rest).join(''))
    }

    return chunks
}


/**
 * Render a message.
 *
 * @example
 * ```typescript
 * composeMessage(
 *     { file: 'main.ts', line: 10, function: 'main' },
 *     'starting',
 *     { ...DEFAULT_PROPERTIES, timestamp: false },
 *     { error: false, toFile: true, interactive: false },
 * )
 * // '[main.ts | 10 | main()]: starting'
 * ```
 */
export function composeMessage(
    origin: Origin,
    text: string,
    props: LoggerProperties,
    options: ComposeOptions,
): string {

    const { error, toFile, interactive } = options
    const terminalWidth = options.terminalWidth ?? (() => DEFAULT_LINE_WIDTH)
    const now = options.now ?? (() => new Date())

    const painter = props.color && !toFile && interactive
        ? options.painter ?? plainPainter
        : plainPainter

    const indent = ' '.repeat(Math.max(0, props.indent))
    const wrap = toFile ? props.wrapFile : props.wrapTTY
    const contentWidth = Math.max(1, resolveLineWidth(props, toFile, terminalWidth) - indent.length)

    const timestamp = toFile && props.timestamp
        ? makeDateTimeString(now(), props.timestampFormat)
        : null

    const tag = buildTag(origin, error, timestamp)

    let extraWidth = tag.reduce((width, segment) => width + Array.from(segment.text).length, 0)

    if (extraWidth > Math.floor(2 * contentWidth / 3)) {

        extraWidth = Math.floor(contentWidth / 3)
    }

    const head = indent + tag
        .map((segment) => segment.style ? painter(segment.text, segment.style) : segment.text)
        .join('')

    const continuation = indent + (props.extraIndent ? ' '.repeat(extraWidth) : '')
    const logical = splitLogicalLines(text)

    let physical: string[]

    if (wrap) {

        const firstWidth = Math.max(1, contentWidth - extraWidth)
        const restWidth = props.extraIndent ? firstWidth : contentWidth

        physical = logical.flatMap((line, index) => chunkLine(
            line,
            index === 0 ? firstWidth : restWidth,
            restWidth,
        ))
    }
    else {

        physical = logical
    }

    const [first = '', ...rest] = physical

    return [head + first, ...rest.map((line) => continuation + line)].join('\n')
}
