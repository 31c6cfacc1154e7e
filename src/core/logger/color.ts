/**
 * Color Encoder
 *
 * Wraps tag text in ANSI escape sequences for terminal output.
 * The formatter never measures painted text; widths are computed
 * on the plain segments, so a painter may add any number of bytes.
 */
import ansis from 'ansis';

/**
 * Tags of a rendered message that can be colored.
 */
export type TagStyle = 'error' | 'file' | 'line';

/**
 * Encodes a piece of tag text for a given style.
 */
export type Painter = (text: string, style: TagStyle) => string;

const TAG_STYLES: Record<TagStyle, (text: string) => string> = {
    error: (text) => ansis.redBright(text),
    file: (text) => ansis.yellow(text),
    line: (text) => ansis.green(text),
};

/**
 * Painter backed by ansis.
 *
 * ansis detects color support itself and returns plain text when
 * the environment has none (NO_COLOR, dumb terminal, ...).
 */
export const ansiPainter: Painter = (text, style) => TAG_STYLES[style](text);

/**
 * Painter that leaves text unchanged.
 */
export const plainPainter: Painter = (text) => text;
