import { describe, it, expect } from 'vitest';

import {
    composeMessage,
    buildTag,
    resolveLineWidth,
    splitLogicalLines,
    chunkLine,
    type ComposeOptions,
} from '../../../src/core/logger/formatter.js';
import { DEFAULT_PROPERTIES, type LoggerProperties, type Origin } from '../../../src/core/logger/types.js';
import { fixedClock, markerPainter } from '../../utils/fixtures.js';

/**
 * Terminal rendering without wrapping, color or timestamp.
 */
const PLAIN: LoggerProperties = {
    ...DEFAULT_PROPERTIES,
    color: false,
    timestamp: false,
    wrapTTY: false,
    wrapFile: false,
};

function render(
    origin: Origin,
    text: string,
    props: Partial<LoggerProperties> = {},
    options: Partial<ComposeOptions> = {},
): string {

    return composeMessage(origin, text, { ...PLAIN, ...props }, {
        error: false,
        toFile: false,
        interactive: false,
        now: fixedClock,
        terminalWidth: () => 80,
        ...options,
    });

}

describe('logger: formatter', () => {

    describe('origin tag', () => {

        it('should render file, line and function', () => {

            const result = render({ file: 'main.ts', line: 10, function: 'main' }, 'starting');

            expect(result).toBe('[main.ts | 10 | main()]: starting');

        });

        it('should render file and line', () => {

            expect(render({ file: 'main.ts', line: 10 }, 'x')).toBe('[main.ts | 10]: x');

        });

        it('should omit the line when only the file is known', () => {

            expect(render({ file: 'main.ts' }, 'x')).toBe('[main.ts]: x');

        });

        it('should render file and function without a line', () => {

            expect(render({ file: 'main.ts', function: 'main' }, 'x')).toBe('[main.ts | main()]: x');

        });

        it('should render a function alone', () => {

            expect(render({ function: 'main' }, 'x')).toBe('[main()]: x');

        });

        it('should ignore a lone line number', () => {

            expect(render({ line: 5 }, 'x')).toBe('x');

        });

        it('should treat empty strings as absent', () => {

            expect(render({ file: '', function: '' }, 'x')).toBe('x');

        });

        it('should add the error tag before the origin', () => {

            const result = render({ function: 'main' }, 'boom', {}, { error: true });

            expect(result).toBe(' ERROR  [main()]: boom');

        });

        it('should build styled segments', () => {

            expect(buildTag({ file: 'a.ts', line: 3 }, false, null)).toEqual([
                { text: '[' },
                { text: 'a.ts', style: 'file' },
                { text: ' | ' },
                { text: '3', style: 'line' },
                { text: ']: ' },
            ]);

        });

    });

    describe('timestamp', () => {

        it('should prefix file entries with date and time', () => {

            const result = render({ function: 'main' }, 'x', { timestamp: true }, { toFile: true });

            expect(result).toBe('(2024-01-15|10:30:05) [main()]: x');

        });

        it('should honor the timestamp format', () => {

            const result = render({}, 'x', { timestamp: true, timestampFormat: 'time' }, { toFile: true });

            expect(result).toBe('(10:30:05) x');

        });

        it('should not timestamp terminal output', () => {

            expect(render({}, 'x', { timestamp: true })).toBe('x');

        });

        it('should not timestamp when disabled', () => {

            expect(render({}, 'x', { timestamp: false }, { toFile: true })).toBe('x');

        });

    });

    describe('color', () => {

        const origin: Origin = { file: 'a.ts', line: 3 };

        it('should paint tag segments on interactive terminals', () => {

            const result = render(origin, 'x', { color: true }, {
                error: true,
                interactive: true,
                painter: markerPainter,
            });

            expect(result).toBe('<error> ERROR  </error>[<file>a.ts</file> | <line>3</line>]: x');

        });

        it('should not paint file entries', () => {

            const result = render(origin, 'x', { color: true }, {
                toFile: true,
                interactive: true,
                painter: markerPainter,
            });

            expect(result).toBe('[a.ts | 3]: x');

        });

        it('should not paint non-interactive streams', () => {

            const result = render(origin, 'x', { color: true }, { painter: markerPainter });

            expect(result).toBe('[a.ts | 3]: x');

        });

        it('should not paint when color is off', () => {

            const result = render(origin, 'x', { color: false }, {
                interactive: true,
                painter: markerPainter,
            });

            expect(result).toBe('[a.ts | 3]: x');

        });

        it('should measure the extra indent without escape bytes', () => {

            const result = render(origin, 'a'.repeat(70), {
                color: true,
                wrapTTY: true,
                maxLineWidthTTY: 40,
            }, {
                interactive: true,
                painter: markerPainter,
            });

            // tag '[a.ts | 3]: ' is 12 columns wide, leaving 28 per line
            expect(result).toBe(
                '[<file>a.ts</file> | <line>3</line>]: ' + 'a'.repeat(28) + '\n'
                + ' '.repeat(12) + 'a'.repeat(28) + '\n'
                + ' '.repeat(12) + 'a'.repeat(14),
            );

        });

    });

    describe('wrapping off', () => {

        it('should return the text unchanged without an origin', () => {

            expect(render({}, 'hello world')).toBe('hello world');

        });

        it('should keep long lines whole', () => {

            const text = 'x'.repeat(200);

            expect(render({}, text)).toBe(text);

        });

        it('should align later logical lines under the text', () => {

            const result = render({ function: 'fn' }, 'first\nsecond');

            expect(result).toBe('[fn()]: first\n        second');

        });

        it('should not align later lines when extra indent is off', () => {

            const result = render({ function: 'fn' }, 'first\nsecond', { extraIndent: false });

            expect(result).toBe('[fn()]: first\nsecond');

        });

    });

    describe('wrapping on', () => {

        it('should split at the line width', () => {

            const result = render({}, 'abcdefghijklmnopqrstuvwxyz0123456789', {
                wrapTTY: true,
                maxLineWidthTTY: 20,
            });

            expect(result).toBe('abcdefghijklmnopqrst\nuvwxyz0123456789');

        });

        it('should give continuation lines the width left after the tag', () => {

            const result = render({ function: 'fn' }, 'a'.repeat(50), {
                wrapTTY: true,
                maxLineWidthTTY: 30,
            });

            expect(result).toBe(
                '[fn()]: ' + 'a'.repeat(22) + '\n'
                + ' '.repeat(8) + 'a'.repeat(22) + '\n'
                + ' '.repeat(8) + 'a'.repeat(6),
            );

        });

        it('should use the full width for continuations when extra indent is off', () => {

            const result = render({ function: 'fn' }, 'a'.repeat(50), {
                wrapTTY: true,
                maxLineWidthTTY: 30,
                extraIndent: false,
            });

            expect(result).toBe('[fn()]: ' + 'a'.repeat(22) + '\n' + 'a'.repeat(28));

        });

        it('should indent every physical line', () => {

            const result = render({}, 'abcdefghijklmnop', {
                wrapTTY: true,
                maxLineWidthTTY: 14,
                indent: 4,
            });

            expect(result).toBe('    abcdefghij\n    klmnop');

        });

        it('should shrink an extra indent wider than two thirds of the line', () => {

            const origin = { file: 'very/long/path/to/source.ts', line: 120, function: 'handler' };
            const tag = '[very/long/path/to/source.ts | 120 | handler()]: ';

            const result = render(origin, 'x'.repeat(30), {
                wrapTTY: true,
                maxLineWidthTTY: 30,
            });

            expect(result).toBe(tag + 'x'.repeat(20) + '\n' + ' '.repeat(10) + 'x'.repeat(10));

        });

        it('should make progress when the indent exceeds the line width', () => {

            const result = render({ function: 'f' }, 'abc', {
                wrapTTY: true,
                maxLineWidthTTY: 5,
                indent: 10,
            });

            const pad = ' '.repeat(10);

            expect(result).toBe(`${pad}[f()]: a\n${pad}b\n${pad}c`);

        });

        it('should probe the terminal when no width is configured', () => {

            const result = render({}, 'abcdefghij', { wrapTTY: true }, { terminalWidth: () => 4 });

            expect(result).toBe('abcd\nefgh\nij');

        });

        it('should wrap file entries at the file width', () => {

            const result = render({}, 'abcdefghij', {
                wrapFile: true,
                maxLineWidthTTY: 8,
                maxLineWidthFile: 5,
            }, { toFile: true });

            expect(result).toBe('abcde\nfghij');

        });

        it('should not split a surrogate pair at the wrap boundary', () => {

            const result = render({}, 'ab\u{1F600}cd', {
                wrapFile: true,
                maxLineWidthFile: 3,
            }, { toFile: true });

            expect(result.split('\n')).toEqual(['ab\u{1F600}', 'cd']);
            expect(Buffer.from(result.replace('\n', ''), 'utf-8').toString('utf-8')).toBe('ab\u{1F600}cd');

        });

        it('should keep empty logical lines', () => {

            const result = render({}, 'a\n\nb', { wrapTTY: true });

            expect(result).toBe('a\n\nb');

        });

        it('should produce ceil(L / width) lines that join back to the input', () => {

            for (let length = 1; length <= 30; length++) {

                const text = 'abcdefghijklmnopqrstuvwxyz0123'.slice(0, length);
                const lines = render({}, text, { wrapTTY: true, maxLineWidthTTY: 7 }).split('\n');

                expect(lines).toHaveLength(Math.ceil(length / 7));
                expect(lines.join('')).toBe(text);

            }

        });

    });

    describe('edge cases', () => {

        it('should render only the tag for empty text', () => {

            expect(render({ function: 'f' }, '')).toBe('[f()]: ');

        });

        it('should ignore a trailing newline', () => {

            expect(render({}, 'abc\n')).toBe('abc');

        });

    });

    describe('helpers', () => {

        it('should split logical lines', () => {

            expect(splitLogicalLines('')).toEqual([]);
            expect(splitLogicalLines('a\nb\n')).toEqual(['a', 'b']);
            expect(splitLogicalLines('\n')).toEqual(['']);

        });

        it('should chunk lines with separate first and rest widths', () => {

            expect(chunkLine('abcdefgh', 3, 2)).toEqual(['abc', 'de', 'fg', 'h']);
            expect(chunkLine('', 3, 2)).toEqual(['']);
            expect(chunkLine('abc', 0, 0)).toEqual(['a', 'b', 'c']);
            expect(chunkLine('a\u{1F600}\u{1F600}b', 2, 1)).toEqual(['a\u{1F600}', '\u{1F600}', 'b']);

        });

        it('should resolve line widths per destination', () => {

            const probe = (): number => 33;

            expect(resolveLineWidth({ ...PLAIN, wrapFile: true, maxLineWidthTTY: 50 }, true, probe)).toBe(50);
            expect(resolveLineWidth({ ...PLAIN, wrapFile: true, maxLineWidthFile: 70 }, true, probe)).toBe(70);
            expect(resolveLineWidth({ ...PLAIN, wrapFile: true }, true, probe)).toBe(33);
            expect(resolveLineWidth({ ...PLAIN, wrapTTY: true, maxLineWidthFile: 70 }, false, probe)).toBe(33);
            expect(resolveLineWidth({ ...PLAIN, maxLineWidthTTY: 50 }, false, probe)).toBe(80);

        });

    });

});
