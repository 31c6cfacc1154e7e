/**
 * Shared test fixtures: temp directories, captured streams, a fixed
 * clock and a painter that marks styled segments.
 */
import { randomBytes } from 'node:crypto';
import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { Writable } from 'node:stream';

import type { Painter } from '../../src/core/logger/color.js';

/**
 * 2024-01-15 10:30:05 local time.
 */
export const FIXED_DATE = new Date(2024, 0, 15, 10, 30, 5);

export const fixedClock = (): Date => FIXED_DATE;

/**
 * Painter wrapping styled text in `<style>...</style>` markers.
 */
export const markerPainter: Painter = (text, style) => `<${style}>${text}</${style}>`;

/**
 * Create a fresh `tmp/test-<hex>` directory.
 */
export async function createTestDir(): Promise<string> {

    const dir = join(process.cwd(), 'tmp', `test-${randomBytes(4).toString('hex')}`);

    await mkdir(dir, { recursive: true });

    return dir;

}

export async function removeTestDir(dir: string): Promise<void> {

    await rm(dir, { recursive: true, force: true });

}

/**
 * Writable capturing every chunk written to it.
 *
 * @param isTTY - Pretend to be a terminal
 */
export function createMockStream(isTTY = false): { stream: Writable; output: string[] } {

    const output: string[] = [];
    const stream = new Writable({
        write(chunk, _encoding, callback) {

            output.push(String(chunk));
            callback();

        },
    });

    if (isTTY) {

        Object.assign(stream, { isTTY: true });

    }

    return { stream, output };

}
