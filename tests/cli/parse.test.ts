/**
 * linelog argument parsing tests.
 */
import { describe, it, expect } from 'vitest'

import { parseCli } from '../../src/cli/parse.js'
import { flagsToSettings } from '../../src/cli/run.js'


describe('cli: parseCli', () => {

    it('should leave append undefined when the flag is omitted', () => {

        const { input, flags } = parseCli(['-f', 'x.log', 'hi'])

        expect(input).toEqual(['hi'])
        expect(flags.file).toBe('x.log')
        expect(flags.append).toBeUndefined()

    })

    it('should not override the file mode when append is omitted', () => {

        const { flags } = parseCli(['-f', 'x.log', 'hi'])

        expect(flagsToSettings(flags)).toEqual({ file: { path: 'x.log' } })

    })

    it('should turn --no-append into truncation', () => {

        const { flags } = parseCli(['-f', 'x.log', '--no-append', 'hi'])

        expect(flags.append).toBe(false)

    })

    it('should accept an explicit --append', () => {

        const { flags } = parseCli(['--append', 'hi'])

        expect(flags.append).toBe(true)

    })

    it('should default error and quiet to false', () => {

        const { flags } = parseCli(['hi'])

        expect(flags.error).toBe(false)
        expect(flags.quiet).toBe(false)

    })

    it('should read short flags', () => {

        const { input, flags } = parseCli(['-e', '-q', '-n', 'nightly', '-s', 'make', '-c', 'alt.yml'])

        expect(input).toEqual([])
        expect(flags).toEqual({
            file: undefined,
            append: undefined,
            name: 'nightly',
            source: 'make',
            error: true,
            quiet: true,
            config: 'alt.yml',
        })

    })

})
