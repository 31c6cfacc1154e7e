#!/usr/bin/env node
/**
 * CLI entry point for linelog.
 *
 * Parses command line arguments and runs the command against
 * the process streams.
 */
import { parseCli } from './parse.js'
import { runCli } from './run.js'


/**
 * Main entry point.
 */
async function main(): Promise<void> {

    const { input, flags } = parseCli()

    const exitCode = await runCli(input, flags, {
        stdin: process.stdin,
        stdout: process.stdout,
        stderr: process.stderr,
        env: process.env,
        cwd: process.cwd(),
    })

    process.exitCode = exitCode
}


// Run main
main().catch((error) => {

    console.error('Fatal error:', error)
    process.exit(1)
})
