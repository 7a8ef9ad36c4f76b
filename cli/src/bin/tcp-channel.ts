#!/usr/bin/env tsx
/**
 * CLI entrypoint for tcp-channel.
 *
 * SIGINT and SIGTERM interrupt a pending send or receive.
 * See ../cli.ts for usage and exit codes.
 *
 * @module
 */
import { errorMessage, stderrLogger } from '@tcp-channel/channel'
import { runCli } from '../cli.js'

async function main(): Promise<never> {
  const controller = new AbortController()
  process.once('SIGINT', () => controller.abort(new Error('interrupted')))
  process.once('SIGTERM', () => controller.abort(new Error('terminated')))

  const code = await runCli(process.argv.slice(2), {
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
    logger: stderrLogger,
    signal: controller.signal
  })

  // Let stdout flush before exiting
  await new Promise<void>((resolve) => process.stdout.write('', () => resolve()))
  process.exit(code)
}

main().catch((err: unknown) => {
  process.stderr.write(`Unexpected error: ${errorMessage(err)}\n`)
  process.exit(2)
})
