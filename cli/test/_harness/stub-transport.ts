/**
 * Scripted ChannelTransport and in-memory streams for CLI tests.
 */
import { PassThrough } from 'node:stream'
import type { ChannelTransport, ReadOutcome } from '@tcp-channel/channel'
import { type Mock, vi } from 'vitest'
import type { CliIO } from '../../src/index.js'

export type StubTransport = {
  [K in keyof ChannelTransport]: Mock<ChannelTransport[K]>
}

/**
 * Transport whose writes succeed (or throw `writeError`) and whose accept
 * returns `readOutcome`.
 */
export function createStubTransport(
  options: { writeError?: unknown; readOutcome?: ReadOutcome } = {}
): StubTransport {
  return {
    writeOnce: vi.fn<ChannelTransport['writeOnce']>(async (_host, _port, _payload, writeOptions) => {
      writeOptions?.signal?.throwIfAborted()
      if (options.writeError !== undefined) throw options.writeError
    }),
    acceptOnce: vi.fn<ChannelTransport['acceptOnce']>(async (port, acceptOptions) => {
      acceptOptions?.onListening?.(port)
      return options.readOutcome ?? { status: 'closed' }
    })
  }
}

export type TestIO = CliIO & {
  readonly stdin: PassThrough
  readonly stdout: PassThrough
  readonly stderr: PassThrough
  /** Everything written to stdout so far, once pending writes are delivered */
  stdoutBytes(): Promise<Buffer>
  /** Everything written to stderr so far, once pending writes are delivered */
  stderrText(): Promise<string>
  /** Lines logged at each level */
  readonly logged: { level: string; message: string }[]
}

const delivered = (): Promise<void> => new Promise((resolve) => setImmediate(resolve))

export function createTestIO(
  transport: ChannelTransport,
  env: Record<string, string | undefined> = {}
): TestIO {
  const stdin = new PassThrough()
  const stdout = new PassThrough()
  const stderr = new PassThrough()
  const out: Buffer[] = []
  const err: Buffer[] = []
  stdout.on('data', (chunk: Buffer) => out.push(chunk))
  stderr.on('data', (chunk: Buffer) => err.push(chunk))

  const logged: { level: string; message: string }[] = []
  const record = (level: string) => (message: string) => {
    logged.push({ level, message })
  }

  return {
    stdin,
    stdout,
    stderr,
    env,
    transport,
    logger: {
      debug: record('debug'),
      info: record('info'),
      warn: record('warn'),
      error: record('error')
    },
    logged,
    stdoutBytes: async () => {
      await delivered()
      return Buffer.concat(out)
    },
    stderrText: async () => {
      await delivered()
      return Buffer.concat(err).toString('utf-8')
    }
  }
}
