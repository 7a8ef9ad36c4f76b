/**
 * Command-line driver for a channel: one send or one receive per run.
 *
 * Usage:
 *   tcp-channel send [--host <host>] [--attempts <n>] [--delay <ms>] <port> [message|-]
 *   tcp-channel receive [--max-bytes <n>] [port]
 *
 * Exit codes:
 * - 0: Sent, skipped (empty message), received, or peer closed without sending
 * - 1: Send attempts exhausted
 * - 2: Receive failed (listen, accept, read or output)
 * - 3: Invalid arguments
 *
 * Diagnostics go to the logger (stderr); stdout carries only received bytes.
 *
 * @module
 */
import type { Readable, Writable } from 'node:stream'
import {
  type ChannelLogger,
  type ChannelTransport,
  createChannel,
  errorMessage,
  isValidPort,
  type ReceiveResult
} from '@tcp-channel/channel'
import { type EnvSource, parseChannelEnv, parseInteger } from './env.js'
import { readAll, writeOutput } from './io.js'

export const ExitCode = {
  Ok: 0,
  SendFailed: 1,
  ReceiveFailed: 2,
  Usage: 3
} as const

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode]

export const USAGE = `Usage:
  tcp-channel send [--host <host>] [--attempts <n>] [--delay <ms>] <port> [message|-]
  tcp-channel receive [--max-bytes <n>] [port]

send reads the message from standard input when it is omitted or "-".
receive writes the received bytes to standard output.
`

/**
 * Invalid command line.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export type SendCommand = {
  command: 'send'
  port: number
  /** Message text; undefined means read standard input */
  message: string | undefined
  host?: string
  attempts?: number
  delayMs?: number
}

export type ReceiveCommand = {
  command: 'receive'
  /** Undefined means the configured listening port */
  port?: number
  maxBytes?: number
}

export type CliCommand = SendCommand | ReceiveCommand | { command: 'help' }

/**
 * Streams, environment and collaborators a run uses.
 */
export interface CliIO {
  readonly stdin: Readable
  readonly stdout: Writable
  readonly stderr: Writable
  readonly env: EnvSource
  readonly logger: ChannelLogger
  /** Default: TcpTransport */
  readonly transport?: ChannelTransport
  /** Interrupts a pending send or receive */
  readonly signal?: AbortSignal
}

const VALUE_OPTIONS: Record<'send' | 'receive', readonly string[]> = {
  send: ['--host', '--attempts', '--delay'],
  receive: ['--max-bytes']
}

function integerArg(name: string, raw: string, accept: (value: number) => boolean, expected: string): number {
  const value = parseInteger(raw)
  if (value === undefined || !accept(value)) {
    throw new UsageError(`${name} must be ${expected}, got "${raw}"`)
  }
  return value
}

/**
 * Split the arguments after the command into options and positionals.
 * Accepts `--name value` and `--name=value`; `--` ends option parsing.
 */
function splitArgs(
  command: 'send' | 'receive',
  args: readonly string[]
): { options: Map<string, string>; positionals: string[] } {
  const options = new Map<string, string>()
  const positionals: string[] = []
  const known = VALUE_OPTIONS[command]

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    if (arg === '--') {
      positionals.push(...args.slice(i + 1))
      break
    }
    if (!arg.startsWith('--')) {
      positionals.push(arg)
      continue
    }

    const eq = arg.indexOf('=')
    const name = eq === -1 ? arg : arg.slice(0, eq)
    if (!known.includes(name)) {
      throw new UsageError(`unknown option ${name} for ${command}`)
    }
    let value: string | undefined
    if (eq === -1) {
      value = args[i + 1]
      i++
    } else {
      value = arg.slice(eq + 1)
    }
    if (value === undefined) {
      throw new UsageError(`option ${name} needs a value`)
    }
    options.set(name, value)
  }

  return { options, positionals }
}

/**
 * Parse a command line (without the node and script arguments).
 *
 * @throws UsageError when the command line is invalid
 */
export function parseArgs(args: readonly string[]): CliCommand {
  const command: string | undefined = args[0]
  const rest = args.slice(1)

  switch (command) {
    case undefined:
    case 'help':
    case '--help':
    case '-h':
      return { command: 'help' }

    case 'send': {
      const { options, positionals } = splitArgs('send', rest)
      const rawPort: string | undefined = positionals[0]
      const message: string | undefined = positionals[1]
      const extra = positionals.slice(2)
      if (rawPort === undefined) {
        throw new UsageError('send needs a destination port')
      }
      if (extra.length > 0) {
        throw new UsageError(`unexpected argument "${extra[0]}"`)
      }

      const parsed: SendCommand = {
        command: 'send',
        port: integerArg('port', rawPort, isValidPort, 'an integer between 1 and 65535'),
        message: message === '-' ? undefined : message
      }
      const host = options.get('--host')
      if (host !== undefined) {
        if (host === '') throw new UsageError('--host must not be empty')
        parsed.host = host
      }
      const attempts = options.get('--attempts')
      if (attempts !== undefined) {
        parsed.attempts = integerArg('--attempts', attempts, (v) => v >= 1, 'a positive integer')
      }
      const delay = options.get('--delay')
      if (delay !== undefined) {
        parsed.delayMs = integerArg('--delay', delay, (v) => v >= 0, 'a non-negative integer')
      }
      return parsed
    }

    case 'receive': {
      const { options, positionals } = splitArgs('receive', rest)
      const rawPort: string | undefined = positionals[0]
      const extra = positionals.slice(1)
      if (extra.length > 0) {
        throw new UsageError(`unexpected argument "${extra[0]}"`)
      }

      const parsed: ReceiveCommand = { command: 'receive' }
      if (rawPort !== undefined) {
        parsed.port = integerArg('port', rawPort, () => true, 'an integer')
      }
      const maxBytes = options.get('--max-bytes')
      if (maxBytes !== undefined) {
        parsed.maxBytes = integerArg('--max-bytes', maxBytes, (v) => v >= 1, 'a positive integer')
      }
      return parsed
    }

    default:
      throw new UsageError(`unknown command "${command}"`)
  }
}

async function runSend(command: SendCommand, io: CliIO): Promise<ExitCode> {
  const env = parseChannelEnv(io.env, (msg) => io.logger.warn(msg))
  const channel = createChannel({ port: env.port, logger: io.logger, transport: io.transport })

  const payload =
    command.message === undefined ? await readAll(io.stdin) : new TextEncoder().encode(command.message)

  try {
    const result = await channel.send(payload, command.port, {
      host: command.host ?? env.host,
      attempts: command.attempts ?? env.attempts,
      delayMs: command.delayMs ?? env.delayMs,
      signal: io.signal
    })
    switch (result.status) {
      case 'sent':
      case 'skipped':
        return ExitCode.Ok
      case 'failed':
        return ExitCode.SendFailed
      default: {
        const _exhaustive: never = result
        return _exhaustive
      }
    }
  } catch (err) {
    if (io.signal?.aborted) {
      io.logger.warn('send interrupted')
      return ExitCode.SendFailed
    }
    throw err
  }
}

async function runReceive(command: ReceiveCommand, io: CliIO): Promise<ExitCode> {
  const env = parseChannelEnv(io.env, (msg) => io.logger.warn(msg))
  const channel = createChannel({ port: env.port, logger: io.logger, transport: io.transport })

  let result: ReceiveResult<Uint8Array>
  try {
    result = await channel.receive(command.port ?? 0, {
      maxBytes: command.maxBytes ?? env.maxBytes,
      signal: io.signal,
      onListening: (port) => io.logger.info(`listening on port ${port}`)
    })
  } catch (err) {
    if (io.signal?.aborted) {
      io.logger.warn('receive interrupted')
      return ExitCode.ReceiveFailed
    }
    throw err
  }

  switch (result.status) {
    case 'received':
      try {
        await writeOutput(io.stdout, result.bytes)
      } catch (err) {
        io.logger.error(`writing output: ${errorMessage(err)}`)
        return ExitCode.ReceiveFailed
      }
      return ExitCode.Ok
    case 'closed':
      return ExitCode.Ok
    case 'error':
      return ExitCode.ReceiveFailed
    default: {
      const _exhaustive: never = result
      return _exhaustive
    }
  }
}

/**
 * Run one command line and return its exit code. Never calls process.exit.
 */
export async function runCli(args: readonly string[], io: CliIO): Promise<ExitCode> {
  let command: CliCommand
  try {
    command = parseArgs(args)
  } catch (err) {
    if (!(err instanceof UsageError)) throw err
    io.stderr.write(`Error: ${err.message}\n${USAGE}`)
    return ExitCode.Usage
  }

  switch (command.command) {
    case 'help':
      io.stdout.write(USAGE)
      return ExitCode.Ok
    case 'send':
      return runSend(command, io)
    case 'receive':
      return runReceive(command, io)
    default: {
      const _exhaustive: never = command
      return _exhaustive
    }
  }
}
