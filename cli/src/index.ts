/**
 * Command-line driver for tcp-channel.
 *
 * @packageDocumentation
 */

export {
  type CliCommand,
  type CliIO,
  ExitCode,
  parseArgs,
  type ReceiveCommand,
  runCli,
  type SendCommand,
  USAGE,
  UsageError
} from './cli.js'
export { type ChannelEnv, type EnvSource, parseChannelEnv, parseInteger } from './env.js'
export { OutputClosedError, readAll, writeOutput } from './io.js'
