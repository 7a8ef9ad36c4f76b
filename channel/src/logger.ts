/**
 * Diagnostics for channel operations.
 *
 * Diagnostics go to stderr; stdout is left to the caller (the CLI writes
 * received payloads there). Inject `silentLogger` or a recording logger to
 * suppress or capture them.
 *
 * @module
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Sink for channel diagnostics.
 */
export interface ChannelLogger {
  debug(message: string): void
  info(message: string): void
  warn(message: string): void
  error(message: string): void
}

export type StderrLoggerOptions = {
  /** Emit debug lines. Default: false */
  readonly debug?: boolean
  /** Line prefix. Default: "[tcp-channel]" */
  readonly prefix?: string
  /** Line writer. Default: process.stderr.write */
  readonly write?: (line: string) => void
}

/**
 * Create a logger that writes one `<prefix> <level>: <message>` line per call.
 */
export function createStderrLogger(options: StderrLoggerOptions = {}): ChannelLogger {
  const prefix = options.prefix ?? '[tcp-channel]'
  const write =
    options.write ??
    ((line: string): void => {
      process.stderr.write(line)
    })
  const line = (level: LogLevel, message: string): void => write(`${prefix} ${level}: ${message}\n`)

  return {
    debug: (message) => {
      if (options.debug) line('debug', message)
    },
    info: (message) => line('info', message),
    warn: (message) => line('warn', message),
    error: (message) => line('error', message)
  }
}

/**
 * Default logger. Debug lines are enabled with TCP_CHANNEL_DEBUG=1.
 */
export const stderrLogger: ChannelLogger = createStderrLogger({
  debug: process.env.TCP_CHANNEL_DEBUG === '1'
})

/** Logger that drops everything. */
export const silentLogger: ChannelLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
}
