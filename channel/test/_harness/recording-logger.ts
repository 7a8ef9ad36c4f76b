/**
 * ChannelLogger whose methods are vi.fn() mocks, for asserting on diagnostics.
 */
import { type Mock, vi } from 'vitest'
import type { ChannelLogger, LogLevel } from '../../src/index.js'

export type RecordingLogger = { readonly [L in LogLevel]: Mock<(message: string) => void> } & ChannelLogger

export function createRecordingLogger(): RecordingLogger {
  return {
    debug: vi.fn<(message: string) => void>(),
    info: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>()
  }
}

/**
 * Messages passed to one level, in call order.
 */
export function messagesAt(logger: RecordingLogger, level: LogLevel): string[] {
  return logger[level].mock.calls.map((call) => call[0])
}
