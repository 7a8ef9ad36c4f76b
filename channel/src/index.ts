/**
 * tcp-channel
 *
 * Point-to-point TCP messaging: push one payload to a host:port with bounded
 * retry, or accept one connection and read one payload.
 *
 * @packageDocumentation
 */

// Channel
export {
  Channel,
  type ChannelSettings,
  createChannel,
  type ReceiveOptions,
  type SendOptions
} from './channel.js'
// Payload codecs
export { bytesCodec, msgpackCodec, type PayloadCodec, textCodec } from './codec.js'
// Defaults and validation
export {
  DEFAULT_ATTEMPTS,
  DEFAULT_DELAY_MS,
  DEFAULT_HOST,
  DEFAULT_PORT,
  isValidPort,
  LISTEN_HOST,
  MAX_BUFFER,
  MAX_PORT,
  MIN_PORT,
  type RetryPolicy,
  resolveListeningPort,
  resolveMaxBytes,
  validateRetryPolicy
} from './config.js'
// Errors
export {
  errorMessage,
  PayloadDecodeError,
  SendAttemptError,
  SendFailedError,
  TransportError,
  type TransportPhase
} from './errors.js'
// History log
export { type HistoryDirection, type HistoryEntry, HistoryLog } from './history.js'
// Logging
export {
  type ChannelLogger,
  createStderrLogger,
  type LogLevel,
  type StderrLoggerOptions,
  silentLogger,
  stderrLogger
} from './logger.js'
// Text view of byte messages
export { bytesToText, textToBytes } from './message.js'
// Transport
export {
  type AcceptOnceOptions,
  type ChannelTransport,
  TcpTransport,
  type WriteOnceOptions
} from './transport.js'
// Results
export type { ReadOutcome, ReceiveResult, SendResult } from './types/result.js'
