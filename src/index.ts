/**
 * logship public API barrel.
 *
 * Re-exports the client, sessions, configuration helpers, adapters and the
 * packet model that make up the public surface of the `logship` package.
 * @module
 */

// Adapters
export type { ConsoleLoggerOptions } from "./adapters/console-logger.js";
export { ConsoleLogger } from "./adapters/console-logger.js";
export { DEFAULT_HOST, WslHostResolver } from "./adapters/host-resolver.js";
export type { StructuredLoggerOptions } from "./adapters/structured-logger.js";
export {
  DiagnosticLevel,
  parseDiagnosticLevel,
  StructuredLogger,
} from "./adapters/structured-logger.js";
export { CLIENT_BANNER, connectTcp, TcpTransport } from "./adapters/tcp-transport.js";
// Configuration
export type { ClientConfiguration } from "./config/config-file.js";
export { parseConfigurationText, readConfigurationFile } from "./config/config-file.js";
export { parseConnectionString } from "./config/connection-string.js";
export { VariableStore } from "./config/variable-store.js";
// Core
export type {
  BufferStats,
  ClientStats,
  LogshipClientOptions,
  ShutdownOptions,
} from "./core/client.js";
export { LogshipClient, MAIN_SESSION } from "./core/client.js";
export type { ConnectionState } from "./core/connection-manager.js";
export type {
  CapturedContext,
  CorrelationOptions,
  CorrelationSnapshot,
  Tags,
  TagValue,
} from "./core/context-propagator.js";
export { ContextBuilder, ContextPropagator } from "./core/context-propagator.js";
export { decodePacket, encodePacket, splitFrames } from "./core/packet-codec.js";
export type { FragmentValue, MessageFragment, WatchValue } from "./core/session.js";
export { MetricBuilder, Session } from "./core/session.js";
// Errors
export {
  ConfigurationError,
  ConnectionError,
  LogshipError,
  ProtocolError,
  QueueOverflowError,
} from "./errors.js";
// Interfaces
export type { ConnectEvent, ConnectionObserver } from "./interfaces/connection-observer.js";
export type { HostResolver } from "./interfaces/host-resolver.js";
export type { Logger } from "./interfaces/logger.js";
export type {
  PacketTransport,
  TransportConnectOptions,
  TransportFactory,
} from "./interfaces/transport.js";
// Types
export type { ConnectionOptions, ResolvedConnectionOptions } from "./types/config.js";
export { DEFAULT_CONNECTION_OPTIONS } from "./types/config.js";
export type { CallerLevel } from "./types/level.js";
export { Level, levelName, parseLevel } from "./types/level.js";
export type {
  ContextMap,
  ControlCommandPacket,
  LogEntryPacket,
  LogHeaderPacket,
  Packet,
  PacketKind,
  ProcessFlowPacket,
  SourceId,
  StreamPacket,
  WatchPacket,
} from "./types/packet.js";
export {
  ControlCommandType,
  DEFAULT_COLOR,
  LogEntryType,
  ProcessFlowType,
  ViewerId,
  WatchType,
} from "./types/packet.js";
export { NoopLogger, noopLogger } from "./utils/noop-logger.js";
