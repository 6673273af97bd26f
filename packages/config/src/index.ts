// Shared configuration: validated relay/client settings and the structured logger.

export {
  loadRelayConfig,
  loadClientConfig,
  resolveClientConfig,
  backoffDelay,
  relayConfigSchema,
  clientConfigSchema,
  backoffSchema,
  logLevelSchema,
  ConfigError,
  DEFAULT_RELAY_PORT,
  DEFAULT_STATUS_PORT,
  type RelayConfig,
  type ClientConfig,
  type ClientConfigInput,
  type BackoffConfig,
  type LogLevel,
} from './sync-config'

export {
  createLogger,
  memorySink,
  stdioSink,
  type Logger,
  type LoggerOptions,
  type LogEntry,
  type LogFields,
  type LogSink,
} from './logger'
