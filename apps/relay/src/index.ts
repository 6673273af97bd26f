import { serve } from '@hono/node-server'
import { createLogger } from '@scenesync/config'
import { env } from './lib/env'
import { FileLogStore, MemoryLogStore } from './log-store'
import { RelayState } from './relay-state'
import { Relay } from './relay'
import { RelayTcpServer } from './tcp-server'
import { createStatusApp } from './http'

const log = createLogger('relay', { level: env.logLevel })

// ---------------------------------------------------------------------------
// State: restore the change log before accepting connections
// ---------------------------------------------------------------------------

const store = env.logFile
  ? new FileLogStore(env.logFile, log.child('log-store'))
  : new MemoryLogStore()
if (!env.logFile) log.warn('No SCENESYNC_LOG_FILE set; the change log is kept in memory only')

const relay = new Relay(RelayState.open(store, log.child('state')), log)

// ---------------------------------------------------------------------------
// Listeners
// ---------------------------------------------------------------------------

const tcp = new RelayTcpServer(relay, {
  host: env.host,
  port: env.port,
  maxFrameSize: env.maxFrameSize,
  logger: log.child('tcp'),
})

const http = serve({ fetch: createStatusApp(relay, log.child('http')).fetch, port: env.statusPort }, (info) => {
  log.info('Status endpoint listening', { port: info.port })
})

tcp.listen().catch((err: unknown) => {
  log.error('Failed to start relay listener', { error: err })
  process.exit(1)
})

// ---------------------------------------------------------------------------
// Graceful shutdown
// ---------------------------------------------------------------------------

function shutdown(signal: string) {
  log.info('Shutting down', { signal })
  relay.close()
  tcp.close()
    .catch((err: unknown) => log.warn('Error while closing listener', { error: err }))
    .finally(() => http.close(() => process.exit(0)))
  setTimeout(() => process.exit(1), 10_000).unref()
}

process.on('SIGTERM', () => shutdown('SIGTERM'))
process.on('SIGINT', () => shutdown('SIGINT'))
