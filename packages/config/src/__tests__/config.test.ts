import { describe, it, expect, vi, afterEach } from 'vitest'

import {
  loadRelayConfig, loadClientConfig, resolveClientConfig, backoffDelay, ConfigError,
} from '../sync-config'
import { createLogger, memorySink, stdioSink } from '../logger'

function configIssues(fn: () => unknown): string[] {
  try {
    fn()
  } catch (err) {
    if (err instanceof ConfigError) return err.issues
    throw err
  }
  throw new Error('expected a ConfigError')
}

// ─── Relay config ────────────────────────────────────────────────────────────

describe('loadRelayConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadRelayConfig({})).toEqual({
      host: '0.0.0.0',
      port: 25600,
      statusPort: 25601,
      maxFrameSize: 16 * 1024 * 1024,
      logLevel: 'info',
    })
  })

  it('reads ports and the log file', () => {
    const config = loadRelayConfig({
      SCENESYNC_RELAY_PORT: '4100',
      SCENESYNC_STATUS_PORT: '4101',
      SCENESYNC_LOG_FILE: '/tmp/relay.log',
    })
    expect(config.port).toBe(4100)
    expect(config.statusPort).toBe(4101)
    expect(config.logFile).toBe('/tmp/relay.log')
  })

  it('treats empty variables as unset', () => {
    expect(loadRelayConfig({ SCENESYNC_RELAY_PORT: '' }).port).toBe(25600)
  })

  it('rejects an out-of-range port', () => {
    const issues = configIssues(() => loadRelayConfig({ SCENESYNC_RELAY_PORT: '70000' }))
    expect(issues).toHaveLength(1)
    expect(issues[0]?.startsWith('port:')).toBe(true)
  })

  it('rejects a non-numeric port', () => {
    expect(() => loadRelayConfig({ SCENESYNC_RELAY_PORT: 'abc' })).toThrow(ConfigError)
  })

  it('rejects an unknown log level', () => {
    const issues = configIssues(() => loadRelayConfig({ LOG_LEVEL: 'verbose' }))
    expect(issues[0]?.startsWith('logLevel:')).toBe(true)
  })
})

// ─── Client config ───────────────────────────────────────────────────────────

describe('loadClientConfig', () => {
  it('parses the replicated-type allow-list', () => {
    const config = loadClientConfig({ SCENESYNC_REPLICATED_TYPES: 'Mesh, Object,,' })
    expect(config.replicatedTypes).toEqual(['Mesh', 'Object'])
  })

  it('fills backoff defaults around overrides', () => {
    const config = loadClientConfig({ SCENESYNC_BACKOFF_INITIAL_MS: '100' })
    expect(config.backoff).toEqual({ initialDelayMs: 100, maxDelayMs: 30_000, multiplier: 2 })
  })

  it('rejects a backoff ceiling below the initial delay', () => {
    const issues = configIssues(() => loadClientConfig({
      SCENESYNC_BACKOFF_INITIAL_MS: '5000',
      SCENESYNC_BACKOFF_MAX_MS: '1000',
    }))
    expect(issues).toEqual(['backoff.maxDelayMs: maxDelayMs must be >= initialDelayMs'])
  })

  it('rejects a negative retry limit', () => {
    expect(() => loadClientConfig({ SCENESYNC_RETRY_LIMIT: '-1' })).toThrow(ConfigError)
  })

  it('rejects an empty allow-list given in code', () => {
    expect(() => resolveClientConfig({ replicatedTypes: [] })).toThrow(ConfigError)
  })

  it('resolves in-code overrides', () => {
    const config = resolveClientConfig({ retryLimit: 3, replicatedTypes: ['Mesh'] })
    expect(config.retryLimit).toBe(3)
    expect(config.relayPort).toBe(25600)
  })
})

describe('backoffDelay', () => {
  const backoff = { initialDelayMs: 500, maxDelayMs: 30_000, multiplier: 2 }

  it('grows exponentially', () => {
    expect(backoffDelay(backoff, 0)).toBe(500)
    expect(backoffDelay(backoff, 3)).toBe(4000)
  })

  it('is capped at maxDelayMs', () => {
    expect(backoffDelay(backoff, 10)).toBe(30_000)
  })
})

// ─── Logger ──────────────────────────────────────────────────────────────────

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('drops entries below the threshold', () => {
    const { sink, entries } = memorySink()
    const log = createLogger('relay', { level: 'warn', sink })
    log.info('ignored')
    log.warn('kept', { clientId: 'c1' })
    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({ level: 'warn', component: 'relay', msg: 'kept', clientId: 'c1' })
  })

  it('prefixes child component names', () => {
    const { sink, entries } = memorySink()
    createLogger('client', { level: 'debug', sink }).child('scheduler').debug('deferred')
    expect(entries[0]?.component).toBe('client.scheduler')
  })

  it('writes warnings to stderr as one JSON line', () => {
    const writes: string[] = []
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
      writes.push(String(chunk))
      return true
    })
    stdioSink({
      ts: '2026-01-01T00:00:00.000Z', level: 'warn', component: 'relay', msg: 'dropped',
      error: new Error('boom'),
    })
    expect(writes).toEqual([
      '{"ts":"2026-01-01T00:00:00.000Z","level":"warn","component":"relay","msg":"dropped",' +
      '"error":{"name":"Error","message":"boom"}}\n',
    ])
  })
})
