/**
 * Configuration surface for relay and clients. Fail-fast on startup.
 *
 * Values come from environment variables and are validated with zod.
 * A bad port or malformed list throws a ConfigError naming every offending
 * key, rather than failing later at bind/connect time.
 */

import { z } from 'zod'

export const DEFAULT_RELAY_PORT = 25600
export const DEFAULT_STATUS_PORT = 25601

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
  }
}

// ─── Schemas ─────────────────────────────────────────────────────────────────

const port = z.coerce.number().int().min(1).max(65535)

const commaList = z
  .string()
  .transform((raw) => raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0))

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error'])
export type LogLevel = z.infer<typeof logLevelSchema>

export const backoffSchema = z.object({
  initialDelayMs: z.coerce.number().int().min(1).default(500),
  maxDelayMs: z.coerce.number().int().min(1).default(30_000),
  multiplier: z.coerce.number().min(1).default(2),
}).refine((b) => b.maxDelayMs >= b.initialDelayMs, {
  message: 'maxDelayMs must be >= initialDelayMs',
  path: ['maxDelayMs'],
})

export type BackoffConfig = z.infer<typeof backoffSchema>

export const relayConfigSchema = z.object({
  host: z.string().min(1).default('0.0.0.0'),
  port: port.default(DEFAULT_RELAY_PORT),
  statusPort: port.default(DEFAULT_STATUS_PORT),
  /** Append-only log file. Persistence is off when unset. */
  logFile: z.string().min(1).optional(),
  maxFrameSize: z.coerce.number().int().min(64).default(16 * 1024 * 1024),
  logLevel: logLevelSchema.default('info'),
})

export type RelayConfig = z.infer<typeof relayConfigSchema>

export const clientConfigSchema = z.object({
  relayHost: z.string().min(1).default('127.0.0.1'),
  relayPort: port.default(DEFAULT_RELAY_PORT),
  backoff: backoffSchema.default({}),
  /** Deferred-record retry budget before UnresolvableDependency. */
  retryLimit: z.coerce.number().int().min(0).default(16),
  /** Data-block types that are replicated. */
  replicatedTypes: z.array(z.string().min(1)).min(1).default([
    'Mesh', 'Material', 'Object', 'Collection', 'Camera', 'Light', 'Scene',
  ]),
  maxFrameSize: z.coerce.number().int().min(64).default(16 * 1024 * 1024),
  logLevel: logLevelSchema.default('info'),
})

export type ClientConfig = z.infer<typeof clientConfigSchema>
export type ClientConfigInput = z.input<typeof clientConfigSchema>

// ─── Parsing ─────────────────────────────────────────────────────────────────

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, input: unknown): z.infer<T> {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    )
  }
  return result.data
}

type Env = Readonly<Record<string, string | undefined>>

/** Drop unset or empty variables so schema defaults apply. */
function pick(env: Env, mapping: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {}
  for (const [field, key] of Object.entries(mapping)) {
    const value = env[key]
    if (value !== undefined && value !== '') out[field] = value
  }
  return out
}

/** Relay configuration from SCENESYNC_* environment variables. */
export function loadRelayConfig(env: Env = process.env): RelayConfig {
  return parseOrThrow(relayConfigSchema, pick(env, {
    host: 'SCENESYNC_RELAY_HOST',
    port: 'SCENESYNC_RELAY_PORT',
    statusPort: 'SCENESYNC_STATUS_PORT',
    logFile: 'SCENESYNC_LOG_FILE',
    maxFrameSize: 'SCENESYNC_MAX_FRAME_SIZE',
    logLevel: 'LOG_LEVEL',
  }))
}

/** Client configuration from SCENESYNC_* environment variables. */
export function loadClientConfig(env: Env = process.env): ClientConfig {
  const flat = pick(env, {
    relayHost: 'SCENESYNC_RELAY_HOST',
    relayPort: 'SCENESYNC_RELAY_PORT',
    retryLimit: 'SCENESYNC_RETRY_LIMIT',
    maxFrameSize: 'SCENESYNC_MAX_FRAME_SIZE',
    logLevel: 'LOG_LEVEL',
  })
  const backoff = pick(env, {
    initialDelayMs: 'SCENESYNC_BACKOFF_INITIAL_MS',
    maxDelayMs: 'SCENESYNC_BACKOFF_MAX_MS',
    multiplier: 'SCENESYNC_BACKOFF_MULTIPLIER',
  })
  const types = env['SCENESYNC_REPLICATED_TYPES']

  return parseOrThrow(clientConfigSchema, {
    ...flat,
    backoff,
    ...(types ? { replicatedTypes: commaList.parse(types) } : {}),
  })
}

/** Validate an in-code client configuration (host integrations, tests). */
export function resolveClientConfig(input: ClientConfigInput = {}): ClientConfig {
  return parseOrThrow(clientConfigSchema, input)
}

/** Delay before reconnect attempt `attempt` (0-based), capped at maxDelayMs. */
export function backoffDelay(backoff: BackoffConfig, attempt: number): number {
  return Math.min(backoff.maxDelayMs, backoff.initialDelayMs * backoff.multiplier ** attempt)
}
