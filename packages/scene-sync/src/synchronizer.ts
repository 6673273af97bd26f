/**
 * ClientSynchronizer: keeps one host scene in step with the relay.
 *
 * State machine:
 *   disconnected → connecting → syncing → live
 *         ↑___________|____________|________|   (transport error, backoff)
 *
 * The network side only decodes frames into an inbox. All host access
 * happens in drain(), which the host calls from its own thread:
 *   1. diff local edits against the baseline and send them
 *   2. apply inbound records through the dependency scheduler
 *   3. recapture the baseline so applied records are not sent back
 *
 * Conflicts resolve last-writer-wins by relay sequence. Until the relay acks
 * a local batch, inbound records (which were all sequenced before it) skip
 * the fields and blocks that batch touched.
 */

import type { ClientConfig, ClientConfigInput, Logger } from '@scenesync/config'
import { backoffDelay, createLogger, resolveClientConfig } from '@scenesync/config'
import type {
  ChangeRecord, FieldValue, FullSnapshotMessage, Message, StampedRecord,
} from '@scenesync/wire-protocol'
import { blockKey, decodeMessage, encodeMessage, isStamped, parseBlockKey } from '@scenesync/wire-protocol'
import type { SceneHost } from './types'
import type { SyncTransport, TransportConnector } from './transport'
import type { ApplyOutcome } from './scheduler'
import { DependencyScheduler } from './scheduler'
import { Snapshot, captureSnapshot } from './snapshot'
import { diff } from './diff'
import { tcpConnector } from './tcp-transport'
import { RenameAliases } from './aliases'
import { SnapshotInconsistent, TransportError } from './errors'

export type SyncState = 'disconnected' | 'connecting' | 'syncing' | 'live'

export type StateListener = (state: SyncState, previous: SyncState) => void

export interface SynchronizerOptions {
  clientId: string
  host: SceneHost
  /** Defaults to TCP to `config.relayHost:config.relayPort`. */
  connect?: TransportConnector
  config?: ClientConfigInput
  logger?: Logger
}

export interface DrainResult {
  /** Local records sent to the relay. */
  sent: number
  applied: number
  deferred: number
  skipped: number
  failed: number
}

/** What an unacknowledged local batch touched. */
interface PendingBatch {
  fields: Set<string>
  deleted: Set<string>
  /** Old block key → new name, for local renames. */
  renamed: Map<string, string>
  /** Names that should lead to a local block once the batch is acked. */
  redirects: Map<string, string>
}

function fieldKey(key: string, field: string): string {
  return `${key}\u0000${field}`
}

function pendingBatch(records: readonly ChangeRecord[]): PendingBatch {
  const batch: PendingBatch = { fields: new Set(), deleted: new Set(), renamed: new Map(), redirects: new Map() }
  for (const record of records) {
    const key = blockKey(record.blockType, record.blockName)
    switch (record.operation) {
      case 'create':
      case 'update':
        for (const field of Object.keys(record.payload)) batch.fields.add(fieldKey(key, field))
        break
      case 'delete':
        batch.deleted.add(key)
        break
      case 'rename':
        batch.renamed.set(key, record.newName)
        batch.redirects.set(key, record.newName)
        break
    }
  }
  return batch
}

function emptyResult(): DrainResult {
  return { sent: 0, applied: 0, deferred: 0, skipped: 0, failed: 0 }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

export class ClientSynchronizer {
  readonly clientId: string
  readonly config: ClientConfig

  private readonly host: SceneHost
  private readonly connector: TransportConnector
  private readonly log: Logger
  private readonly scheduler: DependencyScheduler
  private readonly aliases = new RenameAliases()
  private readonly listeners = new Set<StateListener>()

  private currentState: SyncState = 'disconnected'
  private transport: SyncTransport | null = null
  /** Bumped per connection attempt; callbacks from older connections are ignored. */
  private generation = 0
  private stopped = true
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null
  private reconnectAttempt = 0

  private inbox: Message[] = []
  private baseline = Snapshot.EMPTY
  private localEditPending = false
  private pending: PendingBatch[] = []
  private highestSequence = 0

  constructor(options: SynchronizerOptions) {
    this.clientId = options.clientId
    this.host = options.host
    this.config = resolveClientConfig(options.config ?? {})
    this.connector = options.connect ?? tcpConnector({
      host: this.config.relayHost,
      port: this.config.relayPort,
      maxFrameSize: this.config.maxFrameSize,
    })
    this.log = options.logger ?? createLogger('client', { level: this.config.logLevel })
    this.scheduler = new DependencyScheduler(this.host, {
      replicatedTypes: this.config.replicatedTypes,
      retryLimit: this.config.retryLimit,
      logger: this.log.child('scheduler'),
      onApplied: (record) => this.trackNames(record),
    })
  }

  // ─── Read API ───────────────────────────────────────────────────────────

  get state(): SyncState {
    return this.currentState
  }

  /** Highest relay sequence this client has seen. */
  get lastSequence(): number {
    return this.highestSequence
  }

  get deferredCount(): number {
    return this.scheduler.deferredCount
  }

  /** Local batches sent but not yet acknowledged. */
  get pendingBatches(): number {
    return this.pending.length
  }

  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener)
    return () => { this.listeners.delete(listener) }
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────

  async start(): Promise<void> {
    if (!this.stopped) return
    this.stopped = false
    await this.connect()
  }

  stop(reason = 'client shutdown'): void {
    this.stopped = true
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer)
      this.reconnectTimer = null
    }
    if (this.transport) this.send({ kind: 'disconnect', reason })
    this.dropConnection()
  }

  /** The host finished an edit; the next drain diffs and sends it. */
  notifyLocalEdit(): void {
    this.localEditPending = true
  }

  // ─── Drain (host thread) ────────────────────────────────────────────────

  drain(): DrainResult {
    const result = emptyResult()
    if (this.host.isEditing?.()) return result

    if (this.currentState === 'live' && this.localEditPending) {
      if (!this.flushLocalEdits(result)) return result
    }

    const messages = this.inbox
    this.inbox = []
    let remoteApplied = false
    for (const message of messages) {
      if (!this.transport) break
      try {
        remoteApplied = this.process(message, result) || remoteApplied
      } catch (err) {
        // The rest of the inbox depends on this message; start over from a fresh snapshot.
        this.log.error('Failed to process inbound message', { kind: message.kind, error: toError(err) })
        this.dropConnection(new TransportError(`Failed to process ${message.kind}`, err))
        break
      }
    }

    if (remoteApplied && this.currentState === 'live') {
      this.baseline = this.capture()
    }
    return result
  }

  /** Handle one inbound message. True when remote records reached the host. */
  private process(message: Message, result: DrainResult): boolean {
    switch (message.kind) {
      case 'full-snapshot':
        this.applyFullSnapshot(message, result)
        return false
      case 'change-batch':
        return this.applyRemoteBatch(message.records, result)
      case 'ack':
        this.acknowledge(message.sequence)
        return false
      case 'disconnect':
        this.dropConnection(new TransportError(`Relay closed the session: ${message.reason}`))
        return false
      case 'hello':
        this.log.warn('Ignoring hello from relay')
        return false
    }
  }

  // ─── Local edits ────────────────────────────────────────────────────────

  private capture(): Snapshot {
    return captureSnapshot(this.host, this.config.replicatedTypes, { logger: this.log })
  }

  private flushLocalEdits(result: DrainResult): boolean {
    let current: Snapshot
    try {
      current = this.capture()
    } catch (err) {
      if (err instanceof SnapshotInconsistent) {
        this.log.debug('Host graph not stable; flushing later', { error: err })
        return false
      }
      throw err
    }

    this.localEditPending = false
    const records = diff(this.baseline, current, this.clientId)
    if (records.length > 0) {
      if (!this.sendBatch(records)) return false
      result.sent += records.length
    }
    this.baseline = current
    return true
  }

  private sendBatch(records: ChangeRecord[]): boolean {
    if (!this.send({ kind: 'change-batch', records })) return false
    this.pending.push(pendingBatch(records))
    this.log.debug('Sent change batch', { records: records.length, pending: this.pending.length })
    return true
  }

  // ─── Inbound ────────────────────────────────────────────────────────────

  private applyFullSnapshot(message: FullSnapshotMessage, result: DrainResult): void {
    if (this.currentState !== 'syncing') {
      this.log.warn('Unexpected full snapshot', { state: this.currentState })
    }
    this.highestSequence = message.lastSequence
    this.aliases.clear()
    this.scheduler.clear()
    this.pending = []

    const local = this.capture()
    if (message.records.length === 0 && message.lastSequence === 0) {
      const records = diff(Snapshot.EMPTY, local, this.clientId)
      if (records.length > 0) {
        this.log.info('Seeding empty relay with local scene', { records: records.length })
        if (!this.sendBatch(records)) return
        result.sent += records.length
      }
    } else {
      const known = new Set<string>()
      for (const record of message.records) {
        known.add(blockKey(record.blockType, record.blockName))
        this.count(result, this.scheduler.apply(record))
      }
      for (const block of [...local.blocks()].reverse()) {
        if (known.has(blockKey(block.blockType, block.name))) continue
        this.count(result, this.scheduler.apply({
          operation: 'delete',
          sequence: message.lastSequence,
          originClientId: this.clientId,
          blockType: block.blockType,
          blockName: block.name,
        }))
      }
      for (const outcome of this.scheduler.endBatch()) this.count(result, outcome)
    }

    this.baseline = this.capture()
    this.localEditPending = false
    this.reconnectAttempt = 0
    this.setState('live')
    this.send({ kind: 'ack', sequence: this.highestSequence })
  }

  private applyRemoteBatch(records: readonly ChangeRecord[], result: DrainResult): boolean {
    if (this.currentState !== 'live') {
      this.log.warn('Dropping change batch received before the full snapshot')
      return false
    }

    let touched = false
    for (const record of records) {
      const admitted = this.admit(record)
      if (typeof admitted === 'string') {
        this.log.debug('Skipping inbound record', {
          reason: admitted, operation: record.operation, blockType: record.blockType, block: record.blockName,
        })
        result.skipped++
        continue
      }
      touched = true
      this.count(result, this.scheduler.apply(admitted))
    }
    for (const outcome of this.scheduler.endBatch()) this.count(result, outcome)
    this.send({ kind: 'ack', sequence: this.highestSequence })
    return touched
  }

  /** Sequence checks, redirects and pending-batch precedence. Returns a skip reason or the record to apply. */
  private admit(record: ChangeRecord): StampedRecord | string {
    if (!isStamped(record)) return 'record has no sequence'
    if (record.originClientId === this.clientId) return 'own record'
    if (record.sequence <= this.highestSequence) return `already seen sequence ${record.sequence}`
    this.highestSequence = record.sequence

    if (record.operation === 'rename') {
      const key = blockKey(record.blockType, record.blockName)
      const batch = this.pending.find((b) => b.renamed.has(key))
      const ours = batch?.renamed.get(key)
      if (batch && ours !== undefined) {
        batch.redirects.set(blockKey(record.blockType, record.newName), ours)
        return 'superseded by a pending local rename'
      }
    }

    const target = this.redirect(record)
    const key = blockKey(target.blockType, target.blockName)
    if (this.pending.some((b) => b.deleted.has(key))) return 'superseded by a pending local delete'

    switch (target.operation) {
      case 'create':
      case 'update': {
        const payload: Record<string, FieldValue> = {}
        let dropped = 0
        for (const [field, value] of Object.entries(target.payload)) {
          if (this.pending.some((b) => b.fields.has(fieldKey(key, field)))) dropped++
          else payload[field] = value
        }
        if (dropped === 0) return target
        if (Object.keys(payload).length === 0) return 'superseded by pending local edits'
        return { ...target, payload }
      }
      case 'rename':
        return target.newName === target.blockName ? 'rename already in effect' : target
      case 'delete':
        return target
    }
  }

  /** Readdress a record whose block is known locally under a newer name. */
  private redirect(record: StampedRecord): StampedRecord {
    const { blockType, blockName } = record
    if (record.operation === 'create' || this.host.hasBlock(blockType, blockName)) return record

    let name = blockName
    const seen = new Set<string>()
    for (;;) {
      const key = blockKey(blockType, name)
      if (seen.has(key)) break
      seen.add(key)
      const next = this.pendingRedirect(key)
      if (next === undefined) break
      name = next
      if (this.host.hasBlock(blockType, name)) break
    }
    if (name === blockName) name = this.aliases.resolve(blockType, blockName, record.sequence)
    return name === blockName ? record : { ...record, blockName: name }
  }

  private pendingRedirect(key: string): string | undefined {
    for (let i = this.pending.length - 1; i >= 0; i--) {
      const to = this.pending[i]?.redirects.get(key)
      if (to !== undefined) return to
    }
    return undefined
  }

  private acknowledge(sequence: number): void {
    const batch = this.pending.shift()
    if (!batch) {
      this.log.warn('Ack without a pending batch', { sequence })
      return
    }
    if (sequence > this.highestSequence) this.highestSequence = sequence
    for (const [key, newName] of batch.redirects) {
      const { blockType, name } = parseBlockKey(key)
      this.aliases.record(blockType, name, newName, sequence)
    }
  }

  private trackNames(record: ChangeRecord): void {
    if (record.operation === 'create') {
      this.aliases.invalidate(record.blockType, record.blockName)
    } else if (record.operation === 'rename' && record.sequence !== null) {
      this.aliases.record(record.blockType, record.blockName, record.newName, record.sequence)
    }
  }

  private count(result: DrainResult, outcome: ApplyOutcome): void {
    switch (outcome.status) {
      case 'applied':  result.applied++; break
      case 'deferred': result.deferred++; break
      case 'skipped':  result.skipped++; break
      case 'failed':   result.failed++; break
    }
  }

  // ─── Connection ─────────────────────────────────────────────────────────

  private async connect(): Promise<void> {
    const generation = ++this.generation
    this.setState('connecting')

    let transport: SyncTransport
    try {
      transport = await this.connector({
        onFrame: (frame) => this.receive(generation, frame),
        onClose: (error) => {
          if (generation === this.generation) {
            this.dropConnection(error ?? new TransportError('Connection closed by relay'))
          }
        },
      })
    } catch (err) {
      if (generation === this.generation && !this.stopped) this.dropConnection(toError(err))
      return
    }

    if (generation !== this.generation || this.stopped) {
      transport.close()
      return
    }
    this.transport = transport
    if (this.send({ kind: 'hello', clientId: this.clientId, resumeFrom: null })) {
      this.setState('syncing')
    }
  }

  private receive(generation: number, frame: Uint8Array): void {
    if (generation !== this.generation) return
    try {
      this.inbox.push(decodeMessage(frame))
    } catch (err) {
      this.dropConnection(new TransportError('Malformed frame from relay', err))
    }
  }

  private send(message: Message): boolean {
    const transport = this.transport
    if (!transport) return false
    try {
      transport.send(encodeMessage(message))
      return true
    } catch (err) {
      this.dropConnection(new TransportError(`Failed to send ${message.kind}`, err))
      return false
    }
  }

  /** Tear down the current connection; cancels pending sends and deferred records. */
  private dropConnection(error?: Error): void {
    this.generation++
    const transport = this.transport
    this.transport = null
    this.inbox = []
    this.pending = []
    this.scheduler.clear()

    if (transport) {
      try {
        transport.close()
      } catch (err) {
        this.log.debug('Error while closing transport', { error: toError(err) })
      }
    }
    if (error) {
      this.log.warn('Connection lost', { error })
    }
    this.setState('disconnected')
    if (!this.stopped) this.scheduleReconnect()
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) return
    const attempt = this.reconnectAttempt++
    const delayMs = backoffDelay(this.config.backoff, attempt)
    this.log.info('Scheduling reconnect', { attempt, delayMs })
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null
      this.connect().catch((err: unknown) => {
        this.log.error('Reconnect attempt failed', { error: toError(err) })
      })
    }, delayMs)
  }

  private setState(next: SyncState): void {
    const previous = this.currentState
    if (previous === next) return
    this.currentState = next
    this.log.info('Sync state changed', { from: previous, to: next })
    this.host.notify?.({
      level: next === 'disconnected' ? 'warn' : 'info',
      code: 'SYNC_STATE',
      message: `Sync ${next}`,
    })
    for (const listener of this.listeners) listener(next, previous)
  }
}
