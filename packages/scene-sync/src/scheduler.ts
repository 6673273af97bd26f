/**
 * DependencyScheduler: apply incoming records to the host in an order that
 * keeps every reference resolvable.
 *
 * A record whose reference targets are missing is parked under the first
 * missing target and retried, FIFO, as soon as that target is created or
 * renamed into place. At the end of a batch, cycles of parked creates are
 * broken by creating one member with its unresolved references cleared and
 * parking the cleared fields as a follow-up update. Every retry counts
 * against the retry budget; a record over budget is reported and dropped.
 * A record the host throws on is reported the same way, and the batch goes on.
 */

import type { Logger } from '@scenesync/config'
import { createLogger } from '@scenesync/config'
import type {
  BlockId, ChangeRecord, CreateRecord, FieldMap, FieldValue, UpdateRecord,
} from '@scenesync/wire-protocol'
import { blockKey, sortedFieldNames } from '@scenesync/wire-protocol'
import type { HostFields, HostValue, SceneHost } from './types'
import { DuplicateCreate, HostRejected, SyncError, UnresolvableDependency } from './errors'
import { asHostRef, toHostValue } from './host-values'
import { compareBlocks } from './diff'

export type ApplyOutcome =
  | { status: 'applied'; record: ChangeRecord }
  | { status: 'deferred'; record: ChangeRecord; missing: BlockId }
  | { status: 'skipped'; record: ChangeRecord; reason: string }
  | { status: 'failed'; record: ChangeRecord; error: SyncError }

export interface SchedulerOptions {
  /** Block types the scheduler may touch. Records for other types are skipped. */
  replicatedTypes: readonly string[]
  retryLimit: number
  logger?: Logger
  /** Called after every record that reached the host, including retries. */
  onApplied?: (record: ChangeRecord) => void
}

interface Parked {
  record: ChangeRecord
  missing: BlockId
  attempts: number
}

export class DependencyScheduler {
  /** Parked records keyed by the block they wait on. */
  private parked = new Map<string, Parked[]>()
  private readonly replicated: ReadonlySet<string>
  private readonly retryLimit: number
  private readonly log: Logger
  private readonly onApplied: ((record: ChangeRecord) => void) | undefined

  constructor(private readonly host: SceneHost, options: SchedulerOptions) {
    this.replicated = new Set(options.replicatedTypes)
    this.retryLimit = options.retryLimit
    this.log = options.logger ?? createLogger('scheduler')
    this.onApplied = options.onApplied
  }

  /** Number of records waiting on a dependency. */
  get deferredCount(): number {
    let count = 0
    for (const list of this.parked.values()) count += list.length
    return count
  }

  /** Apply one record now, or park it until its dependency appears. */
  apply(record: ChangeRecord): ApplyOutcome {
    return this.attempt(record, 0)
  }

  /** Apply records in order, then break any cycles they left behind. */
  applyBatch(records: readonly ChangeRecord[]): ApplyOutcome[] {
    const outcomes = records.map((record) => this.apply(record))
    return [...outcomes, ...this.endBatch()]
  }

  /**
   * Batch boundary: break dependency cycles, then charge one retry to every
   * record still parked. Returns outcomes for records this changed.
   */
  endBatch(): ApplyOutcome[] {
    const outcomes: ApplyOutcome[] = []
    for (let entry = this.findCycleMember(); entry; entry = this.findCycleMember()) {
      outcomes.push(this.placeholderCreate(entry))
    }

    for (const [key, list] of [...this.parked]) {
      const kept: Parked[] = []
      for (const entry of list) {
        entry.attempts++
        if (entry.attempts > this.retryLimit) {
          outcomes.push(this.fail(entry.record, entry.missing, entry.attempts))
        } else {
          kept.push(entry)
        }
      }
      if (kept.length > 0) this.parked.set(key, kept)
      else this.parked.delete(key)
    }
    return outcomes
  }

  /** Drop everything parked. Used on disconnect. */
  clear(): void {
    this.parked.clear()
  }

  // ─── Dependency checks ──────────────────────────────────────────────────

  private missingDependency(record: ChangeRecord): BlockId | null {
    switch (record.operation) {
      case 'create':
        return this.missingReference(record.payload, { blockType: record.blockType, name: record.blockName })
      case 'update':
        if (!this.host.hasBlock(record.blockType, record.blockName)) {
          return { blockType: record.blockType, name: record.blockName }
        }
        return this.missingReference(record.payload, null)
      case 'rename':
        if (
          !this.host.hasBlock(record.blockType, record.blockName)
          && !this.host.hasBlock(record.blockType, record.newName)
        ) {
          return { blockType: record.blockType, name: record.blockName }
        }
        return null
      case 'delete':
        return null
    }
  }

  private missingReference(fields: FieldMap, self: BlockId | null): BlockId | null {
    for (const field of sortedFieldNames(fields)) {
      const value = fields[field]
      if (value?.type !== 'ref' || value.name === null) continue
      if (self && value.blockType === self.blockType && value.name === self.name) continue
      if (!this.host.hasBlock(value.blockType, value.name)) {
        return { blockType: value.blockType, name: value.name }
      }
    }
    return null
  }

  // ─── Apply ──────────────────────────────────────────────────────────────

  private attempt(record: ChangeRecord, attempts: number): ApplyOutcome {
    if (!this.replicated.has(record.blockType)) {
      return { status: 'skipped', record, reason: `type ${record.blockType} is not replicated` }
    }
    const missing = this.missingDependency(record)
    if (missing) return this.park(record, missing, attempts)
    return this.execute(record)
  }

  private park(record: ChangeRecord, missing: BlockId, attempts: number): ApplyOutcome {
    if (attempts > this.retryLimit) return this.fail(record, missing, attempts)
    const key = blockKey(missing.blockType, missing.name)
    const list = this.parked.get(key)
    const entry: Parked = { record, missing, attempts }
    if (list) list.push(entry)
    else this.parked.set(key, [entry])
    this.log.debug('Deferred record', {
      operation: record.operation, blockType: record.blockType, block: record.blockName,
      waitingOn: `${missing.blockType}/${missing.name}`, attempts,
    })
    return { status: 'deferred', record, missing }
  }

  private fail(record: ChangeRecord, missing: BlockId, attempts: number): ApplyOutcome {
    const error = new UnresolvableDependency(record, missing, attempts)
    this.log.error('Dropping record with unresolvable dependency', { error })
    this.host.notify?.({ level: 'error', code: error.code, message: error.message })
    return { status: 'failed', record, error }
  }

  private execute(record: ChangeRecord): ApplyOutcome {
    try {
      return this.mutate(record)
    } catch (err) {
      const error = new HostRejected(record, err)
      this.log.error('Host rejected record', { error })
      this.host.notify?.({ level: 'error', code: error.code, message: error.message })
      return { status: 'failed', record, error }
    }
  }

  private mutate(record: ChangeRecord): ApplyOutcome {
    const { blockType, blockName } = record
    switch (record.operation) {
      case 'create':
        if (this.host.hasBlock(blockType, blockName)) {
          const warning = new DuplicateCreate(blockType, blockName)
          this.log.warn(warning.message, { blockType, block: blockName })
          this.writeFields(blockType, blockName, record.payload)
        } else {
          this.host.createBlock(blockType, blockName, hostFields(record.payload))
        }
        break
      case 'update':
        this.writeFields(blockType, blockName, record.payload)
        break
      case 'delete':
        if (!this.host.hasBlock(blockType, blockName)) {
          return { status: 'skipped', record, reason: 'block already absent' }
        }
        this.host.deleteBlock(blockType, blockName)
        this.rewriteReferences(blockType, blockName, null)
        break
      case 'rename':
        if (!this.host.hasBlock(blockType, blockName)) {
          return { status: 'skipped', record, reason: 'block already renamed' }
        }
        if (this.host.hasBlock(blockType, record.newName)) {
          this.log.warn('Rename target already exists', { blockType, block: blockName, newName: record.newName })
          return { status: 'skipped', record, reason: `name ${record.newName} is taken` }
        }
        this.host.renameBlock(blockType, blockName, record.newName)
        this.rewriteReferences(blockType, blockName, record.newName)
        break
    }

    this.onApplied?.(record)
    const created = record.operation === 'rename' ? record.newName : blockName
    if (record.operation === 'create' || record.operation === 'rename') {
      this.release(blockType, created)
    }
    return { status: 'applied', record }
  }

  private writeFields(blockType: string, name: string, fields: FieldMap): void {
    for (const field of sortedFieldNames(fields)) {
      const value = fields[field]
      if (value !== undefined) this.host.updateBlock(blockType, name, field, toHostValue(value))
    }
  }

  /** Repoint references to a renamed block, or clear references to a deleted one. */
  private rewriteReferences(blockType: string, name: string, newName: string | null): void {
    for (const type of this.replicated) {
      for (const block of this.host.enumerateBlocks(type)) {
        for (const [field, raw] of Object.entries(block.fields)) {
          const ref = asHostRef(raw)
          if (ref && ref.$ref === blockType && ref.name === name) {
            const value: HostValue = { $ref: blockType, name: newName }
            this.host.updateBlock(type, block.name, field, value)
          }
        }
      }
    }
  }

  /** Retry, in arrival order, every record parked on a block that now exists. */
  private release(blockType: string, name: string): void {
    const key = blockKey(blockType, name)
    const waiting = this.parked.get(key)
    if (!waiting) return
    this.parked.delete(key)
    for (const entry of waiting) {
      this.attempt(entry.record, entry.attempts + 1)
    }
  }

  // ─── Cycles ─────────────────────────────────────────────────────────────

  private parkedCreate(key: string): Parked | undefined {
    for (const list of this.parked.values()) {
      const found = list.find((entry) =>
        entry.record.operation === 'create'
        && blockKey(entry.record.blockType, entry.record.blockName) === key)
      if (found) return found
    }
    return undefined
  }

  /** Smallest parked create whose chain of waits leads back to itself. */
  private findCycleMember(): Parked | undefined {
    const creates: Parked[] = []
    for (const list of this.parked.values()) {
      for (const entry of list) {
        if (entry.record.operation === 'create') creates.push(entry)
      }
    }
    creates.sort((a, b) => compareBlocks(
      { blockType: a.record.blockType, name: a.record.blockName },
      { blockType: b.record.blockType, name: b.record.blockName },
    ))

    for (const start of creates) {
      const startKey = blockKey(start.record.blockType, start.record.blockName)
      const seen = new Set<string>([startKey])
      let current = start
      for (;;) {
        const nextKey = blockKey(current.missing.blockType, current.missing.name)
        if (nextKey === startKey) return start
        if (seen.has(nextKey)) break
        const next = this.parkedCreate(nextKey)
        if (!next) break
        seen.add(nextKey)
        current = next
      }
    }
    return undefined
  }

  private unpark(entry: Parked): void {
    const key = blockKey(entry.missing.blockType, entry.missing.name)
    const list = this.parked.get(key)
    if (!list) return
    const rest = list.filter((e) => e !== entry)
    if (rest.length > 0) this.parked.set(key, rest)
    else this.parked.delete(key)
  }

  /**
   * Create a cycle member with its unresolved references cleared, and park
   * the cleared references as an update on the first missing target.
   */
  private placeholderCreate(entry: Parked): ApplyOutcome {
    this.unpark(entry)
    const record = entry.record
    if (record.operation !== 'create') return this.attempt(record, entry.attempts + 1)

    const resolved: Record<string, FieldValue> = {}
    const deferred: Record<string, FieldValue> = {}
    for (const field of sortedFieldNames(record.payload)) {
      const value = record.payload[field]
      if (value === undefined) continue
      const dangling = value.type === 'ref'
        && value.name !== null
        && !(value.blockType === record.blockType && value.name === record.blockName)
        && !this.host.hasBlock(value.blockType, value.name)
      if (dangling) {
        deferred[field] = value
        resolved[field] = { type: 'ref', blockType: value.blockType, name: null }
      } else {
        resolved[field] = value
      }
    }

    this.log.info('Breaking reference cycle with a placeholder', {
      blockType: record.blockType, block: record.blockName, deferredFields: Object.keys(deferred),
    })

    const placeholder: CreateRecord = { ...record, payload: resolved }
    const residual: UpdateRecord = {
      operation: 'update',
      sequence: record.sequence,
      originClientId: record.originClientId,
      blockType: record.blockType,
      blockName: record.blockName,
      payload: deferred,
    }
    const missing = this.missingReference(deferred, null)
    if (missing) this.park(residual, missing, entry.attempts)
    return this.execute(placeholder)
  }
}

function hostFields(fields: FieldMap): HostFields {
  const out: Record<string, HostValue> = {}
  for (const field of sortedFieldNames(fields)) {
    const value = fields[field]
    if (value !== undefined) out[field] = toHostValue(value)
  }
  return out
}
