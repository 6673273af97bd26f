/**
 * RelayState: the single owner of the sequence counter, the change log, the
 * compacted scene and per-client resume points.
 *
 * Every mutation goes through stamp(), which is synchronous: records are
 * numbered, persisted and folded before the caller can broadcast them.
 */

import type { Logger } from '@scenesync/config'
import { createLogger } from '@scenesync/config'
import type { ChangeRecord, CreateRecord, StampedRecord } from '@scenesync/wire-protocol'
import { isStamped } from '@scenesync/wire-protocol'
import { CompactedScene } from './compactor'
import type { LogStore } from './log-store'

export class RelayState {
  private sequence = 0
  private readonly history: StampedRecord[] = []
  private readonly scene = new CompactedScene()
  private readonly resumePoints = new Map<string, number>()

  private constructor(private readonly store: LogStore) {}

  /** Rebuild state from whatever the store persisted. */
  static open(store: LogStore, logger: Logger = createLogger('relay.state')): RelayState {
    const state = new RelayState(store)
    for (const record of store.load()) {
      if (!isStamped(record) || record.sequence <= state.sequence) {
        throw new Error(`Corrupt change log: sequence ${String(record.sequence)} after ${state.sequence}`)
      }
      state.commit(record)
    }
    logger.info('Relay state restored', { lastSequence: state.sequence, blocks: state.scene.size })
    return state
  }

  get lastSequence(): number {
    return this.sequence
  }

  get blockCount(): number {
    return this.scene.size
  }

  get logLength(): number {
    return this.history.length
  }

  /** Assign the next sequences to `records`, persist them, fold them in. */
  stamp(records: readonly ChangeRecord[], originClientId: string): StampedRecord[] {
    let next = this.sequence
    const stamped = records.map((record): StampedRecord => ({ ...record, originClientId, sequence: ++next }))
    this.store.append(stamped)
    for (const record of stamped) this.commit(record)
    return stamped
  }

  /**
   * Records after `sequence`, or null when the log cannot replay from there
   * and the caller needs a full snapshot instead.
   */
  recordsAfter(sequence: number): StampedRecord[] | null {
    if (sequence > this.sequence) return null
    const first = this.history[0]
    if (first && sequence < first.sequence - 1) return null
    return this.history.filter((record) => record.sequence > sequence)
  }

  snapshotRecords(): CreateRecord[] {
    return this.scene.toRecords()
  }

  resumePoint(clientId: string): number | undefined {
    return this.resumePoints.get(clientId)
  }

  /**
   * Highest sequence a client reported; never moves backwards or past the log.
   * Reported by the status endpoint. Replay uses the client's own resumeFrom.
   */
  acknowledge(clientId: string, sequence: number): void {
    const current = this.resumePoints.get(clientId) ?? 0
    const clamped = Math.min(sequence, this.sequence)
    if (clamped > current) this.resumePoints.set(clientId, clamped)
  }

  close(): void {
    this.store.close()
  }

  private commit(record: StampedRecord): void {
    this.sequence = record.sequence
    this.history.push(record)
    this.scene.apply(record)
  }
}
