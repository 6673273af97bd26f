/**
 * Change-log persistence.
 *
 * FileLogStore appends length-prefixed records to one file and syncs after
 * every batch, so a record is on disk before anyone sees its sequence. A
 * failed append is rolled back to the previous end of file. On load, a
 * truncated final entry (crash mid-append) is cut off with a warning.
 */

import {
  closeSync, existsSync, fdatasyncSync, fstatSync, ftruncateSync, openSync, readFileSync, truncateSync, writeSync,
} from 'node:fs'
import type { Logger } from '@scenesync/config'
import { createLogger } from '@scenesync/config'
import type { ChangeRecord, StampedRecord } from '@scenesync/wire-protocol'
import { decodeLogEntries, encodeLogEntry } from '@scenesync/wire-protocol'

export interface LogStore {
  /** Records persisted by earlier runs, oldest first. */
  load(): ChangeRecord[]
  append(records: readonly StampedRecord[]): void
  close(): void
}

/** Volatile store: persistence disabled. */
export class MemoryLogStore implements LogStore {
  readonly records: StampedRecord[] = []

  load(): ChangeRecord[] {
    return [...this.records]
  }

  append(records: readonly StampedRecord[]): void {
    this.records.push(...records)
  }

  close(): void {}
}

export class FileLogStore implements LogStore {
  private fd: number | null = null
  /** Set when a failed append could not be rolled back; the file is unusable. */
  private broken: Error | null = null
  private readonly log: Logger

  constructor(readonly path: string, logger?: Logger) {
    this.log = logger ?? createLogger('relay.log-store')
  }

  load(): ChangeRecord[] {
    if (!existsSync(this.path)) return []
    const { records, validBytes, truncatedBytes } = decodeLogEntries(readFileSync(this.path))
    if (truncatedBytes > 0) {
      this.log.warn('Ignoring truncated tail of change log', { path: this.path, truncatedBytes })
      truncateSync(this.path, validBytes)
    }
    return records
  }

  append(records: readonly StampedRecord[]): void {
    if (records.length === 0) return
    const entries = records.map(encodeLogEntry)
    const bytes = new Uint8Array(entries.reduce((sum, e) => sum + e.byteLength, 0))
    let offset = 0
    for (const entry of entries) {
      bytes.set(entry, offset)
      offset += entry.byteLength
    }

    if (this.broken) {
      throw new Error(`Change log ${this.path} is unusable after a failed write`, { cause: this.broken })
    }
    const fd = this.fd ?? (this.fd = openSync(this.path, 'a'))
    const end = fstatSync(fd).size
    try {
      let written = 0
      while (written < bytes.byteLength) {
        written += writeSync(fd, bytes, written, bytes.byteLength - written)
      }
      fdatasyncSync(fd)
    } catch (err) {
      this.rollback(fd, end, err)
      throw err
    }
  }

  private rollback(fd: number, end: number, cause: unknown): void {
    try {
      ftruncateSync(fd, end)
      this.log.warn('Rolled back failed change log write', { path: this.path, size: end, error: cause })
    } catch (err) {
      this.broken = err instanceof Error ? err : new Error(String(err))
      this.log.error('Cannot roll back change log write', { path: this.path, error: err })
    }
  }

  close(): void {
    if (this.fd === null) return
    closeSync(this.fd)
    this.fd = null
  }
}
