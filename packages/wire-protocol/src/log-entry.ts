/**
 * Persisted change log format: an append-only sequence of
 *   [4B record_length] [record bytes]
 *
 * A crash mid-append leaves a truncated final entry; the reader reports how
 * many bytes formed complete entries so the writer can cut the tail off.
 */

import type { ChangeRecord } from './types'
import { LENGTH_PREFIX } from './types'
import { encodeRecordInto, recordSize } from './encoder'
import { decodeRecord } from './decoder'

export interface LogReadResult {
  records: ChangeRecord[]
  /** Bytes consumed by complete entries. */
  validBytes: number
  /** Bytes of a trailing partial entry (0 when the log ends cleanly). */
  truncatedBytes: number
}

/** Encode one record as a length-prefixed log entry. */
export function encodeLogEntry(record: ChangeRecord): Uint8Array {
  const size = recordSize(record)
  const bytes = new Uint8Array(LENGTH_PREFIX + size)
  const view = new DataView(bytes.buffer)
  view.setUint32(0, size, true)
  encodeRecordInto(view, LENGTH_PREFIX, record)
  return bytes
}

/** Decode every complete entry in a log file's contents. */
export function decodeLogEntries(bytes: Uint8Array): LogReadResult {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  const records: ChangeRecord[] = []
  let offset = 0

  while (bytes.byteLength - offset >= LENGTH_PREFIX) {
    const size = view.getUint32(offset, true)
    const end = offset + LENGTH_PREFIX + size
    if (end > bytes.byteLength) break
    records.push(decodeRecord(bytes.subarray(offset + LENGTH_PREFIX, end)))
    offset = end
  }

  return { records, validBytes: offset, truncatedBytes: bytes.byteLength - offset }
}
