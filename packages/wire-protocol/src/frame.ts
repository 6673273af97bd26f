/**
 * Message framing: pack protocol messages into length-prefixed frames.
 *
 * Frame format:
 *   [4B total_length] [1B message_kind] [body]
 *
 * The total_length includes the 5-byte frame header, so a reader can split
 * a byte stream into frames without understanding the body.
 *
 * Bodies:
 *   Hello         [str clientId] [1B hasResume] [8B resumeFrom]
 *   FullSnapshot  [8B lastSequence] [4B count] [records...]
 *   ChangeBatch   [4B count] [records...]
 *   Ack           [8B sequence]
 *   Disconnect    [str reason]
 */

import type { ChangeRecord, Message } from './types'
import {
  MSG_HELLO, MSG_FULL_SNAPSHOT, MSG_CHANGE_BATCH, MSG_ACK, MSG_DISCONNECT,
  FRAME_HEADER_SIZE, LENGTH_PREFIX, DEFAULT_MAX_FRAME_SIZE,
} from './types'
import { encodeRecordInto, recordSize, stringSize, writeSequence, writeString } from './encoder'
import { ByteCursor, readRecord } from './decoder'

// ─── Size calculation ───────────────────────────────────────────────────────

function recordsSize(records: readonly ChangeRecord[]): number {
  let size = LENGTH_PREFIX
  for (const record of records) size += recordSize(record)
  return size
}

function bodySize(message: Message): number {
  switch (message.kind) {
    case 'hello':         return stringSize(message.clientId) + 1 + 8
    case 'full-snapshot': return 8 + recordsSize(message.records)
    case 'change-batch':  return recordsSize(message.records)
    case 'ack':           return 8
    case 'disconnect':    return stringSize(message.reason)
  }
}

function kindTag(message: Message): number {
  switch (message.kind) {
    case 'hello':         return MSG_HELLO
    case 'full-snapshot': return MSG_FULL_SNAPSHOT
    case 'change-batch':  return MSG_CHANGE_BATCH
    case 'ack':           return MSG_ACK
    case 'disconnect':    return MSG_DISCONNECT
  }
}

function writeRecords(view: DataView, offset: number, records: readonly ChangeRecord[]): number {
  view.setUint32(offset, records.length, true)
  offset += LENGTH_PREFIX
  for (const record of records) {
    offset = encodeRecordInto(view, offset, record)
  }
  return offset
}

// ─── Encode ─────────────────────────────────────────────────────────────────

/** Encode a message into a single self-delimiting frame. */
export function encodeMessage(message: Message): Uint8Array {
  const totalSize = FRAME_HEADER_SIZE + bodySize(message)
  const bytes = new Uint8Array(totalSize)
  const view = new DataView(bytes.buffer)

  view.setUint32(0, totalSize, true)
  view.setUint8(4, kindTag(message))

  let offset = FRAME_HEADER_SIZE
  switch (message.kind) {
    case 'hello':
      offset = writeString(view, offset, message.clientId)
      view.setUint8(offset, message.resumeFrom === null ? 0 : 1)
      offset = writeSequence(view, offset + 1, message.resumeFrom)
      break

    case 'full-snapshot':
      offset = writeSequence(view, offset, message.lastSequence)
      offset = writeRecords(view, offset, message.records)
      break

    case 'change-batch':
      offset = writeRecords(view, offset, message.records)
      break

    case 'ack':
      offset = writeSequence(view, offset, message.sequence)
      break

    case 'disconnect':
      offset = writeString(view, offset, message.reason)
      break
  }

  if (offset !== totalSize) {
    throw new Error(`Frame size mismatch: wrote ${offset} bytes, expected ${totalSize}`)
  }
  return bytes
}

// ─── Decode ─────────────────────────────────────────────────────────────────

function readRecords(cursor: ByteCursor): ChangeRecord[] {
  const count = cursor.u32()
  const records: ChangeRecord[] = []
  for (let i = 0; i < count; i++) {
    records.push(readRecord(cursor))
  }
  return records
}

/** Decode one complete frame into a message. */
export function decodeMessage(frame: Uint8Array): Message {
  const cursor = ByteCursor.of(frame)

  const totalLength = cursor.u32()
  if (totalLength !== frame.byteLength) {
    throw new Error(`Frame length mismatch: header says ${totalLength}, buffer is ${frame.byteLength}`)
  }

  const kind = cursor.u8()
  let message: Message

  switch (kind) {
    case MSG_HELLO: {
      const clientId = cursor.string()
      const hasResume = cursor.u8() !== 0
      const resumeFrom = cursor.u64()
      message = { kind: 'hello', clientId, resumeFrom: hasResume ? resumeFrom : null }
      break
    }

    case MSG_FULL_SNAPSHOT: {
      const lastSequence = cursor.u64()
      message = { kind: 'full-snapshot', lastSequence, records: readRecords(cursor) }
      break
    }

    case MSG_CHANGE_BATCH:
      message = { kind: 'change-batch', records: readRecords(cursor) }
      break

    case MSG_ACK:
      message = { kind: 'ack', sequence: cursor.u64() }
      break

    case MSG_DISCONNECT:
      message = { kind: 'disconnect', reason: cursor.string() }
      break

    default:
      throw new Error(`Unknown message kind: 0x${kind.toString(16).padStart(2, '0')}`)
  }

  if (cursor.remaining !== 0) {
    throw new Error(`Trailing bytes in frame: ${cursor.remaining}`)
  }
  return message
}

/** Read the total frame length from the first 4 bytes (useful for streaming). */
export function peekFrameLength(bytes: Uint8Array): number {
  if (bytes.byteLength < LENGTH_PREFIX) {
    throw new Error(`Buffer too small for frame length: ${bytes.byteLength} bytes`)
  }
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getUint32(0, true)
}

// ─── Stream reassembly ──────────────────────────────────────────────────────

/**
 * Splits a byte stream (e.g. TCP chunks) back into whole frames.
 * One FrameReader per connection.
 *
 * Chunks are kept as received and copied once, when the frame they belong to
 * is complete, so a large frame arriving in many chunks costs linear time.
 */
export class FrameReader {
  private chunks: Uint8Array[] = []
  private size = 0
  /** Total length of the frame at the head of the buffer, once its prefix is in. */
  private expected: number | null = null

  constructor(private readonly maxFrameSize = DEFAULT_MAX_FRAME_SIZE) {}

  /** Bytes received but not yet part of a complete frame. */
  get pending(): number {
    return this.size
  }

  /** Append a chunk and return every frame it completes. */
  push(chunk: Uint8Array): Uint8Array[] {
    if (chunk.byteLength > 0) {
      this.chunks.push(chunk.slice())
      this.size += chunk.byteLength
    }
    const frames: Uint8Array[] = []

    for (;;) {
      if (this.expected === null) {
        if (this.size < LENGTH_PREFIX) break
        const length = peekFrameLength(this.read(LENGTH_PREFIX, false))
        if (length < FRAME_HEADER_SIZE || length > this.maxFrameSize) {
          throw new Error(`Invalid frame length: ${length} (max ${this.maxFrameSize})`)
        }
        this.expected = length
      }
      if (this.size < this.expected) break
      frames.push(this.read(this.expected, true))
      this.expected = null
    }

    return frames
  }

  reset(): void {
    this.chunks = []
    this.size = 0
    this.expected = null
  }

  /** First `n` buffered bytes; `consume` drops them from the buffer. */
  private read(n: number, consume: boolean): Uint8Array {
    const head = this.chunks[0]
    let out: Uint8Array
    if (head && head.byteLength >= n) {
      out = head.subarray(0, n)
    } else {
      out = new Uint8Array(n)
      let offset = 0
      for (const chunk of this.chunks) {
        if (offset === n) break
        const count = Math.min(n - offset, chunk.byteLength)
        out.set(chunk.subarray(0, count), offset)
        offset += count
      }
    }
    if (consume) this.drop(n)
    return out
  }

  private drop(n: number): void {
    let left = n
    while (left > 0) {
      const head = this.chunks[0]
      if (!head) break
      if (head.byteLength <= left) {
        this.chunks.shift()
        left -= head.byteLength
      } else {
        this.chunks[0] = head.subarray(left)
        left = 0
      }
    }
    this.size -= n
  }
}
