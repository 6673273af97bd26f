/**
 * Binary decoder: bytes → FieldValue / ChangeRecord via DataView.
 *
 * Reads the wire format produced by encoder.ts.
 * All multi-byte values are little-endian.
 */

import type { ChangeRecord, FieldValue } from './types'
import {
  VAL_NULL, VAL_INT, VAL_FLOAT, VAL_BOOL, VAL_STRING, VAL_BLOB, VAL_FLOATS, VAL_REF,
  OP_CREATE, OP_UPDATE, OP_DELETE, OP_RENAME,
} from './types'

const UTF8 = new TextDecoder('utf-8', { fatal: true })

function hex(tag: number): string {
  return `0x${tag.toString(16).padStart(2, '0')}`
}

// ─── Cursor ─────────────────────────────────────────────────────────────────

/** Sequential reader over a DataView with bounds checking. */
export class ByteCursor {
  constructor(
    readonly view: DataView,
    public offset = 0,
  ) {}

  static of(bytes: Uint8Array): ByteCursor {
    return new ByteCursor(new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength))
  }

  get remaining(): number {
    return this.view.byteLength - this.offset
  }

  private need(n: number): void {
    if (n > this.remaining) {
      throw new Error(`Truncated input: need ${n} bytes at offset ${this.offset}, have ${this.remaining}`)
    }
  }

  u8(): number {
    this.need(1)
    const v = this.view.getUint8(this.offset)
    this.offset += 1
    return v
  }

  u32(): number {
    this.need(4)
    const v = this.view.getUint32(this.offset, true)
    this.offset += 4
    return v
  }

  u64(): number {
    this.need(8)
    const v = this.view.getBigUint64(this.offset, true)
    this.offset += 8
    if (v > BigInt(Number.MAX_SAFE_INTEGER)) throw new Error(`uint64 out of range: ${v}`)
    return Number(v)
  }

  i64(): number {
    this.need(8)
    const v = this.view.getBigInt64(this.offset, true)
    this.offset += 8
    if (v > BigInt(Number.MAX_SAFE_INTEGER) || v < BigInt(Number.MIN_SAFE_INTEGER)) {
      throw new Error(`int64 out of range: ${v}`)
    }
    return Number(v)
  }

  f64(): number {
    this.need(8)
    const v = this.view.getFloat64(this.offset, true)
    this.offset += 8
    return v
  }

  /** Length-prefixed bytes, copied out of the underlying buffer. */
  bytes(): Uint8Array {
    const length = this.u32()
    this.need(length)
    const start = this.view.byteOffset + this.offset
    this.offset += length
    return new Uint8Array(this.view.buffer.slice(start, start + length))
  }

  string(): string {
    const length = this.u32()
    this.need(length)
    const s = UTF8.decode(new Uint8Array(this.view.buffer, this.view.byteOffset + this.offset, length))
    this.offset += length
    return s
  }
}

// ─── Values ─────────────────────────────────────────────────────────────────

export function readValue(cursor: ByteCursor): FieldValue {
  const tag = cursor.u8()

  switch (tag) {
    case VAL_NULL:
      return { type: 'null' }

    case VAL_INT:
      return { type: 'int', value: cursor.i64() }

    case VAL_FLOAT:
      return { type: 'float', value: cursor.f64() }

    case VAL_BOOL:
      return { type: 'bool', value: cursor.u8() !== 0 }

    case VAL_STRING:
      return { type: 'string', value: cursor.string() }

    case VAL_BLOB:
      return { type: 'blob', value: cursor.bytes() }

    case VAL_FLOATS: {
      const count = cursor.u32()
      if (count * 8 > cursor.remaining) {
        throw new Error(`Truncated float array: ${count} items at offset ${cursor.offset}`)
      }
      const value: number[] = []
      for (let i = 0; i < count; i++) value.push(cursor.f64())
      return { type: 'floats', value }
    }

    case VAL_REF: {
      const blockType = cursor.string()
      const hasName = cursor.u8() !== 0
      return { type: 'ref', blockType, name: hasName ? cursor.string() : null }
    }

    default:
      throw new Error(`Unknown value tag: ${hex(tag)}`)
  }
}

/** Decode a single value from a standalone buffer. */
export function decodeValue(bytes: Uint8Array): FieldValue {
  return readValue(ByteCursor.of(bytes))
}

function readFieldMap(cursor: ByteCursor): Record<string, FieldValue> {
  const count = cursor.u32()
  const fields: Record<string, FieldValue> = {}
  for (let i = 0; i < count; i++) {
    const name = cursor.string()
    fields[name] = readValue(cursor)
  }
  return fields
}

// ─── Records ────────────────────────────────────────────────────────────────

/** Decode a change record at the cursor position, advancing it. */
export function readRecord(cursor: ByteCursor): ChangeRecord {
  const tag = cursor.u8()
  const rawSequence = cursor.u64()
  const sequence = rawSequence === 0 ? null : rawSequence
  const originClientId = cursor.string()
  const blockType = cursor.string()
  const blockName = cursor.string()
  const base = { sequence, originClientId, blockType, blockName }

  switch (tag) {
    case OP_CREATE:
      return { ...base, operation: 'create', payload: readFieldMap(cursor) }
    case OP_UPDATE:
      return { ...base, operation: 'update', payload: readFieldMap(cursor) }
    case OP_DELETE:
      return { ...base, operation: 'delete' }
    case OP_RENAME:
      return { ...base, operation: 'rename', newName: cursor.string() }
    default:
      throw new Error(`Unknown op type: ${hex(tag)}`)
  }
}

/** Decode a single change record from a standalone buffer. */
export function decodeRecord(bytes: Uint8Array): ChangeRecord {
  const cursor = ByteCursor.of(bytes)
  const record = readRecord(cursor)
  if (cursor.remaining !== 0) {
    throw new Error(`Trailing bytes after record: ${cursor.remaining}`)
  }
  return record
}
