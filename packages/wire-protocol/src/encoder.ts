/**
 * Binary encoder: FieldValue / ChangeRecord → bytes via DataView.
 *
 * Every encoder comes in two halves, like the frame writer in frame.ts:
 * a size function that computes the exact byte count up front, and an
 * `...Into` function that writes at an offset and returns the new offset.
 *
 * Payload fields are written in sorted field-name order, so identical
 * field maps always produce identical bytes.
 */

import type { ChangeRecord, FieldMap, FieldValue } from './types'
import {
  VAL_NULL, VAL_INT, VAL_FLOAT, VAL_BOOL, VAL_STRING, VAL_BLOB, VAL_FLOATS, VAL_REF,
  OP_CREATE, OP_UPDATE, OP_DELETE, OP_RENAME,
  RECORD_FIXED_HEADER, LENGTH_PREFIX,
} from './types'

const UTF8 = new TextEncoder()

// ─── Primitives ─────────────────────────────────────────────────────────────

/** Byte size of a length-prefixed UTF-8 string. */
export function stringSize(value: string): number {
  return LENGTH_PREFIX + UTF8.encode(value).byteLength
}

export function writeString(view: DataView, offset: number, value: string): number {
  return writeBytes(view, offset, UTF8.encode(value))
}

export function writeBytes(view: DataView, offset: number, bytes: Uint8Array): number {
  view.setUint32(offset, bytes.byteLength, true)
  offset += LENGTH_PREFIX
  new Uint8Array(view.buffer, view.byteOffset + offset, bytes.byteLength).set(bytes)
  return offset + bytes.byteLength
}

/** Sequence numbers travel as uint64; 0 means "not yet stamped". */
export function writeSequence(view: DataView, offset: number, sequence: number | null): number {
  view.setBigUint64(offset, BigInt(sequence ?? 0), true)
  return offset + 8
}

/** Field names in canonical (sorted) order. */
export function sortedFieldNames(fields: FieldMap): string[] {
  return Object.keys(fields).sort()
}

// ─── Values ─────────────────────────────────────────────────────────────────

/** Exact byte size of an encoded value, tag included. */
export function valueSize(value: FieldValue): number {
  switch (value.type) {
    case 'null':   return 1
    case 'int':    return 1 + 8
    case 'float':  return 1 + 8
    case 'bool':   return 1 + 1
    case 'string': return 1 + stringSize(value.value)
    case 'blob':   return 1 + LENGTH_PREFIX + value.value.byteLength
    case 'floats': return 1 + LENGTH_PREFIX + value.value.length * 8
    case 'ref':
      return 1 + stringSize(value.blockType) + 1 + (value.name === null ? 0 : stringSize(value.name))
  }
}

/** Encode a value at the given offset. Returns new offset. */
export function encodeValueInto(view: DataView, offset: number, value: FieldValue): number {
  switch (value.type) {
    case 'null':
      view.setUint8(offset, VAL_NULL)
      return offset + 1

    case 'int':
      if (!Number.isSafeInteger(value.value)) {
        throw new Error(`Integer out of range: ${value.value}`)
      }
      view.setUint8(offset, VAL_INT)
      view.setBigInt64(offset + 1, BigInt(value.value), true)
      return offset + 9

    case 'float':
      view.setUint8(offset, VAL_FLOAT)
      view.setFloat64(offset + 1, value.value, true)
      return offset + 9

    case 'bool':
      view.setUint8(offset, VAL_BOOL)
      view.setUint8(offset + 1, value.value ? 1 : 0)
      return offset + 2

    case 'string':
      view.setUint8(offset, VAL_STRING)
      return writeString(view, offset + 1, value.value)

    case 'blob':
      view.setUint8(offset, VAL_BLOB)
      return writeBytes(view, offset + 1, value.value)

    case 'floats': {
      view.setUint8(offset, VAL_FLOATS); offset += 1
      view.setUint32(offset, value.value.length, true); offset += LENGTH_PREFIX
      for (const f of value.value) {
        view.setFloat64(offset, f, true); offset += 8
      }
      return offset
    }

    case 'ref':
      view.setUint8(offset, VAL_REF)
      offset = writeString(view, offset + 1, value.blockType)
      if (value.name === null) {
        view.setUint8(offset, 0)
        return offset + 1
      }
      view.setUint8(offset, 1)
      return writeString(view, offset + 1, value.name)
  }
}

/** Encode a single value into a fresh buffer. Used for canonical field bytes. */
export function encodeValue(value: FieldValue): Uint8Array {
  const bytes = new Uint8Array(valueSize(value))
  encodeValueInto(new DataView(bytes.buffer), 0, value)
  return bytes
}

// ─── Field maps ─────────────────────────────────────────────────────────────

export function fieldMapSize(fields: FieldMap): number {
  let size = LENGTH_PREFIX
  for (const name of sortedFieldNames(fields)) {
    size += stringSize(name) + valueSize(fieldAt(fields, name))
  }
  return size
}

export function encodeFieldMapInto(view: DataView, offset: number, fields: FieldMap): number {
  const names = sortedFieldNames(fields)
  view.setUint32(offset, names.length, true)
  offset += LENGTH_PREFIX
  for (const name of names) {
    offset = writeString(view, offset, name)
    offset = encodeValueInto(view, offset, fieldAt(fields, name))
  }
  return offset
}

function fieldAt(fields: FieldMap, name: string): FieldValue {
  const value = fields[name]
  if (value === undefined) throw new Error(`Missing field: ${name}`)
  return value
}

// ─── Records ────────────────────────────────────────────────────────────────

/** Calculate the exact byte size for encoding a change record. */
export function recordSize(record: ChangeRecord): number {
  const header = RECORD_FIXED_HEADER
    + stringSize(record.originClientId)
    + stringSize(record.blockType)
    + stringSize(record.blockName)

  switch (record.operation) {
    case 'create':
    case 'update': return header + fieldMapSize(record.payload)
    case 'delete': return header
    case 'rename': return header + stringSize(record.newName)
  }
}

function opTag(record: ChangeRecord): number {
  switch (record.operation) {
    case 'create': return OP_CREATE
    case 'update': return OP_UPDATE
    case 'delete': return OP_DELETE
    case 'rename': return OP_RENAME
  }
}

/** Encode a change record into an existing DataView at the given offset. Returns new offset. */
export function encodeRecordInto(view: DataView, offset: number, record: ChangeRecord): number {
  view.setUint8(offset, opTag(record))
  offset = writeSequence(view, offset + 1, record.sequence)
  offset = writeString(view, offset, record.originClientId)
  offset = writeString(view, offset, record.blockType)
  offset = writeString(view, offset, record.blockName)

  switch (record.operation) {
    case 'create':
    case 'update':
      return encodeFieldMapInto(view, offset, record.payload)
    case 'delete':
      return offset
    case 'rename':
      return writeString(view, offset, record.newName)
  }
}

/** Encode a single change record into a new buffer. */
export function encodeRecord(record: ChangeRecord): Uint8Array {
  const bytes = new Uint8Array(recordSize(record))
  encodeRecordInto(new DataView(bytes.buffer), 0, record)
  return bytes
}
