/**
 * Wire protocol types for replicating scene data-blocks.
 *
 * Value format:   [1B valueTag] [variable payload]
 * Record format:  [1B opTag] [8B sequence] [str origin] [str blockType] [str blockName] [op payload]
 * Frame format:   [4B total_length] [1B messageKind] [body]
 *
 * Strings and blobs are length-prefixed ([4B length] [bytes]).
 * All multi-byte values are little-endian.
 */

// ─── Value Tags ─────────────────────────────────────────────────────────────

export const VAL_NULL   = 0x00 as const
export const VAL_INT    = 0x01 as const
export const VAL_FLOAT  = 0x02 as const
export const VAL_BOOL   = 0x03 as const
export const VAL_STRING = 0x04 as const
export const VAL_BLOB   = 0x05 as const
export const VAL_FLOATS = 0x06 as const
export const VAL_REF    = 0x07 as const

// ─── Field Values ───────────────────────────────────────────────────────────

export interface NullValue {
  type: 'null'
}

/** Safe integer, 8-byte signed on the wire. */
export interface IntValue {
  type: 'int'
  value: number
}

/** IEEE-754 double, fixed width so formatting never depends on the platform. */
export interface FloatValue {
  type: 'float'
  value: number
}

export interface BoolValue {
  type: 'bool'
  value: boolean
}

export interface StringValue {
  type: 'string'
  value: string
}

export interface BlobValue {
  type: 'blob'
  value: Uint8Array
}

/** Vectors, colors, matrices and vertex buffers. */
export interface FloatsValue {
  type: 'floats'
  value: readonly number[]
}

/** Reference to another data-block by name. A null name is a cleared reference. */
export interface RefValue {
  type: 'ref'
  blockType: string
  name: string | null
}

export type FieldValue =
  | NullValue
  | IntValue
  | FloatValue
  | BoolValue
  | StringValue
  | BlobValue
  | FloatsValue
  | RefValue

export type FieldValueType = FieldValue['type']

/** Field name → value. Encoded in sorted field-name order. */
export type FieldMap = Readonly<Record<string, FieldValue>>

export const NULL_VALUE: Readonly<NullValue> = { type: 'null' }

// ─── Block identity ─────────────────────────────────────────────────────────

export interface BlockId {
  blockType: string
  name: string
}

/** Canonical map key for a (type, name) pair. */
export function blockKey(blockType: string, name: string): string {
  return `${blockType}\u0000${name}`
}

export function parseBlockKey(key: string): BlockId {
  const sep = key.indexOf('\u0000')
  if (sep === -1) throw new Error(`Malformed block key: ${key}`)
  return { blockType: key.slice(0, sep), name: key.slice(sep + 1) }
}

// ─── Change Records ─────────────────────────────────────────────────────────

export const OP_CREATE = 0x01 as const
export const OP_UPDATE = 0x02 as const
export const OP_DELETE = 0x03 as const
export const OP_RENAME = 0x04 as const

interface RecordBase {
  /** Relay-assigned, strictly increasing. Null until the relay stamps it. */
  sequence: number | null
  originClientId: string
  blockType: string
  blockName: string
}

export interface CreateRecord extends RecordBase {
  operation: 'create'
  payload: FieldMap
}

export interface UpdateRecord extends RecordBase {
  operation: 'update'
  payload: FieldMap
}

export interface DeleteRecord extends RecordBase {
  operation: 'delete'
}

export interface RenameRecord extends RecordBase {
  operation: 'rename'
  newName: string
}

/** Discriminated union of all replicated mutations. */
export type ChangeRecord = CreateRecord | UpdateRecord | DeleteRecord | RenameRecord

export type ChangeOperation = ChangeRecord['operation']

/** A record that has passed through the relay. */
export type StampedRecord = ChangeRecord & { sequence: number }

export function isStamped(record: ChangeRecord): record is StampedRecord {
  return record.sequence !== null
}

// ─── Messages ───────────────────────────────────────────────────────────────

export const MSG_HELLO         = 0x01 as const
export const MSG_FULL_SNAPSHOT = 0x02 as const
export const MSG_CHANGE_BATCH  = 0x03 as const
export const MSG_ACK           = 0x04 as const
export const MSG_DISCONNECT    = 0x05 as const

/** Client → relay. `resumeFrom` asks for a replay instead of a full snapshot. */
export interface HelloMessage {
  kind: 'hello'
  clientId: string
  resumeFrom: number | null
}

/** Relay → client. Current authoritative state as Create records. */
export interface FullSnapshotMessage {
  kind: 'full-snapshot'
  lastSequence: number
  records: ChangeRecord[]
}

/** Bidirectional. Unstamped from a client, stamped from the relay. */
export interface ChangeBatchMessage {
  kind: 'change-batch'
  records: ChangeRecord[]
}

/**
 * Relay → client: last sequence assigned to the client's batch.
 * Client → relay: highest sequence received.
 */
export interface AckMessage {
  kind: 'ack'
  sequence: number
}

export interface DisconnectMessage {
  kind: 'disconnect'
  reason: string
}

export type Message =
  | HelloMessage
  | FullSnapshotMessage
  | ChangeBatchMessage
  | AckMessage
  | DisconnectMessage

export type MessageKind = Message['kind']

// ─── Size constants ─────────────────────────────────────────────────────────

/** Frame header: 4 bytes total length + 1 byte message kind. */
export const FRAME_HEADER_SIZE = 5

/** Fixed record header: 1 byte op + 8 bytes sequence. */
export const RECORD_FIXED_HEADER = 9

/** Length prefix for strings, blobs, arrays and persisted log entries. */
export const LENGTH_PREFIX = 4

/** Default relay TCP port. */
export const DEFAULT_RELAY_PORT = 25600

/** Default upper bound on a single frame (16 MiB). */
export const DEFAULT_MAX_FRAME_SIZE = 16 * 1024 * 1024
