// Types
export type {
  FieldValue, FieldValueType, FieldMap,
  NullValue, IntValue, FloatValue, BoolValue, StringValue, BlobValue, FloatsValue, RefValue,
  BlockId,
  ChangeRecord, ChangeOperation, StampedRecord,
  CreateRecord, UpdateRecord, DeleteRecord, RenameRecord,
  Message, MessageKind,
  HelloMessage, FullSnapshotMessage, ChangeBatchMessage, AckMessage, DisconnectMessage,
} from './types'

export {
  VAL_NULL, VAL_INT, VAL_FLOAT, VAL_BOOL, VAL_STRING, VAL_BLOB, VAL_FLOATS, VAL_REF,
  OP_CREATE, OP_UPDATE, OP_DELETE, OP_RENAME,
  MSG_HELLO, MSG_FULL_SNAPSHOT, MSG_CHANGE_BATCH, MSG_ACK, MSG_DISCONNECT,
  NULL_VALUE, FRAME_HEADER_SIZE, RECORD_FIXED_HEADER, LENGTH_PREFIX,
  DEFAULT_RELAY_PORT, DEFAULT_MAX_FRAME_SIZE,
  blockKey, parseBlockKey, isStamped,
} from './types'

// Encoder
export {
  encodeValue, encodeValueInto, valueSize,
  encodeRecord, encodeRecordInto, recordSize,
  sortedFieldNames,
} from './encoder'

// Decoder
export { ByteCursor, decodeValue, readValue, decodeRecord, readRecord } from './decoder'

// Message framing
export { encodeMessage, decodeMessage, peekFrameLength, FrameReader } from './frame'

// Persisted log entries
export { encodeLogEntry, decodeLogEntries, type LogReadResult } from './log-entry'
