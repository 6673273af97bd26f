/**
 * Error taxonomy for the synchronization engine.
 *
 * Transport and dependency errors are recovered locally (state transitions,
 * retries); encoding and duplicate errors are recovered per field / record.
 */

import type { BlockId, ChangeRecord } from '@scenesync/wire-protocol'

export type SyncErrorCode =
  | 'SNAPSHOT_INCONSISTENT'
  | 'ENCODING_ERROR'
  | 'UNRESOLVABLE_DEPENDENCY'
  | 'TRANSPORT_ERROR'
  | 'DUPLICATE_CREATE'
  | 'HOST_REJECTED'

export class SyncError extends Error {
  constructor(
    readonly code: SyncErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'SyncError'
  }
}

/** Host graph read mid-mutation. Retry after the host signals a stable state. */
export class SnapshotInconsistent extends SyncError {
  constructor(
    message: string,
    readonly blockType?: string,
    readonly blockName?: string,
  ) {
    super('SNAPSHOT_INCONSISTENT', message)
    this.name = 'SnapshotInconsistent'
  }
}

/** A host value that cannot be represented on the wire. Fatal for that field only. */
export class EncodingError extends SyncError {
  constructor(
    readonly blockType: string,
    readonly blockName: string,
    readonly field: string,
    reason: string,
  ) {
    super('ENCODING_ERROR', `Cannot encode ${blockType}/${blockName}.${field}: ${reason}`)
    this.name = 'EncodingError'
  }
}

/** Deferred-record retry budget exhausted. The record is discarded. */
export class UnresolvableDependency extends SyncError {
  constructor(
    readonly record: ChangeRecord,
    readonly missing: BlockId,
    readonly attempts: number,
  ) {
    super(
      'UNRESOLVABLE_DEPENDENCY',
      `${record.operation} ${record.blockType}/${record.blockName} still waits on ` +
      `${missing.blockType}/${missing.name} after ${attempts} retries`,
    )
    this.name = 'UnresolvableDependency'
  }
}

/** Connection lost or unusable. Triggers the disconnected state and a reconnect. */
export class TransportError extends SyncError {
  constructor(message: string, cause?: unknown) {
    super('TRANSPORT_ERROR', message, cause === undefined ? undefined : { cause })
    this.name = 'TransportError'
  }
}

/** Create for a name that already exists. Applied as an update. */
export class DuplicateCreate extends SyncError {
  constructor(
    readonly blockType: string,
    readonly blockName: string,
  ) {
    super('DUPLICATE_CREATE', `Create for existing block ${blockType}/${blockName}; applying as update`)
    this.name = 'DuplicateCreate'
  }
}

/** The host threw while a record was applied. The record is dropped; the session continues. */
export class HostRejected extends SyncError {
  constructor(
    readonly record: ChangeRecord,
    cause: unknown,
  ) {
    super(
      'HOST_REJECTED',
      `Host rejected ${record.operation} ${record.blockType}/${record.blockName}: ` +
      (cause instanceof Error ? cause.message : String(cause)),
      { cause },
    )
    this.name = 'HostRejected'
  }
}
