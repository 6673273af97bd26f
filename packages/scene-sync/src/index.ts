// Host types
export type {
  HostRef, HostValue, HostFields, HostBlock, Notice, NoticeLevel, SceneHost,
} from './types'
export { hostRef } from './types'

// Errors
export {
  SyncError, SnapshotInconsistent, EncodingError, UnresolvableDependency,
  TransportError, DuplicateCreate, HostRejected, type SyncErrorCode,
} from './errors'

// Snapshots and diffing
export { toFieldValue, toHostValue, asHostRef } from './host-values'
export {
  Snapshot, captureSnapshot, blockSnapshot, bytesEqual,
  type BlockSnapshot, type CaptureOptions,
} from './snapshot'
export { diff, changedFields, dependencyOrder, referencedBlocks, compareBlocks } from './diff'

// Applying records
export { DependencyScheduler, type ApplyOutcome, type SchedulerOptions } from './scheduler'
export { RenameAliases } from './aliases'

// In-memory host
export { SceneGraph } from './scene-graph'

// Client
export {
  ClientSynchronizer,
  type SyncState, type StateListener, type SynchronizerOptions, type DrainResult,
} from './synchronizer'
export type { SyncTransport, TransportConnector, TransportHandlers } from './transport'
export { tcpConnector, writeFrame, type TcpConnectorOptions, type FrameSink } from './tcp-transport'
