/**
 * Host collaborator types.
 *
 * The editor is an external data source/sink: it enumerates typed
 * data-blocks, accepts mutations, and is told about connection status and
 * unresolved dependencies through `notify`. Local edit notifications flow the
 * other way, through ClientSynchronizer.notifyLocalEdit().
 */

// ─── Host values ────────────────────────────────────────────────────────────

/** Reference as the host sees it: target type plus target name. */
export interface HostRef {
  $ref: string
  name: string | null
}

/**
 * Values the host hands to / receives from the engine.
 * Integral numbers travel as ints, other numbers as float64.
 */
export type HostValue =
  | null
  | boolean
  | number
  | string
  | Uint8Array
  | readonly number[]
  | HostRef

export type HostFields = Readonly<Record<string, HostValue>>

export interface HostBlock {
  name: string
  /** Raw field values; anything outside HostValue is reported as an EncodingError. */
  fields: Readonly<Record<string, unknown>>
  /** Set by the host while the block is half-built. */
  partial?: boolean
}

// ─── Notifications ──────────────────────────────────────────────────────────

export type NoticeLevel = 'info' | 'warn' | 'error'

export interface Notice {
  level: NoticeLevel
  code: string
  message: string
}

// ─── Host interface ─────────────────────────────────────────────────────────

export interface SceneHost {
  enumerateBlocks(blockType: string): Iterable<HostBlock>
  hasBlock(blockType: string, name: string): boolean
  createBlock(blockType: string, name: string, fields: HostFields): void
  updateBlock(blockType: string, name: string, field: string, value: HostValue): void
  deleteBlock(blockType: string, name: string): void
  /** Renames keep block identity; references held by the host follow the block. */
  renameBlock(blockType: string, oldName: string, newName: string): void
  /** True while the host is in the middle of an edit batch. */
  isEditing?(): boolean
  notify?(notice: Notice): void
}

export function hostRef(blockType: string, name: string | null): HostRef {
  return { $ref: blockType, name }
}
