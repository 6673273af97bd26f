/**
 * Snapshots: point-in-time images of the replicated part of the host graph.
 *
 * Each block carries its decoded fields, the canonical encoding of every
 * field, and a content digest over the sorted (field, bytes) pairs. The
 * digest ignores the block name, so a renamed block keeps its digest.
 */

import { createHash } from 'node:crypto'
import type { Logger } from '@scenesync/config'
import type { FieldMap, FieldValue } from '@scenesync/wire-protocol'
import { blockKey, encodeValue, sortedFieldNames } from '@scenesync/wire-protocol'
import type { SceneHost } from './types'
import { EncodingError, SnapshotInconsistent } from './errors'
import { toFieldValue } from './host-values'

export interface BlockSnapshot {
  readonly blockType: string
  readonly name: string
  readonly fields: FieldMap
  /** Canonical value bytes by field name. */
  readonly encoded: ReadonlyMap<string, Uint8Array>
  /** Hex SHA-256 over sorted field names and value bytes. */
  readonly digest: string
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.byteLength !== b.byteLength) return false
  for (let i = 0; i < a.byteLength; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

/** Build a block snapshot from already-converted fields. */
export function blockSnapshot(blockType: string, name: string, fields: FieldMap): BlockSnapshot {
  const encoded = new Map<string, Uint8Array>()
  const hash = createHash('sha256')
  for (const field of sortedFieldNames(fields)) {
    const value = fields[field]
    if (value === undefined) continue
    const bytes = encodeValue(value)
    encoded.set(field, bytes)
    hash.update(field)
    hash.update('\u0000')
    hash.update(bytes)
  }
  return { blockType, name, fields: { ...fields }, encoded, digest: hash.digest('hex') }
}

// ─── Snapshot ───────────────────────────────────────────────────────────────

export class Snapshot {
  static readonly EMPTY = new Snapshot([])

  private readonly byKey = new Map<string, BlockSnapshot>()

  constructor(blocks: Iterable<BlockSnapshot>) {
    for (const block of blocks) {
      const key = blockKey(block.blockType, block.name)
      if (this.byKey.has(key)) {
        throw new SnapshotInconsistent(
          `Duplicate block ${block.blockType}/${block.name}`, block.blockType, block.name,
        )
      }
      this.byKey.set(key, block)
    }
  }

  get size(): number {
    return this.byKey.size
  }

  get(blockType: string, name: string): BlockSnapshot | undefined {
    return this.byKey.get(blockKey(blockType, name))
  }

  has(blockType: string, name: string): boolean {
    return this.byKey.has(blockKey(blockType, name))
  }

  blocks(): IterableIterator<BlockSnapshot> {
    return this.byKey.values()
  }

  /** Same blocks with byte-identical fields. */
  equals(other: Snapshot): boolean {
    if (this.size !== other.size) return false
    for (const [key, block] of this.byKey) {
      const theirs = other.byKey.get(key)
      if (!theirs || theirs.digest !== block.digest || theirs.encoded.size !== block.encoded.size) {
        return false
      }
      for (const [field, bytes] of block.encoded) {
        const theirBytes = theirs.encoded.get(field)
        if (!theirBytes || !bytesEqual(bytes, theirBytes)) return false
      }
    }
    return true
  }
}

// ─── Capture ────────────────────────────────────────────────────────────────

export interface CaptureOptions {
  logger?: Logger
}

/**
 * Read every block of the allow-listed types from the host.
 *
 * Unencodable fields are skipped and logged. Throws SnapshotInconsistent if
 * the host is mid-edit or a block is half-built.
 */
export function captureSnapshot(
  host: SceneHost,
  blockTypes: readonly string[],
  options: CaptureOptions = {},
): Snapshot {
  if (host.isEditing?.()) {
    throw new SnapshotInconsistent('Host is in the middle of an edit')
  }

  const blocks: BlockSnapshot[] = []
  for (const blockType of blockTypes) {
    for (const hostBlock of host.enumerateBlocks(blockType)) {
      if (hostBlock.partial) {
        throw new SnapshotInconsistent(
          `Block ${blockType}/${hostBlock.name} is partially constructed`, blockType, hostBlock.name,
        )
      }
      const fields: Record<string, FieldValue> = {}
      for (const [field, raw] of Object.entries(hostBlock.fields)) {
        const value = toFieldValue(raw)
        if (typeof value === 'string') {
          const error = new EncodingError(blockType, hostBlock.name, field, value)
          options.logger?.warn('Skipping unencodable field', { error, blockType, block: hostBlock.name, field })
          continue
        }
        fields[field] = value
      }
      blocks.push(blockSnapshot(blockType, hostBlock.name, fields))
    }
  }
  return new Snapshot(blocks)
}
