/**
 * Snapshot differ: turn two snapshots into an ordered list of change records.
 *
 * Output order:
 *   1. renames  (a deleted and a created block of one type with equal digests)
 *   2. creates  (referenced blocks before referencing ones; ties by name, type)
 *   3. updates  (by name, type)
 *   4. deletes  (referencing blocks before referenced ones)
 *
 * Cycles among created blocks are broken lexicographically; the receiver's
 * scheduler resolves them with a placeholder pass.
 */

import type {
  BlockId, ChangeRecord, CreateRecord, DeleteRecord, FieldMap, FieldValue,
  RenameRecord, UpdateRecord,
} from '@scenesync/wire-protocol'
import { NULL_VALUE, blockKey, sortedFieldNames } from '@scenesync/wire-protocol'
import type { BlockSnapshot, Snapshot } from './snapshot'
import { bytesEqual } from './snapshot'

// ─── References ─────────────────────────────────────────────────────────────

/** Non-null reference targets of a field map, in field-name order. */
export function referencedBlocks(fields: FieldMap): BlockId[] {
  const refs: BlockId[] = []
  for (const field of sortedFieldNames(fields)) {
    const value = fields[field]
    if (value?.type === 'ref' && value.name !== null) {
      refs.push({ blockType: value.blockType, name: value.name })
    }
  }
  return refs
}

// ─── Ordering ───────────────────────────────────────────────────────────────

export function compareBlocks(a: BlockId, b: BlockId): number {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1
  if (a.blockType !== b.blockType) return a.blockType < b.blockType ? -1 : 1
  return 0
}

function idOf(block: BlockSnapshot): BlockId {
  return { blockType: block.blockType, name: block.name }
}

/**
 * Order blocks so that referenced blocks come first. Only references between
 * members of `blocks` constrain the order. When every remaining block waits
 * on another (a cycle), the lexicographically smallest goes next.
 */
export function dependencyOrder(blocks: readonly BlockSnapshot[]): BlockSnapshot[] {
  const remaining = [...blocks].sort((a, b) => compareBlocks(idOf(a), idOf(b)))
  const members = new Set(remaining.map((b) => blockKey(b.blockType, b.name)))
  const waiting = new Map<string, Set<string>>()

  for (const block of remaining) {
    const key = blockKey(block.blockType, block.name)
    const deps = new Set<string>()
    for (const ref of referencedBlocks(block.fields)) {
      const target = blockKey(ref.blockType, ref.name)
      if (target !== key && members.has(target)) deps.add(target)
    }
    waiting.set(key, deps)
  }

  const ordered: BlockSnapshot[] = []
  while (remaining.length > 0) {
    let index = remaining.findIndex((b) => waiting.get(blockKey(b.blockType, b.name))?.size === 0)
    if (index === -1) index = 0
    const [next] = remaining.splice(index, 1)
    if (!next) break
    ordered.push(next)
    const done = blockKey(next.blockType, next.name)
    for (const deps of waiting.values()) deps.delete(done)
  }
  return ordered
}

// ─── Field diff ─────────────────────────────────────────────────────────────

/** Fields whose bytes changed, plus nulls for removed fields. */
export function changedFields(before: BlockSnapshot, after: BlockSnapshot): FieldMap {
  const changed: Record<string, FieldValue> = {}
  for (const [field, bytes] of after.encoded) {
    const previous = before.encoded.get(field)
    const value = after.fields[field]
    if (value !== undefined && (!previous || !bytesEqual(previous, bytes))) {
      changed[field] = value
    }
  }
  for (const field of before.encoded.keys()) {
    if (!after.encoded.has(field)) changed[field] = NULL_VALUE
  }
  return changed
}

// ─── Diff ───────────────────────────────────────────────────────────────────

function pairRenames(
  deleted: BlockSnapshot[],
  created: BlockSnapshot[],
  originClientId: string,
): RenameRecord[] {
  const renames: RenameRecord[] = []
  deleted.sort((a, b) => compareBlocks(idOf(a), idOf(b)))
  created.sort((a, b) => compareBlocks(idOf(a), idOf(b)))

  for (let i = 0; i < deleted.length;) {
    const gone = deleted[i]
    if (!gone) break
    const match = created.findIndex((c) => c.blockType === gone.blockType && c.digest === gone.digest)
    const target = match === -1 ? undefined : created[match]
    if (!target) {
      i++
      continue
    }
    renames.push({
      operation: 'rename',
      sequence: null,
      originClientId,
      blockType: gone.blockType,
      blockName: gone.name,
      newName: target.name,
    })
    deleted.splice(i, 1)
    created.splice(match, 1)
  }
  return renames
}

/**
 * Records that take a replica from `previous` to `next`.
 * Deterministic: equal inputs give equal output.
 */
export function diff(previous: Snapshot, next: Snapshot, originClientId: string): ChangeRecord[] {
  const created: BlockSnapshot[] = []
  const deleted: BlockSnapshot[] = []
  const updates: UpdateRecord[] = []

  for (const block of next.blocks()) {
    const before = previous.get(block.blockType, block.name)
    if (!before) {
      created.push(block)
      continue
    }
    if (before.digest === block.digest) continue
    const payload = changedFields(before, block)
    if (Object.keys(payload).length === 0) continue
    updates.push({
      operation: 'update',
      sequence: null,
      originClientId,
      blockType: block.blockType,
      blockName: block.name,
      payload,
    })
  }
  for (const block of previous.blocks()) {
    if (!next.has(block.blockType, block.name)) deleted.push(block)
  }

  const renames = pairRenames(deleted, created, originClientId)

  const creates = dependencyOrder(created).map((block): CreateRecord => ({
    operation: 'create',
    sequence: null,
    originClientId,
    blockType: block.blockType,
    blockName: block.name,
    payload: block.fields,
  }))

  updates.sort((a, b) => compareBlocks(
    { blockType: a.blockType, name: a.blockName },
    { blockType: b.blockType, name: b.blockName },
  ))

  const deletes = dependencyOrder(deleted).reverse().map((block): DeleteRecord => ({
    operation: 'delete',
    sequence: null,
    originClientId,
    blockType: block.blockType,
    blockName: block.name,
  }))

  return [...renames, ...creates, ...updates, ...deletes]
}
