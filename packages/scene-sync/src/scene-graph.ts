/**
 * SceneGraph: in-memory SceneHost.
 *
 * Stores blocks as type → name → fields. Used by headless clients, the
 * relay's consistency checks and the test suite. Local edits go through
 * `put`, `set`, `remove` and `rename`, which behave like user actions: they
 * do not repoint references on their own.
 */

import type { HostBlock, HostFields, HostValue, Notice, SceneHost } from './types'

type Fields = Record<string, HostValue>

export class SceneGraph implements SceneHost {
  private types = new Map<string, Map<string, Fields>>()
  readonly notices: Notice[] = []
  /** While true, captures fail with SnapshotInconsistent. */
  editing = false

  // ─── SceneHost ──────────────────────────────────────────────────────────

  enumerateBlocks(blockType: string): HostBlock[] {
    const blocks = this.types.get(blockType)
    if (!blocks) return []
    return [...blocks].map(([name, fields]) => ({ name, fields: { ...fields } }))
  }

  hasBlock(blockType: string, name: string): boolean {
    return this.types.get(blockType)?.has(name) ?? false
  }

  createBlock(blockType: string, name: string, fields: HostFields): void {
    if (this.hasBlock(blockType, name)) {
      throw new Error(`Block ${blockType}/${name} already exists`)
    }
    this.blocksOf(blockType).set(name, { ...fields })
  }

  updateBlock(blockType: string, name: string, field: string, value: HostValue): void {
    this.require(blockType, name)[field] = value
  }

  deleteBlock(blockType: string, name: string): void {
    this.require(blockType, name)
    this.blocksOf(blockType).delete(name)
  }

  renameBlock(blockType: string, oldName: string, newName: string): void {
    const fields = this.require(blockType, oldName)
    if (this.hasBlock(blockType, newName)) {
      throw new Error(`Block ${blockType}/${newName} already exists`)
    }
    const blocks = this.blocksOf(blockType)
    blocks.delete(oldName)
    blocks.set(newName, fields)
  }

  isEditing(): boolean {
    return this.editing
  }

  notify(notice: Notice): void {
    this.notices.push(notice)
  }

  // ─── Local edits ────────────────────────────────────────────────────────

  /** Create or replace a block. */
  put(blockType: string, name: string, fields: HostFields): void {
    this.blocksOf(blockType).set(name, { ...fields })
  }

  set(blockType: string, name: string, field: string, value: HostValue): void {
    this.updateBlock(blockType, name, field, value)
  }

  remove(blockType: string, name: string): void {
    this.deleteBlock(blockType, name)
  }

  rename(blockType: string, oldName: string, newName: string): void {
    this.renameBlock(blockType, oldName, newName)
  }

  // ─── Read API ───────────────────────────────────────────────────────────

  get(blockType: string, name: string): HostFields | undefined {
    const fields = this.types.get(blockType)?.get(name)
    return fields ? { ...fields } : undefined
  }

  /** Sorted block names of one type. */
  names(blockType: string): string[] {
    return [...(this.types.get(blockType)?.keys() ?? [])].sort()
  }

  // ─── Internal ───────────────────────────────────────────────────────────

  private blocksOf(blockType: string): Map<string, Fields> {
    let blocks = this.types.get(blockType)
    if (!blocks) {
      blocks = new Map()
      this.types.set(blockType, blocks)
    }
    return blocks
  }

  private require(blockType: string, name: string): Fields {
    const fields = this.types.get(blockType)?.get(name)
    if (!fields) throw new Error(`No block ${blockType}/${name}`)
    return fields
  }
}
