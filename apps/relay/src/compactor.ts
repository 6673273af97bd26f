/**
 * CompactedScene: the relay's folded view of the change log.
 *
 * Folding rules:
 *   create → new entry (or field merge when the name exists)
 *   update → field merge
 *   delete → removal, references to the block cleared
 *   rename → re-key, references repointed
 *
 * A record addressed to a name that an earlier rename moved away follows the
 * rename, the same way clients redirect it. Field values stay opaque apart
 * from reference rewriting.
 */

import type { CreateRecord, FieldValue, StampedRecord } from '@scenesync/wire-protocol'
import { blockKey } from '@scenesync/wire-protocol'
import { RenameAliases } from '@scenesync/scene-sync'

interface Entry {
  blockType: string
  name: string
  fields: Record<string, FieldValue>
  /** Sequence of the create; snapshots list entries in this order. */
  createdAt: number
  createdBy: string
}

export class CompactedScene {
  private entries = new Map<string, Entry>()
  private readonly aliases = new RenameAliases()

  get size(): number {
    return this.entries.size
  }

  has(blockType: string, name: string): boolean {
    return this.entries.has(blockKey(blockType, name))
  }

  fields(blockType: string, name: string): Readonly<Record<string, FieldValue>> | undefined {
    return this.entries.get(blockKey(blockType, name))?.fields
  }

  apply(record: StampedRecord): void {
    const name = this.resolve(record)
    const key = blockKey(record.blockType, name)
    const entry = this.entries.get(key)

    switch (record.operation) {
      case 'create':
        if (entry) {
          Object.assign(entry.fields, record.payload)
        } else {
          this.entries.set(key, {
            blockType: record.blockType,
            name,
            fields: { ...record.payload },
            createdAt: record.sequence,
            createdBy: record.originClientId,
          })
          this.aliases.invalidate(record.blockType, name)
        }
        break
      case 'update':
        if (entry) Object.assign(entry.fields, record.payload)
        break
      case 'delete':
        if (!entry) break
        this.entries.delete(key)
        this.rewriteReferences(record.blockType, name, null)
        break
      case 'rename': {
        const target = blockKey(record.blockType, record.newName)
        if (!entry || this.entries.has(target)) break
        this.entries.delete(key)
        entry.name = record.newName
        this.entries.set(target, entry)
        this.rewriteReferences(record.blockType, name, record.newName)
        this.aliases.record(record.blockType, name, record.newName, record.sequence)
        break
      }
    }
  }

  /** Current state as create records, oldest block first. */
  toRecords(): CreateRecord[] {
    return [...this.entries.values()]
      .sort((a, b) => a.createdAt - b.createdAt)
      .map((entry): CreateRecord => ({
        operation: 'create',
        sequence: entry.createdAt,
        originClientId: entry.createdBy,
        blockType: entry.blockType,
        blockName: entry.name,
        payload: { ...entry.fields },
      }))
  }

  private resolve(record: StampedRecord): string {
    if (record.operation === 'create' || this.has(record.blockType, record.blockName)) {
      return record.blockName
    }
    return this.aliases.resolve(record.blockType, record.blockName, record.sequence)
  }

  private rewriteReferences(blockType: string, name: string, newName: string | null): void {
    for (const entry of this.entries.values()) {
      for (const [field, value] of Object.entries(entry.fields)) {
        if (value.type === 'ref' && value.blockType === blockType && value.name === name) {
          entry.fields[field] = { type: 'ref', blockType, name: newName }
        }
      }
    }
  }
}
