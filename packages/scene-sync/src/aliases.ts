/**
 * Rename aliases: old name → new name, with the sequence of the rename.
 *
 * A record stamped after a rename but addressed to the old name (because its
 * author had not seen the rename yet) is redirected to the new name. Only
 * renames sequenced before the record are followed, and only when the name
 * it addresses no longer exists.
 */

import { blockKey } from '@scenesync/wire-protocol'

interface Alias {
  name: string
  sequence: number
}

export class RenameAliases {
  private aliases = new Map<string, Alias>()

  get size(): number {
    return this.aliases.size
  }

  record(blockType: string, oldName: string, newName: string, sequence: number): void {
    this.aliases.set(blockKey(blockType, oldName), { name: newName, sequence })
    // The new name is a live block again; stop redirecting it.
    this.aliases.delete(blockKey(blockType, newName))
  }

  /** A block was created under this name. */
  invalidate(blockType: string, name: string): void {
    this.aliases.delete(blockKey(blockType, name))
  }

  /** Follow renames stamped before `sequence`, starting at `name`. */
  resolve(blockType: string, name: string, sequence: number): string {
    let current = name
    const seen = new Set<string>()
    for (;;) {
      const alias = this.aliases.get(blockKey(blockType, current))
      if (!alias || alias.sequence >= sequence || seen.has(current)) return current
      seen.add(current)
      current = alias.name
    }
  }

  clear(): void {
    this.aliases.clear()
  }
}
