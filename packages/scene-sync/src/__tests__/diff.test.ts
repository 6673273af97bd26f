import { describe, it, expect } from 'vitest'
import fc from 'fast-check'
import { createLogger, memorySink } from '@scenesync/config'
import type { ChangeRecord, FieldMap, FieldValue } from '@scenesync/wire-protocol'

import { diff } from '../diff'
import { Snapshot, blockSnapshot, captureSnapshot } from '../snapshot'
import { DependencyScheduler } from '../scheduler'
import { SceneGraph } from '../scene-graph'
import { toHostValue } from '../host-values'

// ─── Helpers ────────────────────────────────────────────────────────────────

const TYPES = ['Mesh', 'Object'] as const

function int(value: number): FieldValue {
  return { type: 'int', value }
}

function ref(blockType: string, name: string | null): FieldValue {
  return { type: 'ref', blockType, name }
}

function snap(...blocks: Array<[string, string, FieldMap]>): Snapshot {
  return new Snapshot(blocks.map(([type, name, fields]) => blockSnapshot(type, name, fields)))
}

function summary(records: ChangeRecord[]): string[] {
  return records.map((r) =>
    r.operation === 'rename'
      ? `rename ${r.blockType}/${r.blockName}->${r.newName}`
      : `${r.operation} ${r.blockType}/${r.blockName}`)
}

function load(snapshot: Snapshot): SceneGraph {
  const graph = new SceneGraph()
  for (const block of snapshot.blocks()) {
    const fields: Record<string, ReturnType<typeof toHostValue>> = {}
    for (const [field, value] of Object.entries(block.fields)) fields[field] = toHostValue(value)
    graph.put(block.blockType, block.name, fields)
  }
  return graph
}

const quiet = createLogger('test', { level: 'error', sink: memorySink().sink })

// ─── Record generation ──────────────────────────────────────────────────────

describe('diff', () => {
  it('is empty for identical snapshots', () => {
    const a = snap(['Mesh', 'M', { size: int(1) }])
    const b = snap(['Mesh', 'M', { size: int(1) }])
    expect(diff(a, b, 'alice')).toEqual([])
  })

  it('creates referenced blocks before referencing ones', () => {
    const next = snap(
      ['Object', 'Cube', { data: ref('Mesh', 'CubeMesh') }],
      ['Mesh', 'CubeMesh', { size: int(8) }],
    )
    expect(summary(diff(Snapshot.EMPTY, next, 'alice'))).toEqual([
      'create Mesh/CubeMesh',
      'create Object/Cube',
    ])
  })

  it('orders independent creates by name then type', () => {
    const next = snap(['Object', 'B', {}], ['Mesh', 'B', {}], ['Object', 'A', {}])
    expect(summary(diff(Snapshot.EMPTY, next, 'alice'))).toEqual([
      'create Object/A',
      'create Mesh/B',
      'create Object/B',
    ])
  })

  it('emits cycles in lexicographic order', () => {
    const next = snap(
      ['Object', 'B', { parent: ref('Object', 'A') }],
      ['Object', 'A', { parent: ref('Object', 'B') }],
    )
    expect(summary(diff(Snapshot.EMPTY, next, 'alice'))).toEqual(['create Object/A', 'create Object/B'])
  })

  it('sends only changed fields and nulls removed ones', () => {
    const prev = snap(['Object', 'Cube', { size: int(1), location: { type: 'floats', value: [0, 0, 0] } }])
    const next = snap(['Object', 'Cube', { size: int(2) }])
    const records = diff(prev, next, 'alice')
    expect(records).toEqual([{
      operation: 'update',
      sequence: null,
      originClientId: 'alice',
      blockType: 'Object',
      blockName: 'Cube',
      payload: { size: int(2), location: { type: 'null' } },
    }])
  })

  it('detects a rename by equal content', () => {
    const prev = snap(['Object', 'Cube', { size: int(1) }])
    const next = snap(['Object', 'Box', { size: int(1) }])
    expect(diff(prev, next, 'alice')).toEqual([{
      operation: 'rename',
      sequence: null,
      originClientId: 'alice',
      blockType: 'Object',
      blockName: 'Cube',
      newName: 'Box',
    }])
  })

  it('does not pair blocks of different types', () => {
    const prev = snap(['Object', 'Cube', { size: int(1) }])
    const next = snap(['Mesh', 'Box', { size: int(1) }])
    expect(summary(diff(prev, next, 'alice'))).toEqual(['create Mesh/Box', 'delete Object/Cube'])
  })

  it('deletes referencing blocks before referenced ones', () => {
    const prev = snap(
      ['Mesh', 'CubeMesh', { size: int(8) }],
      ['Object', 'Cube', { data: ref('Mesh', 'CubeMesh') }],
    )
    expect(summary(diff(prev, Snapshot.EMPTY, 'alice'))).toEqual([
      'delete Object/Cube',
      'delete Mesh/CubeMesh',
    ])
  })

  it('orders renames, creates, updates, deletes', () => {
    const prev = snap(
      ['Object', 'Old', { size: int(1) }],
      ['Object', 'Kept', { size: int(1), tag: { type: 'string', value: 'a' } }],
      ['Mesh', 'Gone', { size: int(5) }],
    )
    const next = snap(
      ['Object', 'New', { size: int(1) }],
      ['Object', 'Kept', { size: int(1), tag: { type: 'string', value: 'b' } }],
      ['Mesh', 'Fresh', { size: int(6) }],
    )
    expect(summary(diff(prev, next, 'alice'))).toEqual([
      'rename Object/Old->New',
      'create Mesh/Fresh',
      'update Object/Kept',
      'delete Mesh/Gone',
    ])
  })
})

// ─── Round trip through the scheduler ───────────────────────────────────────

interface BlockSpec {
  type: (typeof TYPES)[number]
  name: string
  size: number
  data: number
  parent: number
}

function build(specs: BlockSpec[]): Snapshot {
  const meshes = specs.filter((s) => s.type === 'Mesh').map((s) => s.name)
  const objects = specs.filter((s) => s.type === 'Object').map((s) => s.name)
  return new Snapshot(specs.map((s) => {
    if (s.type === 'Mesh') return blockSnapshot('Mesh', s.name, { size: int(s.size) })
    const mesh = s.data % 3 === 0 ? undefined : meshes[s.data % Math.max(meshes.length, 1)]
    const parent = s.parent % 3 === 0 ? undefined : objects[s.parent % objects.length]
    return blockSnapshot('Object', s.name, {
      size: int(s.size),
      data: ref('Mesh', mesh ?? null),
      parent: ref('Object', parent ?? null),
    })
  }))
}

const specArb = fc.record({
  type: fc.constantFrom(...TYPES),
  name: fc.constantFrom('A', 'B', 'C', 'D', 'E'),
  size: fc.integer({ min: 0, max: 2 }),
  data: fc.nat(8),
  parent: fc.nat(8),
})

const snapshotArb = fc
  .uniqueArray(specArb, { selector: (s) => `${s.type}/${s.name}`, maxLength: 8 })
  .map(build)

describe('diff round trip', () => {
  it('applying diff(a, b) to a yields b', () => {
    fc.assert(fc.property(snapshotArb, snapshotArb, (a, b) => {
      const graph = load(a)
      const scheduler = new DependencyScheduler(graph, { replicatedTypes: TYPES, retryLimit: 4, logger: quiet })
      const outcomes = scheduler.applyBatch(diff(a, b, 'alice'))
      expect(outcomes.filter((o) => o.status === 'failed')).toEqual([])
      expect(scheduler.deferredCount).toBe(0)
      expect(captureSnapshot(graph, TYPES).equals(b)).toBe(true)
    }))
  })

  it('is deterministic', () => {
    fc.assert(fc.property(snapshotArb, snapshotArb, (a, b) => {
      expect(diff(a, b, 'alice')).toEqual(diff(a, b, 'alice'))
    }))
  })
})
