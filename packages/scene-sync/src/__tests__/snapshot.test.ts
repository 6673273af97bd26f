import { describe, it, expect } from 'vitest'
import { createLogger, memorySink } from '@scenesync/config'

import { toFieldValue, toHostValue, asHostRef } from '../host-values'
import { Snapshot, blockSnapshot, captureSnapshot } from '../snapshot'
import { SnapshotInconsistent } from '../errors'
import { SceneGraph } from '../scene-graph'
import type { HostBlock, SceneHost } from '../types'
import { hostRef } from '../types'

// ─── Helpers ────────────────────────────────────────────────────────────────

/** Read-only host serving fixed raw blocks. */
function staticHost(blocks: Record<string, HostBlock[]>, editing = false): SceneHost {
  return {
    enumerateBlocks: (type) => blocks[type] ?? [],
    hasBlock: (type, name) => (blocks[type] ?? []).some((b) => b.name === name),
    createBlock: () => { throw new Error('read-only') },
    updateBlock: () => { throw new Error('read-only') },
    deleteBlock: () => { throw new Error('read-only') },
    renameBlock: () => { throw new Error('read-only') },
    isEditing: () => editing,
  }
}

// ─── Value conversion ───────────────────────────────────────────────────────

describe('toFieldValue', () => {
  it('maps integral numbers to int and others to float', () => {
    expect(toFieldValue(3)).toEqual({ type: 'int', value: 3 })
    expect(toFieldValue(1.5)).toEqual({ type: 'float', value: 1.5 })
    expect(toFieldValue(-0)).toEqual({ type: 'float', value: -0 })
    expect(toFieldValue(2 ** 60)).toEqual({ type: 'float', value: 2 ** 60 })
  })

  it('maps null and undefined to null', () => {
    expect(toFieldValue(null)).toEqual({ type: 'null' })
    expect(toFieldValue(undefined)).toEqual({ type: 'null' })
  })

  it('maps number arrays and float arrays to floats', () => {
    expect(toFieldValue([1, 2.5])).toEqual({ type: 'floats', value: [1, 2.5] })
    expect(toFieldValue(new Float32Array([0.5, 0.25]))).toEqual({ type: 'floats', value: [0.5, 0.25] })
  })

  it('copies blobs', () => {
    const raw = new Uint8Array([1, 2])
    const value = toFieldValue(raw)
    raw[0] = 9
    expect(value).toEqual({ type: 'blob', value: new Uint8Array([1, 2]) })
  })

  it('maps references', () => {
    expect(toFieldValue(hostRef('Mesh', 'CubeMesh')))
      .toEqual({ type: 'ref', blockType: 'Mesh', name: 'CubeMesh' })
    expect(toFieldValue(hostRef('Mesh', null)))
      .toEqual({ type: 'ref', blockType: 'Mesh', name: null })
  })

  it('reports values with no wire form', () => {
    expect(toFieldValue([1, 'a'])).toBe('element 1 is not a finite number')
    expect(toFieldValue([1, Number.NaN])).toBe('element 1 is not a finite number')
    expect(toFieldValue(new Map())).toBe('unsupported value of type Map')
    expect(toFieldValue({ $ref: 'Mesh', name: 'x', extra: 1 })).toBe('unsupported value of type object')
  })
})

describe('toHostValue', () => {
  it('inverts toFieldValue for supported values', () => {
    for (const raw of [null, true, 7, 0.5, 'text', [1, 2], hostRef('Object', 'Cube')]) {
      const value = toFieldValue(raw)
      if (typeof value === 'string') throw new Error(value)
      expect(toHostValue(value)).toEqual(raw)
    }
  })

  it('parses references strictly', () => {
    expect(asHostRef({ $ref: 'Mesh', name: null })).toEqual({ $ref: 'Mesh', name: null })
    expect(asHostRef({ $ref: '', name: 'x' })).toBeNull()
    expect(asHostRef([1, 2])).toBeNull()
  })
})

// ─── Snapshots ──────────────────────────────────────────────────────────────

describe('blockSnapshot', () => {
  it('digest ignores the block name', () => {
    const fields = { size: { type: 'int', value: 2 } } as const
    expect(blockSnapshot('Mesh', 'A', fields).digest).toBe(blockSnapshot('Mesh', 'B', fields).digest)
  })

  it('digest changes with any field byte', () => {
    const a = blockSnapshot('Mesh', 'A', { size: { type: 'int', value: 2 } })
    const b = blockSnapshot('Mesh', 'A', { size: { type: 'float', value: 2 } })
    expect(a.digest).not.toBe(b.digest)
  })
})

describe('Snapshot', () => {
  it('rejects duplicate blocks', () => {
    const block = blockSnapshot('Mesh', 'A', {})
    expect(() => new Snapshot([block, block])).toThrow(SnapshotInconsistent)
  })

  it('compares by content', () => {
    const a = new Snapshot([blockSnapshot('Mesh', 'A', { size: { type: 'int', value: 1 } })])
    const b = new Snapshot([blockSnapshot('Mesh', 'A', { size: { type: 'int', value: 1 } })])
    const c = new Snapshot([blockSnapshot('Mesh', 'A', { size: { type: 'int', value: 2 } })])
    expect(a.equals(b)).toBe(true)
    expect(a.equals(c)).toBe(false)
    expect(a.equals(Snapshot.EMPTY)).toBe(false)
  })
})

describe('captureSnapshot', () => {
  it('captures only allow-listed types', () => {
    const graph = new SceneGraph()
    graph.put('Mesh', 'CubeMesh', { size: 1 })
    graph.put('Image', 'Texture', { size: 2 })
    const snapshot = captureSnapshot(graph, ['Mesh'])
    expect(snapshot.size).toBe(1)
    expect(snapshot.get('Mesh', 'CubeMesh')?.fields).toEqual({ size: { type: 'int', value: 1 } })
  })

  it('skips unencodable fields and logs them', () => {
    const { sink, entries } = memorySink()
    const host = staticHost({
      Mesh: [{ name: 'CubeMesh', fields: { size: 1, cache: new Map() } }],
    })
    const snapshot = captureSnapshot(host, ['Mesh'], { logger: createLogger('test', { level: 'debug', sink }) })
    expect(Object.keys(snapshot.get('Mesh', 'CubeMesh')?.fields ?? {})).toEqual(['size'])
    expect(entries).toHaveLength(1)
    expect(entries[0]).toMatchObject({ level: 'warn', blockType: 'Mesh', block: 'CubeMesh', field: 'cache' })
  })

  it('fails while the host is editing', () => {
    expect(() => captureSnapshot(staticHost({}, true), ['Mesh'])).toThrow(SnapshotInconsistent)
  })

  it('fails on a partially built block', () => {
    const host = staticHost({ Mesh: [{ name: 'Half', fields: {}, partial: true }] })
    expect(() => captureSnapshot(host, ['Mesh'])).toThrow('Block Mesh/Half is partially constructed')
  })
})
