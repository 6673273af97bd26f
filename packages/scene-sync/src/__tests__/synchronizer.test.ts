import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { createLogger, memorySink } from '@scenesync/config'
import type { ChangeRecord, FieldMap, Message } from '@scenesync/wire-protocol'
import { decodeMessage, encodeMessage } from '@scenesync/wire-protocol'

import { ClientSynchronizer, type SyncState } from '../synchronizer'
import { SceneGraph } from '../scene-graph'
import type { TransportConnector, TransportHandlers } from '../transport'
import { hostRef, type HostBlock, type HostFields } from '../types'

// ─── Scripted relay ─────────────────────────────────────────────────────────

/** Records what the client sends and lets the test push frames back. */
class ScriptedRelay {
  sent: Message[] = []
  connects = 0
  closes = 0
  refuse = false
  private handlers: TransportHandlers | null = null

  readonly connector: TransportConnector = async (handlers) => {
    this.connects++
    if (this.refuse) throw new Error('connection refused')
    this.handlers = handlers
    return {
      send: (frame) => { this.sent.push(decodeMessage(frame)) },
      close: () => { this.closes++ },
    }
  }

  deliver(message: Message): void {
    this.handlers?.onFrame(encodeMessage(message))
  }

  deliverRaw(frame: Uint8Array): void {
    this.handlers?.onFrame(frame)
  }

  drop(error?: Error): void {
    this.handlers?.onClose(error)
  }

  batches(): ChangeRecord[][] {
    return this.sent.flatMap((m) => (m.kind === 'change-batch' ? [m.records] : []))
  }

  last(): Message | undefined {
    return this.sent[this.sent.length - 1]
  }
}

/** Refuses to create blocks named "Bad". */
class PickyGraph extends SceneGraph {
  createBlock(blockType: string, name: string, fields: HostFields): void {
    if (name === 'Bad') throw new Error('host rejected block')
    super.createBlock(blockType, name, fields)
  }
}

/** Throws on every read while locked. */
class LockedGraph extends SceneGraph {
  locked = false

  enumerateBlocks(blockType: string): HostBlock[] {
    if (this.locked) throw new Error('scene locked')
    return super.enumerateBlocks(blockType)
  }
}

function create(sequence: number, blockType: string, blockName: string, payload: FieldMap = {}): ChangeRecord {
  return { operation: 'create', sequence, originClientId: 'bob', blockType, blockName, payload }
}

function rename(sequence: number, blockType: string, blockName: string, newName: string): ChangeRecord {
  return { operation: 'rename', sequence, originClientId: 'bob', blockType, blockName, newName }
}

function update(sequence: number, blockType: string, blockName: string, payload: FieldMap): ChangeRecord {
  return { operation: 'update', sequence, originClientId: 'bob', blockType, blockName, payload }
}

const size = (value: number): FieldMap => ({ size: { type: 'int', value } })

/** Let connector promises settle after a fake-timer tick. */
async function settle(): Promise<void> {
  for (let i = 0; i < 5; i++) await Promise.resolve()
}

let relay: ScriptedRelay
let graph: SceneGraph
let client: ClientSynchronizer

function makeClient(clientId = 'alice'): ClientSynchronizer {
  return new ClientSynchronizer({
    clientId,
    host: graph,
    connect: relay.connector,
    config: {
      replicatedTypes: ['Mesh', 'Object'],
      backoff: { initialDelayMs: 100, maxDelayMs: 1000, multiplier: 2 },
      logLevel: 'error',
    },
    logger: createLogger('test', { level: 'error', sink: memorySink().sink }),
  })
}

/** Start, receive a snapshot and drain until live. */
async function goLive(lastSequence = 5, records: ChangeRecord[] = []): Promise<void> {
  await client.start()
  relay.deliver({ kind: 'full-snapshot', lastSequence, records })
  client.drain()
}

beforeEach(() => {
  relay = new ScriptedRelay()
  graph = new SceneGraph()
  client = makeClient()
})

afterEach(() => {
  client.stop()
  vi.useRealTimers()
})

// ─── Handshake ──────────────────────────────────────────────────────────────

describe('handshake', () => {
  it('says hello and waits for a snapshot', async () => {
    const states: SyncState[] = []
    client.onStateChange((state) => states.push(state))
    await client.start()
    expect(relay.sent).toEqual([{ kind: 'hello', clientId: 'alice', resumeFrom: null }])
    expect(states).toEqual(['connecting', 'syncing'])
    expect(client.state).toBe('syncing')
  })

  it('applies the full snapshot in dependency order and goes live', async () => {
    await goLive(5, [
      create(4, 'Object', 'Cube', { data: { type: 'ref', blockType: 'Mesh', name: 'CubeMesh' } }),
      create(3, 'Mesh', 'CubeMesh', size(8)),
    ])
    expect(client.state).toBe('live')
    expect(graph.get('Object', 'Cube')).toEqual({ data: hostRef('Mesh', 'CubeMesh') })
    expect(relay.last()).toEqual({ kind: 'ack', sequence: 5 })
    expect(client.lastSequence).toBe(5)
  })

  it('removes local blocks the relay does not have', async () => {
    graph.put('Mesh', 'Stale', {})
    await goLive(5, [create(3, 'Mesh', 'Kept')])
    expect(graph.names('Mesh')).toEqual(['Kept'])
  })

  it('seeds an empty relay with the local scene', async () => {
    graph.put('Mesh', 'CubeMesh', { size: 8 })
    await goLive(0, [])
    expect(relay.batches()).toEqual([[{
      operation: 'create',
      sequence: null,
      originClientId: 'alice',
      blockType: 'Mesh',
      blockName: 'CubeMesh',
      payload: size(8),
    }]])
    expect(client.pendingBatches).toBe(1)
  })
})

// ─── Local edits ────────────────────────────────────────────────────────────

describe('local edits', () => {
  beforeEach(async () => {
    await goLive(5, [create(3, 'Object', 'Cube', size(1))])
    relay.sent = []
  })

  it('sends only what changed since the last drain', () => {
    graph.set('Object', 'Cube', 'size', 2)
    client.notifyLocalEdit()
    expect(client.drain().sent).toBe(1)
    expect(relay.batches()).toEqual([[{
      operation: 'update',
      sequence: null,
      originClientId: 'alice',
      blockType: 'Object',
      blockName: 'Cube',
      payload: size(2),
    }]])

    client.notifyLocalEdit()
    expect(client.drain().sent).toBe(0)
    expect(relay.batches()).toHaveLength(1)
  })

  it('waits while the host is editing', () => {
    graph.set('Object', 'Cube', 'size', 2)
    client.notifyLocalEdit()
    graph.editing = true
    expect(client.drain()).toEqual({ sent: 0, applied: 0, deferred: 0, skipped: 0, failed: 0 })
    graph.editing = false
    expect(client.drain().sent).toBe(1)
  })

  it('does not echo applied remote records back', () => {
    relay.deliver({ kind: 'change-batch', records: [update(6, 'Object', 'Cube', size(9))] })
    expect(client.drain().applied).toBe(1)
    client.notifyLocalEdit()
    client.drain()
    expect(relay.batches()).toEqual([])
    expect(relay.last()).toEqual({ kind: 'ack', sequence: 6 })
  })
})

// ─── Inbound records ────────────────────────────────────────────────────────

describe('inbound records', () => {
  beforeEach(async () => {
    await goLive(5, [create(3, 'Object', 'Cube', size(1))])
    relay.sent = []
  })

  it('ignores records it has already seen', () => {
    const batch: Message = { kind: 'change-batch', records: [update(6, 'Object', 'Cube', size(2))] }
    relay.deliver(batch)
    relay.deliver(batch)
    expect(client.drain()).toMatchObject({ applied: 1, skipped: 1 })
    expect(graph.get('Object', 'Cube')).toEqual({ size: 2 })
  })

  it('ignores its own records', () => {
    relay.deliver({
      kind: 'change-batch',
      records: [{ ...update(6, 'Object', 'Cube', size(2)), originClientId: 'alice' }],
    })
    expect(client.drain()).toMatchObject({ applied: 0, skipped: 1 })
  })

  it('keeps a pending local edit over an earlier remote one', () => {
    graph.set('Object', 'Cube', 'size', 5)
    client.notifyLocalEdit()
    client.drain()

    relay.deliver({ kind: 'change-batch', records: [update(6, 'Object', 'Cube', size(9))] })
    relay.deliver({ kind: 'ack', sequence: 7 })
    client.drain()
    expect(graph.get('Object', 'Cube')).toEqual({ size: 5 })
    expect(client.pendingBatches).toBe(0)

    relay.deliver({ kind: 'change-batch', records: [update(8, 'Object', 'Cube', size(11))] })
    client.drain()
    expect(graph.get('Object', 'Cube')).toEqual({ size: 11 })
  })

  it('follows a later remote rename of a block it renamed first', () => {
    graph.rename('Object', 'Cube', 'CubeA')
    client.notifyLocalEdit()
    client.drain()
    relay.deliver({ kind: 'ack', sequence: 6 })
    relay.deliver({
      kind: 'change-batch',
      records: [rename(7, 'Object', 'Cube', 'CubeB')],
    })
    client.drain()
    expect(graph.names('Object')).toEqual(['CubeB'])
  })

  it('keeps its own rename over an earlier remote one', () => {
    graph.rename('Object', 'Cube', 'CubeB')
    client.notifyLocalEdit()
    client.drain()
    relay.deliver({
      kind: 'change-batch',
      records: [
        rename(6, 'Object', 'Cube', 'CubeA'),
        update(7, 'Object', 'CubeA', size(3)),
      ],
    })
    relay.deliver({ kind: 'ack', sequence: 8 })
    client.drain()
    expect(graph.names('Object')).toEqual(['CubeB'])
    expect(graph.get('Object', 'CubeB')).toEqual({ size: 3 })
  })
})

// ─── Connection loss ────────────────────────────────────────────────────────

describe('connection loss', () => {
  it('reconnects with backoff and resyncs', async () => {
    vi.useFakeTimers()
    relay.refuse = true
    await client.start()
    expect(client.state).toBe('disconnected')

    relay.refuse = false
    await vi.advanceTimersByTimeAsync(99)
    expect(relay.connects).toBe(1)
    await vi.advanceTimersByTimeAsync(1)
    await settle()
    expect(relay.connects).toBe(2)
    expect(client.state).toBe('syncing')
  })

  it('drops pending work when the transport fails', async () => {
    vi.useFakeTimers()
    await goLive(5, [create(3, 'Object', 'Cube', size(1))])
    graph.set('Object', 'Cube', 'size', 2)
    client.notifyLocalEdit()
    client.drain()
    expect(client.pendingBatches).toBe(1)

    relay.drop(new Error('connection reset'))
    expect(client.state).toBe('disconnected')
    expect(client.pendingBatches).toBe(0)
    expect(graph.notices.at(-1)).toEqual({ level: 'warn', code: 'SYNC_STATE', message: 'Sync disconnected' })

    await vi.advanceTimersByTimeAsync(100)
    await settle()
    expect(client.state).toBe('syncing')
  })

  it('disconnects on a malformed frame', async () => {
    await client.start()
    relay.deliverRaw(new Uint8Array([9, 0, 0, 0, 0xee, 0, 0, 0, 0]))
    expect(client.state).toBe('disconnected')
  })

  it('says goodbye and stays down after stop', async () => {
    vi.useFakeTimers()
    await goLive()
    client.stop()
    expect(relay.last()).toEqual({ kind: 'disconnect', reason: 'client shutdown' })
    await vi.advanceTimersByTimeAsync(10_000)
    expect(relay.connects).toBe(1)
    expect(client.state).toBe('disconnected')
  })
})

// ─── Host failures ──────────────────────────────────────────────────────────

describe('host failures', () => {
  it('keeps the session in step when the host rejects one record', async () => {
    graph = new PickyGraph()
    client = makeClient()
    await goLive(5)
    graph.put('Object', 'Mine', {})
    client.notifyLocalEdit()
    client.drain()
    expect(client.pendingBatches).toBe(1)

    relay.deliver({ kind: 'change-batch', records: [create(6, 'Object', 'Bad'), create(7, 'Object', 'Good')] })
    relay.deliver({ kind: 'ack', sequence: 8 })
    const result = client.drain()

    expect(result).toEqual({ sent: 0, applied: 1, deferred: 0, skipped: 0, failed: 1 })
    expect(client.state).toBe('live')
    expect(graph.hasBlock('Object', 'Good')).toBe(true)
    expect(client.pendingBatches).toBe(0)
    expect(client.lastSequence).toBe(8)
    expect(graph.notices.filter((n) => n.code === 'HOST_REJECTED')).toEqual([
      { level: 'error', code: 'HOST_REJECTED', message: 'Host rejected create Object/Bad: host rejected block' },
    ])
  })

  it('resyncs when an inbound message cannot be processed', async () => {
    const locked = new LockedGraph()
    graph = locked
    client = makeClient()
    await client.start()
    locked.locked = true
    relay.deliver({ kind: 'full-snapshot', lastSequence: 5, records: [] })

    expect(() => client.drain()).not.toThrow()
    expect(client.state).toBe('disconnected')
    expect(relay.closes).toBe(1)
  })
})
