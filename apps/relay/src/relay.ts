/**
 * Relay: sequences change batches and fans them out to connected clients.
 *
 * Transport-agnostic: a transport hands each accepted connection to
 * connect() and forwards whole frames to the returned session. One failing
 * connection is dropped on its own; it never stalls delivery to the others.
 */

import type { Logger } from '@scenesync/config'
import { createLogger } from '@scenesync/config'
import type { ChangeRecord, HelloMessage, Message, StampedRecord } from '@scenesync/wire-protocol'
import { decodeMessage, encodeMessage } from '@scenesync/wire-protocol'
import type { RelayState } from './relay-state'

export interface RelayConnection {
  send(frame: Uint8Array): void
  close(): void
}

export interface RelaySession {
  readonly id: number
  receive(frame: Uint8Array): void
  /** The transport lost the connection. */
  closed(): void
}

export interface ClientStatus {
  sessionId: number
  clientId: string | null
  resumePoint: number | null
}

export interface RelayStatus {
  lastSequence: number
  blocks: number
  logLength: number
  clients: ClientStatus[]
}

interface Session {
  id: number
  connection: RelayConnection
  clientId: string | null
  open: boolean
}

export class Relay {
  private sessions = new Map<number, Session>()
  private nextSessionId = 1
  private readonly log: Logger

  constructor(readonly state: RelayState, logger?: Logger) {
    this.log = logger ?? createLogger('relay')
  }

  get sessionCount(): number {
    return this.sessions.size
  }

  connect(connection: RelayConnection): RelaySession {
    const session: Session = { id: this.nextSessionId++, connection, clientId: null, open: true }
    this.sessions.set(session.id, session)
    this.log.info('Connection opened', { session: session.id })
    return {
      id: session.id,
      receive: (frame) => this.receive(session, frame),
      closed: () => this.remove(session, 'connection closed'),
    }
  }

  status(): RelayStatus {
    return {
      lastSequence: this.state.lastSequence,
      blocks: this.state.blockCount,
      logLength: this.state.logLength,
      clients: [...this.sessions.values()].map((s) => ({
        sessionId: s.id,
        clientId: s.clientId,
        resumePoint: s.clientId === null ? null : this.state.resumePoint(s.clientId) ?? null,
      })),
    }
  }

  /** Disconnect everyone and release the log. */
  close(reason = 'relay shutting down'): void {
    for (const session of [...this.sessions.values()]) this.disconnect(session, reason)
    this.state.close()
  }

  // ─── Inbound ────────────────────────────────────────────────────────────

  private receive(session: Session, frame: Uint8Array): void {
    if (!session.open) return

    let message: Message
    try {
      message = decodeMessage(frame)
    } catch (err) {
      this.log.warn('Malformed frame', { session: session.id, error: err })
      this.disconnect(session, 'malformed frame')
      return
    }

    switch (message.kind) {
      case 'hello':
        this.hello(session, message)
        break
      case 'change-batch':
        if (session.clientId === null) {
          this.disconnect(session, 'change batch before hello')
        } else {
          this.changeBatch(session, session.clientId, message.records)
        }
        break
      case 'ack':
        if (session.clientId !== null) this.state.acknowledge(session.clientId, message.sequence)
        break
      case 'disconnect':
        this.log.info('Client said goodbye', { session: session.id, clientId: session.clientId, reason: message.reason })
        this.remove(session, message.reason)
        break
      case 'full-snapshot':
        this.disconnect(session, 'unexpected full snapshot from client')
        break
    }
  }

  private hello(session: Session, message: HelloMessage): void {
    if (session.clientId !== null) {
      this.disconnect(session, 'duplicate hello')
      return
    }
    for (const other of [...this.sessions.values()]) {
      if (other !== session && other.clientId === message.clientId) {
        this.disconnect(other, 'replaced by a newer connection')
      }
    }
    session.clientId = message.clientId

    // Only the client knows whether it kept its state, so only an explicit
    // resumeFrom replays. The acked resume point is reported in status().
    const replay = message.resumeFrom === null ? null : this.state.recordsAfter(message.resumeFrom)
    this.log.info('Client joined', {
      session: session.id, clientId: message.clientId, resumeFrom: message.resumeFrom,
      mode: replay ? 'replay' : 'snapshot',
    })
    if (replay) {
      this.send(session, encodeMessage({ kind: 'change-batch', records: replay }))
    } else {
      this.send(session, encodeMessage({
        kind: 'full-snapshot',
        lastSequence: this.state.lastSequence,
        records: this.state.snapshotRecords(),
      }))
    }
  }

  private changeBatch(session: Session, clientId: string, records: readonly ChangeRecord[]): void {
    if (records.length === 0) {
      this.send(session, encodeMessage({ kind: 'ack', sequence: this.state.lastSequence }))
      return
    }

    let stamped: StampedRecord[]
    try {
      stamped = this.state.stamp(records, clientId)
    } catch (err) {
      this.log.error('Failed to persist change batch', { session: session.id, clientId, error: err })
      this.disconnect(session, 'relay storage failure')
      return
    }

    const frame = encodeMessage({ kind: 'change-batch', records: stamped })
    for (const other of [...this.sessions.values()]) {
      if (other !== session && other.clientId !== null) this.send(other, frame)
    }
    this.send(session, encodeMessage({ kind: 'ack', sequence: this.state.lastSequence }))
    this.log.debug('Sequenced change batch', {
      clientId, records: stamped.length, lastSequence: this.state.lastSequence,
    })
  }

  // ─── Outbound ───────────────────────────────────────────────────────────

  private send(session: Session, frame: Uint8Array): boolean {
    if (!session.open) return false
    try {
      session.connection.send(frame)
      return true
    } catch (err) {
      this.log.warn('Send failed; dropping client', { session: session.id, clientId: session.clientId, error: err })
      this.remove(session, 'send failed')
      this.closeConnection(session)
      return false
    }
  }

  private disconnect(session: Session, reason: string): void {
    if (!session.open) return
    this.send(session, encodeMessage({ kind: 'disconnect', reason }))
    this.remove(session, reason)
    this.closeConnection(session)
  }

  private remove(session: Session, reason: string): void {
    if (!session.open) return
    session.open = false
    this.sessions.delete(session.id)
    this.log.info('Connection closed', { session: session.id, clientId: session.clientId, reason })
  }

  private closeConnection(session: Session): void {
    try {
      session.connection.close()
    } catch (err) {
      this.log.debug('Error while closing connection', { session: session.id, error: err })
    }
  }
}
