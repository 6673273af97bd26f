/**
 * TCP connector: one socket per connection, length-prefixed frames.
 */

import { createConnection } from 'node:net'
import { DEFAULT_MAX_FRAME_SIZE, FrameReader } from '@scenesync/wire-protocol'
import type { SyncTransport, TransportConnector, TransportHandlers } from './transport'
import { TransportError } from './errors'

export interface TcpConnectorOptions {
  host: string
  port: number
  maxFrameSize?: number
  /** Unsent bytes a socket may hold before sends fail. Default: 4 frames of maxFrameSize. */
  maxBufferedBytes?: number
}

/** The part of a socket writeFrame needs. */
export interface FrameSink {
  readonly destroyed: boolean
  readonly writableLength: number
  write(frame: Uint8Array): boolean
}

/**
 * Queue one frame on a socket. Throws instead of buffering past
 * `maxBufferedBytes`, so a peer that stopped reading surfaces as a send failure.
 */
export function writeFrame(socket: FrameSink, frame: Uint8Array, maxBufferedBytes: number): void {
  if (socket.destroyed) throw new TransportError('Socket is closed')
  if (socket.writableLength + frame.byteLength > maxBufferedBytes) {
    throw new TransportError(
      `Peer is not reading: ${socket.writableLength} bytes already queued (limit ${maxBufferedBytes})`,
    )
  }
  socket.write(frame)
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

export function tcpConnector(options: TcpConnectorOptions): TransportConnector {
  return (handlers: TransportHandlers) => new Promise<SyncTransport>((resolve, reject) => {
    const socket = createConnection({ host: options.host, port: options.port })
    const maxFrameSize = options.maxFrameSize ?? DEFAULT_MAX_FRAME_SIZE
    const maxBufferedBytes = options.maxBufferedBytes ?? 4 * maxFrameSize
    const reader = new FrameReader(maxFrameSize)
    let connected = false
    let failure: Error | undefined

    socket.on('data', (chunk: Buffer) => {
      try {
        for (const frame of reader.push(chunk)) handlers.onFrame(frame)
      } catch (err) {
        socket.destroy(toError(err))
      }
    })

    socket.on('error', (err) => {
      failure = err
      if (!connected) {
        reject(new TransportError(`Cannot connect to ${options.host}:${options.port}`, err))
      }
    })

    socket.on('close', () => {
      if (connected) {
        handlers.onClose(failure && new TransportError('Connection lost', failure))
      }
    })

    socket.once('connect', () => {
      connected = true
      socket.setNoDelay(true)
      resolve({
        send: (frame) => writeFrame(socket, frame, maxBufferedBytes),
        close: () => {
          socket.end()
        },
      })
    })
  })
}
