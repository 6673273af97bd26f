/**
 * TCP listener: one relay session per socket, length-prefixed frames.
 */

import { createServer, type AddressInfo, type Server, type Socket } from 'node:net'
import type { Logger } from '@scenesync/config'
import { FrameReader } from '@scenesync/wire-protocol'
import { writeFrame } from '@scenesync/scene-sync'
import type { Relay } from './relay'

export interface TcpServerOptions {
  host: string
  port: number
  maxFrameSize: number
  /** Unsent bytes per client before it is dropped. Default: 4 frames of maxFrameSize. */
  maxBufferedBytes?: number
  logger: Logger
}

export class RelayTcpServer {
  private readonly server: Server
  private readonly sockets = new Set<Socket>()

  constructor(private readonly relay: Relay, private readonly options: TcpServerOptions) {
    this.server = createServer((socket) => this.accept(socket))
  }

  listen(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject)
      this.server.listen(this.options.port, this.options.host, () => {
        this.server.off('error', reject)
        const address = this.server.address()
        if (address === null || typeof address === 'string') {
          reject(new Error('TCP server is not bound to an IP address'))
          return
        }
        this.options.logger.info('Relay listening', { host: address.address, port: address.port })
        resolve(address)
      })
    })
  }

  close(): Promise<void> {
    for (const socket of this.sockets) socket.destroy()
    return new Promise((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()))
    })
  }

  private accept(socket: Socket): void {
    this.sockets.add(socket)
    socket.setNoDelay(true)
    const reader = new FrameReader(this.options.maxFrameSize)
    const session = this.relay.connect({
      send: (frame) => writeFrame(socket, frame, this.options.maxBufferedBytes ?? 4 * this.options.maxFrameSize),
      close: () => {
        socket.end()
      },
    })

    socket.on('data', (chunk: Buffer) => {
      let frames: Uint8Array[]
      try {
        frames = reader.push(chunk)
      } catch (err) {
        this.options.logger.warn('Dropping connection with bad framing', {
          session: session.id, remote: socket.remoteAddress, error: err,
        })
        socket.destroy()
        return
      }
      for (const frame of frames) session.receive(frame)
    })

    socket.on('error', (err) => {
      this.options.logger.debug('Socket error', { session: session.id, error: err })
    })

    socket.on('close', () => {
      this.sockets.delete(socket)
      session.closed()
    })
  }
}
