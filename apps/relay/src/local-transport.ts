/**
 * In-process connector: wires a ClientSynchronizer straight to a Relay.
 * Frames are delivered synchronously, in order, without a socket.
 */

import type { TransportConnector } from '@scenesync/scene-sync'
import { TransportError } from '@scenesync/scene-sync'
import type { Relay } from './relay'

export function localConnector(relay: Relay): TransportConnector {
  return async (handlers) => {
    let open = true
    const session = relay.connect({
      send: (frame) => {
        if (open) handlers.onFrame(frame)
      },
      close: () => {
        if (!open) return
        open = false
        handlers.onClose()
      },
    })
    return {
      send: (frame) => {
        if (!open) throw new TransportError('Loopback connection is closed')
        session.receive(frame)
      },
      close: () => {
        if (!open) return
        open = false
        session.closed()
      },
    }
  }
}
