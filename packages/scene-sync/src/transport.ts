/**
 * Transport seam between the synchronizer and the relay.
 *
 * A connector opens one connection and hands frames to the handlers it was
 * given. Frames are whole protocol frames; splitting a byte stream is the
 * connector's job.
 */

export interface TransportHandlers {
  onFrame(frame: Uint8Array): void
  /** Called once, when the connection is gone. `error` is set if it failed. */
  onClose(error?: Error): void
}

export interface SyncTransport {
  send(frame: Uint8Array): void
  close(): void
}

export type TransportConnector = (handlers: TransportHandlers) => Promise<SyncTransport>
