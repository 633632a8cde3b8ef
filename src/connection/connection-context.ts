/**
 * Capability the subscription server uses to talk to one client, whatever
 * the hosting transport. New transports are adapters implementing this
 * interface; the server never sees the socket behind it.
 */
export interface ConnectionContext {
  readonly id: string;
  readonly closed: boolean;

  /**
   * Write one text frame. Resolves without writing once the context is
   * closed; rejects with `TransportError` if the channel fails.
   */
  send(frame: string): Promise<void>;

  /** Inbound frames in arrival order. Ends when the transport closes. */
  frames(): AsyncIterable<string>;

  close(code: number, reason?: string): Promise<void>;
}
