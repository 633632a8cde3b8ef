import { Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { IncomingMessage } from 'http';
import WebSocket from 'ws';
import { TransportError } from '../protocol/protocol.errors';
import { AsyncQueue } from './async-queue';
import { ConnectionContext } from './connection-context';

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

/**
 * {@link ConnectionContext} over a `ws` socket.
 *
 * Listeners are attached in the constructor, so create it synchronously in
 * the connection handler or frames sent right after the handshake are lost.
 */
export class WsConnectionContext implements ConnectionContext {
  private readonly logger = new Logger(WsConnectionContext.name);
  private readonly inbound = new AsyncQueue<string>();

  constructor(
    private readonly ws: WebSocket,
    /** The upgrade request, for hooks that authenticate from headers. */
    readonly request?: IncomingMessage,
    readonly id: string = randomUUID(),
  ) {
    ws.on('message', (data: WebSocket.RawData) => {
      this.inbound.push(rawDataToString(data));
    });
    ws.on('close', () => this.inbound.end());
    ws.on('error', (err: Error) => {
      this.logger.warn(`Socket error on ${this.id}: ${err.message}`);
      this.inbound.end();
    });
  }

  get closed(): boolean {
    return this.ws.readyState === WebSocket.CLOSING || this.ws.readyState === WebSocket.CLOSED;
  }

  send(frame: string): Promise<void> {
    if (this.closed) return Promise.resolve();
    return new Promise((resolve, reject) => {
      this.ws.send(frame, (err?: Error) => {
        if (err) reject(new TransportError(`Failed to send to ${this.id}: ${err.message}`, err));
        else resolve();
      });
    });
  }

  frames(): AsyncIterable<string> {
    return this.inbound;
  }

  close(code: number, reason?: string): Promise<void> {
    if (this.ws.readyState === WebSocket.CLOSED) return Promise.resolve();
    return new Promise((resolve) => {
      this.ws.once('close', () => resolve());
      if (this.ws.readyState !== WebSocket.CLOSING) this.ws.close(code, reason);
    });
  }
}
