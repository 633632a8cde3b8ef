import { randomUUID } from 'crypto';
import { decode, encode } from '../protocol/message-codec';
import { OperationMessage } from '../protocol/operation-message.types';
import { TransportError } from '../protocol/protocol.errors';
import { AsyncQueue } from './async-queue';
import { ConnectionContext } from './connection-context';

interface PendingWait {
  count: number;
  resolve: (messages: OperationMessage[]) => void;
}

/**
 * In-process {@link ConnectionContext}. The peer side pushes frames with
 * {@link push} and reads what the server wrote from {@link sent}.
 */
export class MemoryConnectionContext implements ConnectionContext {
  readonly sent: string[] = [];
  closeCode: number | null = null;
  closeReason: string | undefined;

  private readonly inbound = new AsyncQueue<string>();
  private readonly waits: PendingWait[] = [];
  private broken: Error | null = null;
  private isClosed = false;

  constructor(readonly id: string = randomUUID()) {}

  get closed(): boolean {
    return this.isClosed;
  }

  /** Messages written by the server, decoded. */
  get messages(): OperationMessage[] {
    return this.sent.map((frame) => decode(frame));
  }

  push(frame: string | OperationMessage): void {
    this.inbound.push(typeof frame === 'string' ? frame : encode(frame));
  }

  /** Peer hangs up: the inbound sequence ends. */
  end(): void {
    this.inbound.end();
  }

  /** Makes every later `send` fail as a broken channel would. */
  breakTransport(error: Error = new Error('channel broken')): void {
    this.broken = error;
  }

  /** Resolves once the server has written at least `count` messages. */
  waitForMessages(count: number): Promise<OperationMessage[]> {
    if (this.sent.length >= count) return Promise.resolve(this.messages);
    return new Promise((resolve) => this.waits.push({ count, resolve }));
  }

  async send(frame: string): Promise<void> {
    if (this.isClosed) return;
    if (this.broken) throw new TransportError(`Failed to send to ${this.id}`, this.broken);
    this.sent.push(frame);
    for (const wait of [...this.waits]) {
      if (this.sent.length >= wait.count) {
        this.waits.splice(this.waits.indexOf(wait), 1);
        wait.resolve(this.messages);
      }
    }
  }

  frames(): AsyncIterable<string> {
    return this.inbound;
  }

  async close(code: number, reason?: string): Promise<void> {
    if (this.isClosed) return;
    this.isClosed = true;
    this.closeCode = code;
    this.closeReason = reason;
    this.inbound.end();
  }
}
