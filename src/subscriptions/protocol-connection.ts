import { Logger } from '@nestjs/common';
import { ConnectionContext } from '../connection/connection-context';
import { ManagedConnection } from '../connection/connection-directory.service';
import { Operation } from '../connection/operation';
import { OperationRegistry } from '../connection/operation-registry';
import { ExecutionEngine, ExecutionOutcome } from '../execution/execution.types';
import { decode, encode } from '../protocol/message-codec';
import {
  ConnectionParams,
  FormattedError,
  OperationMessage,
  ServerMessage,
  StartMessage,
} from '../protocol/operation-message.types';
import { CloseCode, MessageType } from '../protocol/protocol.constants';
import {
  DecodeError,
  DuplicateOperationIdError,
  ExecutionError,
  ProtocolError,
  TransportError,
} from '../protocol/protocol.errors';
import { SubscriptionHooks } from './subscription-hooks';

export enum ConnectionState {
  AwaitingInit = 'awaiting_init',
  Acknowledged = 'acknowledged',
  Terminated = 'terminated',
}

export interface ProtocolConnectionOptions {
  engine: ExecutionEngine;
  hooks: SubscriptionHooks;
  /** Interval between `ka` messages; 0 disables keep-alive. */
  keepAliveMs: number;
  /** Time allowed between open and `connection_init`; 0 waits forever. */
  connectionInitTimeoutMs: number;
  /** How long teardown waits for operations to release; 0 waits forever. */
  teardownTimeoutMs: number;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Protocol state machine for one client connection.
 *
 * Inbound frames are handled one at a time, in order. Each accepted `start`
 * runs as its own task so that long-lived subscriptions do not block the
 * inbound loop; all outbound writes share a single queue.
 */
export class ProtocolConnection implements ManagedConnection {
  private readonly logger = new Logger(ProtocolConnection.name);
  private readonly operations = new OperationRegistry();
  private readonly tasks = new Set<Promise<void>>();

  private state = ConnectionState.AwaitingInit;
  private contextValue: unknown = {};
  private outbound: Promise<void> = Promise.resolve();
  private keepAliveTimer: ReturnType<typeof setInterval> | null = null;
  private initTimer: ReturnType<typeof setTimeout> | null = null;
  private teardown: Promise<void> | null = null;

  constructor(
    private readonly context: ConnectionContext,
    private readonly options: ProtocolConnectionOptions,
  ) {}

  get id(): string {
    return this.context.id;
  }

  get currentState(): ConnectionState {
    return this.state;
  }

  get operationCount(): number {
    return this.operations.size;
  }

  /**
   * Consume inbound frames until the transport closes or the connection is
   * terminated. Resolves after teardown has finished.
   */
  async run(): Promise<void> {
    try {
      await this.options.hooks.onOpen?.(this.context);
    } catch (err) {
      this.logger.error(`onOpen failed for ${this.id}: ${errorMessage(err)}`);
      await this.terminate(CloseCode.InternalError, 'Connection setup failed');
      return;
    }

    this.startInitTimer();
    try {
      for await (const frame of this.context.frames()) {
        if (this.state === ConnectionState.Terminated) break;
        await this.receive(frame);
      }
    } finally {
      await this.terminate();
    }
  }

  /**
   * Cancel every operation, stop the timers, run `onDisconnect` and close
   * the transport. Safe to call more than once; later calls share the
   * first call's result.
   */
  terminate(code: number = CloseCode.Normal, reason?: string): Promise<void> {
    if (!this.teardown) this.teardown = this.shutdown(code, reason);
    return this.teardown;
  }

  private async receive(frame: string): Promise<void> {
    try {
      await this.dispatch(decode(frame));
    } catch (err) {
      if (err instanceof DecodeError || err instanceof ProtocolError) {
        this.logger.warn(`${err.name} on ${this.id}: ${err.message}`);
        await this.fail(err.message, CloseCode.BadRequest);
      } else if (err instanceof TransportError) {
        this.logger.warn(err.message);
        await this.terminate(CloseCode.InternalError, 'Transport failure');
      } else {
        throw err;
      }
    }
  }

  private async dispatch(message: OperationMessage): Promise<void> {
    if (this.state === ConnectionState.AwaitingInit) {
      if (message.type !== MessageType.ConnectionInit) {
        throw new ProtocolError(`Received "${message.type}" before connection_init`);
      }
      return this.init(message.payload ?? {});
    }

    switch (message.type) {
      case MessageType.ConnectionInit:
        throw new ProtocolError('Too many initialisation requests');
      case MessageType.Start:
        return this.start(message);
      case MessageType.Stop:
        return this.stop(message.id);
      case MessageType.ConnectionTerminate:
        return this.terminate();
      default:
        throw new ProtocolError(`Unexpected "${message.type}" message from client`);
    }
  }

  private async init(params: ConnectionParams): Promise<void> {
    const { onConnect } = this.options.hooks;
    let accepted: unknown = true;
    try {
      if (onConnect) accepted = await onConnect(params, this.context);
    } catch (err) {
      this.logger.warn(`Connection ${this.id} rejected: ${errorMessage(err)}`);
      await this.fail(errorMessage(err) || 'Connection rejected', CloseCode.Unauthorized);
      return;
    }
    if (accepted === false) {
      this.logger.warn(`Connection ${this.id} rejected`);
      await this.fail('Connection rejected', CloseCode.Unauthorized);
      return;
    }
    // terminated while the hook was running
    if (this.state !== ConnectionState.AwaitingInit) return;

    if (accepted !== null && typeof accepted === 'object') this.contextValue = accepted;
    this.clearInitTimer();
    this.state = ConnectionState.Acknowledged;
    await this.send({ type: MessageType.ConnectionAck });
    this.startKeepAlive();
    this.logger.log(`Connection ${this.id} acknowledged`);
  }

  private async start(message: StartMessage): Promise<void> {
    const operation = new Operation(message.id, message.payload);
    try {
      this.operations.register(message.id, operation);
    } catch (err) {
      if (!(err instanceof DuplicateOperationIdError)) throw err;
      this.logger.warn(`${err.message} on ${this.id}`);
      await this.send({ type: MessageType.Error, id: message.id, payload: [{ message: err.message }] });
      return;
    }

    this.track(this.execute(operation).catch((err) => this.onTaskFailure(operation, err)));
  }

  private async stop(id: string): Promise<void> {
    const operation = this.operations.lookup(id);
    if (!operation) {
      this.logger.debug(`Ignoring stop for unknown operation ${id} on ${this.id}`);
      return;
    }
    this.operations.remove(id);
    // a stream parked inside its producer only releases at its next yield
    this.track(
      operation
        .cancel()
        .catch((err) => this.logger.warn(`Cancelling ${id} on ${this.id} failed: ${errorMessage(err)}`)),
    );
    await this.operationComplete(id);
  }

  private track(work: Promise<void>): void {
    const task: Promise<void> = work.finally(() => this.tasks.delete(task));
    this.tasks.add(task);
  }

  private async execute(operation: Operation): Promise<void> {
    let outcome: ExecutionOutcome;
    try {
      outcome = await this.options.engine.execute({
        ...operation.payload,
        contextValue: this.contextValue,
      });
    } catch (err) {
      await this.failOperation(operation, err);
      return;
    }

    if (outcome.kind === 'single') {
      if (!this.isLive(operation)) return;
      await this.send({ type: MessageType.Data, id: operation.id, payload: outcome.result });
      await this.completeOperation(operation);
      return;
    }

    const { results } = outcome;
    if (!(await operation.adopt(results))) return;

    try {
      for (;;) {
        const step = await results.next();
        if (step.done || !this.isLive(operation)) break;
        await this.send({ type: MessageType.Data, id: operation.id, payload: step.value });
      }
    } catch (err) {
      if (err instanceof TransportError) throw err;
      await this.failOperation(operation, err);
      return;
    }
    await this.completeOperation(operation);
  }

  /** Whether messages may still be sent for this operation. */
  private isLive(operation: Operation): boolean {
    return (
      this.state === ConnectionState.Acknowledged &&
      !operation.isCancelled &&
      this.operations.lookup(operation.id) === operation
    );
  }

  private async completeOperation(operation: Operation): Promise<void> {
    if (!this.isLive(operation)) return;
    this.operations.remove(operation.id);
    await this.send({ type: MessageType.Complete, id: operation.id });
    await this.operationComplete(operation.id);
  }

  private async failOperation(operation: Operation, err: unknown): Promise<void> {
    if (!this.isLive(operation)) return;
    this.operations.remove(operation.id);

    let errors: readonly FormattedError[];
    if (err instanceof ExecutionError) {
      this.logger.debug(`Operation ${operation.id} on ${this.id} failed: ${err.message}`);
      errors = err.errors;
    } else {
      this.logger.error(`Operation ${operation.id} on ${this.id} failed: ${errorMessage(err)}`);
      errors = [{ message: errorMessage(err) }];
    }
    await this.send({ type: MessageType.Error, id: operation.id, payload: errors });
    await this.operationComplete(operation.id);
  }

  private async operationComplete(operationId: string): Promise<void> {
    const { onOperationComplete } = this.options.hooks;
    if (!onOperationComplete) return;
    try {
      await onOperationComplete(this.contextValue, operationId, this.context);
    } catch (err) {
      this.logger.error(`onOperationComplete failed for ${operationId} on ${this.id}: ${errorMessage(err)}`);
    }
  }

  private onTaskFailure(operation: Operation, err: unknown): void {
    if (err instanceof TransportError) {
      this.abandon(err);
      return;
    }
    this.logger.error(`Operation ${operation.id} on ${this.id} crashed: ${errorMessage(err)}`);
  }

  /** Tear down after a transport failure seen outside the inbound loop. */
  private abandon(err: unknown): void {
    this.logger.warn(`Transport failure on ${this.id}: ${errorMessage(err)}`);
    this.terminate(CloseCode.InternalError, 'Transport failure').catch((closeErr) =>
      this.logger.error(`Teardown of ${this.id} failed: ${errorMessage(closeErr)}`),
    );
  }

  /** Report a connection-level error to the client, then tear down. */
  private async fail(message: string, code: CloseCode): Promise<void> {
    try {
      await this.send({ type: MessageType.ConnectionError, payload: { message } });
    } catch (err) {
      this.logger.warn(`Could not deliver connection_error to ${this.id}: ${errorMessage(err)}`);
    }
    await this.terminate(code, message);
  }

  /**
   * Queue a message behind every earlier write on this connection. The
   * returned promise settles with this write only.
   */
  private send(message: ServerMessage): Promise<void> {
    const frame = encode(message);
    const write = this.outbound.then(() => this.context.send(frame));
    // a failed write is reported to its own caller, not to the next one
    this.outbound = write.catch(() => undefined);
    return write;
  }

  private async shutdown(code: number, reason?: string): Promise<void> {
    const wasAcknowledged = this.state === ConnectionState.Acknowledged;
    this.state = ConnectionState.Terminated;
    this.clearInitTimer();
    this.stopKeepAlive();

    const operations = this.operations.drain();
    const released = operations.map((operation) =>
      operation.cancel().catch((err) =>
        this.logger.warn(`Cancelling ${operation.id} on ${this.id} failed: ${errorMessage(err)}`),
      ),
    );
    await this.settle([...released, ...this.tasks]);
    for (const operation of operations) await this.operationComplete(operation.id);

    const { onDisconnect } = this.options.hooks;
    if (wasAcknowledged && onDisconnect) {
      try {
        await onDisconnect(this.contextValue, this.context);
      } catch (err) {
        this.logger.error(`onDisconnect failed for ${this.id}: ${errorMessage(err)}`);
      }
    }

    await this.outbound;
    try {
      await this.context.close(code, reason);
    } catch (err) {
      this.logger.warn(`Closing ${this.id} failed: ${errorMessage(err)}`);
    }
    if (operations.length) {
      this.logger.log(`Connection ${this.id} terminated, cancelled ${operations.length} operation(s)`);
    }
  }

  /** Wait for `pending` to settle, for at most `teardownTimeoutMs`. */
  private async settle(pending: Promise<void>[]): Promise<void> {
    const { teardownTimeoutMs } = this.options;
    if (!(teardownTimeoutMs > 0 && Number.isFinite(teardownTimeoutMs))) {
      await Promise.allSettled(pending);
      return;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const expired = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), teardownTimeoutMs);
    });
    const settled = await Promise.race([Promise.allSettled(pending).then(() => true), expired]);
    clearTimeout(timer);
    if (!settled) {
      this.logger.warn(`Connection ${this.id} closing with work still pending after ${teardownTimeoutMs}ms`);
    }
  }

  private startKeepAlive() {
    const { keepAliveMs } = this.options;
    if (!(keepAliveMs > 0 && Number.isFinite(keepAliveMs))) return;
    const ping = () => {
      this.send({ type: MessageType.KeepAlive }).catch((err) => this.abandon(err));
    };
    ping();
    this.keepAliveTimer = setInterval(ping, keepAliveMs);
  }

  private stopKeepAlive() {
    if (this.keepAliveTimer) {
      clearInterval(this.keepAliveTimer);
      this.keepAliveTimer = null;
    }
  }

  private startInitTimer() {
    const { connectionInitTimeoutMs } = this.options;
    if (!(connectionInitTimeoutMs > 0 && Number.isFinite(connectionInitTimeoutMs))) return;
    this.initTimer = setTimeout(() => {
      this.initTimer = null;
      if (this.state !== ConnectionState.AwaitingInit) return;
      this.logger.warn(`Connection ${this.id} sent no connection_init within ${connectionInitTimeoutMs}ms`);
      this.fail('Connection initialisation timeout', CloseCode.ConnectionInitTimeout).catch((err) =>
        this.logger.error(`Teardown of ${this.id} failed: ${errorMessage(err)}`),
      );
    }, connectionInitTimeoutMs);
  }

  private clearInitTimer() {
    if (this.initTimer) {
      clearTimeout(this.initTimer);
      this.initTimer = null;
    }
  }
}
