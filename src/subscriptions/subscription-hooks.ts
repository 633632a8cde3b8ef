import { ConnectionContext } from '../connection/connection-context';
import { ConnectionParams } from '../protocol/operation-message.types';

export const SUBSCRIPTION_HOOKS = Symbol('SUBSCRIPTION_HOOKS');

/** Lifecycle callbacks supplied by the embedding application. */
export interface SubscriptionHooks {
  /** Runs when the transport opens, before any frame is read. Throwing closes it with 1011. */
  onOpen?(connection: ConnectionContext): void | Promise<void>;

  /**
   * Runs on `connection_init`. Return `false` or throw to reject the
   * connection; a thrown error's message is sent to the client. An object
   * return value becomes the GraphQL context of every operation on the
   * connection.
   *
   * Without this hook every connection is accepted with an empty context.
   */
  onConnect?(params: ConnectionParams, connection: ConnectionContext): unknown;

  /**
   * Runs once per operation when it completes, fails, is stopped or is
   * dropped at teardown.
   */
  onOperationComplete?(
    contextValue: unknown,
    operationId: string,
    connection: ConnectionContext,
  ): void | Promise<void>;

  /** Runs once when an acknowledged connection ends. */
  onDisconnect?(contextValue: unknown, connection: ConnectionContext): void | Promise<void>;
}
