import { Inject, Injectable, Logger, OnModuleDestroy, Optional } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConnectionContext } from '../connection/connection-context';
import { ConnectionDirectory } from '../connection/connection-directory.service';
import { EXECUTION_ENGINE } from '../execution/execution.constants';
import { ExecutionEngine } from '../execution/execution.types';
import { CloseCode } from '../protocol/protocol.constants';
import { ProtocolConnection } from './protocol-connection';
import { SUBSCRIPTION_HOOKS, SubscriptionHooks } from './subscription-hooks';

/**
 * Entry point of the `graphql-ws` protocol.
 *
 * Each transport adapter hands its {@link ConnectionContext} to
 * {@link handle}, which runs a {@link ProtocolConnection} over it until the
 * transport closes. Live connections are listed in the
 * {@link ConnectionDirectory} so that {@link closeAll} can end them on
 * shutdown.
 */
@Injectable()
export class SubscriptionServer implements OnModuleDestroy {
  private readonly logger = new Logger(SubscriptionServer.name);
  private readonly keepAliveMs: number;
  private readonly connectionInitTimeoutMs: number;
  private readonly teardownTimeoutMs: number;

  constructor(
    @Inject(EXECUTION_ENGINE) private readonly engine: ExecutionEngine,
    private readonly directory: ConnectionDirectory,
    config: ConfigService,
    @Optional() @Inject(SUBSCRIPTION_HOOKS) private readonly hooks: SubscriptionHooks = {},
  ) {
    this.keepAliveMs = config.get<number>('KEEP_ALIVE_MS', 10_000);
    this.connectionInitTimeoutMs = config.get<number>('CONNECTION_INIT_TIMEOUT_MS', 10_000);
    this.teardownTimeoutMs = config.get<number>('TEARDOWN_TIMEOUT_MS', 5_000);
  }

  async onModuleDestroy() {
    await this.closeAll();
  }

  /**
   * Serve one client connection. Resolves once the connection has been
   * torn down and every one of its operations cancelled.
   */
  async handle(context: ConnectionContext): Promise<void> {
    const connection = new ProtocolConnection(context, {
      engine: this.engine,
      hooks: this.hooks,
      keepAliveMs: this.keepAliveMs,
      connectionInitTimeoutMs: this.connectionInitTimeoutMs,
      teardownTimeoutMs: this.teardownTimeoutMs,
    });
    this.directory.add(connection);
    this.logger.log(`Client connected: ${context.id}`);

    try {
      await connection.run();
    } finally {
      this.directory.remove(connection);
      this.logger.log(`Client disconnected: ${context.id}`);
    }
  }

  /** Terminate every live connection. */
  async closeAll(): Promise<void> {
    const connections = this.directory.snapshot();
    if (!connections.length) return;
    this.logger.log(`Closing ${connections.length} connection(s)…`);
    await Promise.all(
      connections.map((connection) => connection.terminate(CloseCode.Normal, 'Server shutting down')),
    );
  }

  get stats() {
    return {
      connections: this.directory.size,
      operations: this.directory.operationCount,
    };
  }
}
