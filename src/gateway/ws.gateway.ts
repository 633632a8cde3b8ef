import { WebSocketGateway, OnGatewayConnection } from '@nestjs/websockets';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IncomingMessage } from 'http';
import WebSocket from 'ws';
import { parseAllowedOrigins } from '../config/env.config';
import { WsConnectionContext } from '../connection/ws-connection-context';
import { CloseCode, WS_PROTOCOL } from '../protocol/protocol.constants';
import { SubscriptionServer } from '../subscriptions/subscription-server.service';

/** Accept the `graphql-ws` sub-protocol and nothing else. */
export function selectProtocol(protocols: Set<string>): string | false {
  return protocols.has(WS_PROTOCOL) ? WS_PROTOCOL : false;
}

/**
 * WebSocket gateway that accepts GraphQL clients on `/graphql`.
 *
 * Checks the origin and negotiated sub-protocol, wraps the socket in a
 * {@link WsConnectionContext} and hands it to {@link SubscriptionServer},
 * which owns the connection from then on.
 */
@WebSocketGateway({
  path: '/graphql',
  handleProtocols: selectProtocol,
})
export class GraphqlWsGateway implements OnGatewayConnection {
  private readonly logger = new Logger(GraphqlWsGateway.name);
  private readonly allowedOrigins: string[];

  constructor(
    private readonly server: SubscriptionServer,
    config: ConfigService,
  ) {
    this.allowedOrigins = parseAllowedOrigins(config.get<string>('ALLOWED_ORIGINS', 'http://localhost:3000'));
  }

  handleConnection(client: WebSocket, req: IncomingMessage) {
    const origin = req.headers.origin ?? '';
    if (!this.allowedOrigins.includes('*') && !this.allowedOrigins.includes(origin)) {
      this.logger.warn(`Rejected connection from origin: ${origin}`);
      client.close(CloseCode.Forbidden, 'Origin not allowed');
      return;
    }

    if (client.protocol !== WS_PROTOCOL) {
      this.logger.warn(`Rejected connection with sub-protocol "${client.protocol}"`);
      client.close(CloseCode.ProtocolMismatch, `Expected sub-protocol ${WS_PROTOCOL}`);
      return;
    }

    const context = new WsConnectionContext(client, req);
    this.server.handle(context).catch((err: unknown) => {
      this.logger.error(`Connection ${context.id} failed: ${err instanceof Error ? err.message : err}`);
    });
  }
}
