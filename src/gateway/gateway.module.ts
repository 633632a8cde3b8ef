import { Module } from '@nestjs/common';
import { SubscriptionsModule } from '../subscriptions/subscriptions.module';
import { GraphqlWsGateway } from './ws.gateway';

@Module({
  imports: [SubscriptionsModule],
  providers: [GraphqlWsGateway],
})
export class GatewayModule {}
