import { Module } from '@nestjs/common';
import { ConnectionDirectory } from '../connection/connection-directory.service';
import { ExecutionModule } from '../execution/execution.module';
import { SubscriptionServer } from './subscription-server.service';

@Module({
  imports: [ExecutionModule],
  providers: [SubscriptionServer, ConnectionDirectory],
  exports: [SubscriptionServer, ConnectionDirectory],
})
export class SubscriptionsModule {}
