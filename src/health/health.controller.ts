import { Controller, Get } from '@nestjs/common';
import { SubscriptionServer } from '../subscriptions/subscription-server.service';

/** Simple health-check endpoint at `GET /health`. */
@Controller('health')
export class HealthController {
  constructor(private readonly subscriptions: SubscriptionServer) {}

  /** Return live connection and operation counts. */
  @Get()
  check() {
    return {
      status: 'ok',
      ...this.subscriptions.stats,
    };
  }
}
