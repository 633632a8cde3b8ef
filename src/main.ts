import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { WsAdapter } from '@nestjs/platform-ws';
import { AppModule } from './app.module';
import { EnvConfig, parseAllowedOrigins } from './config/env.config';

async function bootstrap() {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create(AppModule);
  app.useWebSocketAdapter(new WsAdapter(app));

  const config = app.get(ConfigService<EnvConfig, true>);

  const allowedOrigins = parseAllowedOrigins(config.get('ALLOWED_ORIGINS'));
  app.enableCors({
    origin: allowedOrigins.includes('*') ? true : allowedOrigins,
    credentials: true,
  });

  const port = config.get('PORT');
  await app.listen(port);
  logger.log(`GraphQL WS server listening on :${port}/graphql`);

  for (const sig of ['SIGINT', 'SIGTERM'] as const) {
    process.on(sig, async () => {
      logger.log(`${sig} received, shutting down…`);
      await app.close();
      process.exit(0);
    });
  }
}

bootstrap().catch((err: unknown) => {
  new Logger('Bootstrap').error(err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
