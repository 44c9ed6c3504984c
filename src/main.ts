import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { readNumber } from './shared/utils/config-readers';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, {
    bufferLogs: true,
  });

  app.useLogger(app.get(Logger));
  const logger = app.get(Logger);
  const configService = app.get(ConfigService);

  // Closes the chat gateway and the reload interval on SIGTERM/SIGINT
  app.enableShutdownHooks();

  const port = readNumber(configService, 'ADMIN_PORT', 8081);
  await app.listen(port);
  logger.log(`🚀 Admin API running on: http://localhost:${port}/api`);
}

void bootstrap();
