import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module';
import { SERVICE_NAME } from './app.controller';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  logger.log(`Starting ${SERVICE_NAME} System...`);

  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();

  const config = app.get(ConfigService);
  const host = config.get<string>('HOST', '0.0.0.0');
  const port = config.get<number>('PORT', 8000);

  await app.listen(port, host);
  logger.log(`Listening on http://${host}:${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
