import 'reflect-metadata';
import { config as loadEnv } from 'dotenv';
import { WebserverSetupService } from '@infra/webserver/webserver-setup.service';
import { NestFactory } from '@nestjs/core';
import { singleLineMessage } from '@common/errors/single-line-message';
import { registerError } from '@common/errors/registry';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';

loadEnv();

const logger = new Logger('Main');

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create(AppModule);
  app.enableShutdownHooks();
  await app.get(WebserverSetupService).setup(app);
}

process.on('uncaughtException', (err) => {
  if (err instanceof Error) {
    const reason = singleLineMessage(err);
    logger.error(`An uncaught exception: ${reason}`);
    registerError(err);
  } else {
    logger.error(`An uncaught exception: ${String(err)}`);
  }
});

process.on('unhandledRejection', (err: unknown) => {
  if (err instanceof Error) {
    const reason = singleLineMessage(err);
    logger.error(`An unhandled rejection: ${reason}`);
    registerError(err);
  } else {
    logger.error(`An unhandled rejection: ${String(err)}`);
  }
});

bootstrap().catch((err: unknown) => {
  const reason = err instanceof Error ? singleLineMessage(err) : String(err);
  logger.error(`Failed to start: ${reason}`);
  process.exit(1);
});
