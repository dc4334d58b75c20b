import { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Logger } from 'nestjs-pino';

import { AppModule } from './app.module';
import { BridgeService } from './bridge/bridge.service';
import { CliOverrides } from './config/configuration';

/**
 * Builds the application context and starts the bridge. A publisher that
 * cannot bind rejects here, before any serial record is read.
 */
export async function bootstrap(overrides: CliOverrides = {}): Promise<INestApplicationContext> {
  const app = await NestFactory.createApplicationContext(AppModule.forRoot(overrides), {
    bufferLogs: true,
  });

  const logger = app.get(Logger);
  app.useLogger(logger);

  try {
    await app.get(BridgeService).start();
  } catch (error) {
    await app.close();
    throw error;
  }

  return app;
}
