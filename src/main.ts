import 'reflect-metadata';
import * as dotenv from 'dotenv';
dotenv.config();

import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { resolveLogLevels } from './config/log-level';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');

  try {
    const app = await NestFactory.create(AppModule, {
      logger: resolveLogLevels(process.env.LOG_LEVEL),
    });

    configureApp(app);
    app.enableShutdownHooks();

    const config = app.get(ConfigService);
    const port = config.get<number>('PORT', 8080);
    await app.listen(port, '0.0.0.0');

    logger.log(`🚀 Price feed running on http://0.0.0.0:${port}`);
    logger.log(`📋 Registered symbols: ${config.get<string>('TOKENS')}`);
  } catch (error: unknown) {
    const err = error instanceof Error ? error : new Error(String(error));
    logger.error('❌ Failed to start application:', err.stack);
    process.exit(1);
  }
}

void bootstrap();
