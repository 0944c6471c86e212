import 'reflect-metadata';
import * as path from 'path';
import * as dotenv from 'dotenv';

// Root .env first, then apps/api/.env; variables already set win
dotenv.config({ path: path.resolve(process.cwd(), '.env') });
dotenv.config({ path: path.resolve(__dirname, '../.env') });

import { NestFactory } from '@nestjs/core';
import {
  FastifyAdapter,
  NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { configureApp } from './app.setup';
import { NUDGE_CONFIG, NudgeConfig } from './config/nudge.config';

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(
    AppModule,
    new FastifyAdapter(),
  );

  configureApp(app);
  app.enableShutdownHooks();

  const config = app.get<NudgeConfig>(NUDGE_CONFIG);
  await app.listen(config.port, '0.0.0.0');
  Logger.log(`Application is running on: http://localhost:${config.port}`, 'Bootstrap');
}

bootstrap().catch((error: unknown) => {
  Logger.error(
    'Failed to start application',
    error instanceof Error ? error.stack : String(error),
    'Bootstrap',
  );
  process.exit(1);
});
