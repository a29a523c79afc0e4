// Entry point: load the dataset (inside AppModule init), then listen.
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './module';
import { configureApp } from './app.setup';
import type { Env } from './config/env';
import { logLevelsFor } from './config/logger';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { logger: logLevelsFor(process.env.LOG_LEVEL) });
  configureApp(app);

  const cfg = app.get<ConfigService<Env, true>>(ConfigService);
  const port = cfg.get('PORT', { infer: true });
  const host = cfg.get('HOST', { infer: true });
  await app.listen(port, host);
  Logger.log(`API on http://${host}:${port}`, 'Bootstrap');
}

bootstrap().catch(err => {
  Logger.error(err instanceof Error ? err.stack ?? err.message : String(err), 'Bootstrap');
  process.exit(1);
});
