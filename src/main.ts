import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { AppModule } from './app.module';
import { APP_OPTIONS, configureApp } from './app.setup';

async function bootstrap(): Promise<void> {
  const logger = new Logger('Bootstrap');
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    ...APP_OPTIONS,
    logger: ['log', 'error', 'warn', 'debug', 'verbose'],
  });

  configureApp(app);

  // ── Start ─────────────────────────────────────────────
  const port = app.get(ConfigService).get<number>('PORT', 5000);
  await app.listen(port);

  logger.log(`Drinks Menu API running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
  const cause = error instanceof Error ? error : new Error(String(error));
  new Logger('Bootstrap').error(`Startup failed: ${cause.message}`, cause.stack);
  process.exit(1);
});
