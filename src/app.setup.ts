import type { NestApplicationOptions } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { NestExpressApplication } from '@nestjs/platform-express';
import { ApiExceptionFilter } from './common/filters/api-exception.filter';

/**
 * Options for creating the application. Nest's default parsers are turned
 * off: configureApp registers its own.
 */
export const APP_OPTIONS: NestApplicationOptions = { bodyParser: false };

/**
 * Applies the HTTP setup shared by main.ts and the end-to-end tests.
 * Expects an application created with APP_OPTIONS.
 *
 * Body parsers: urlencoded forms are decoded as usual. JSON and text/plain
 * bodies are kept as raw strings and parsed by DrinkPayloadPipe, which runs
 * after the permission guards, so a malformed body never hides a 401.
 */
export function configureApp(app: NestExpressApplication): NestExpressApplication {
  const configService = app.get(ConfigService);

  // ── Body parsing ──────────────────────────────────────
  app.useBodyParser('urlencoded', { extended: true });
  app.useBodyParser('text', { type: ['text/plain', 'application/json'] });

  // ── Error envelope ────────────────────────────────────
  app.useGlobalFilters(new ApiExceptionFilter());

  // ── CORS ──────────────────────────────────────────────
  app.enableCors({
    origin: configService.get<string>('CORS_ORIGIN', '*'),
    allowedHeaders: ['Content-Type', 'Authorization'],
    methods: ['GET', 'PATCH', 'POST', 'DELETE', 'OPTIONS'],
  });

  return app;
}
