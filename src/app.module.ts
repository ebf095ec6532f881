import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { DatabaseModule } from './database';
import { AuthModule } from './auth';
import { HealthModule } from './health/health.module';
import { DrinksModule } from './drinks/drinks.module';
import { AppController } from './app.controller';

@Module({
  imports: [
    // ── Configuration ─────────────────────────────────────
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ['.env'],
    }),

    // ── Database ──────────────────────────────────────────
    DatabaseModule.forRoot(),

    // ── Feature Modules ───────────────────────────────────
    HealthModule,
    AuthModule,
    DrinksModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
