import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Drink } from '../database';
import { AuthModule } from '../auth';
import { DrinksController } from './drinks.controller';
import { DrinksService } from './drinks.service';

/**
 * DrinksModule — the drinks menu feature.
 *
 * Imports:
 *   - TypeOrmModule: registers the Drink entity (DataSource comes from DatabaseModule)
 *   - AuthModule:    provides AuthService for the per-permission guards
 */
@Module({
  imports: [TypeOrmModule.forFeature([Drink]), AuthModule],
  controllers: [DrinksController],
  providers: [DrinksService],
})
export class DrinksModule {}
