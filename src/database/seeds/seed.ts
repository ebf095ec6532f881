import { Logger } from '@nestjs/common';
import AppDataSource from '../data-source';
import { Drink } from '../entities/drink.entity';
import { insertDemoDrinks } from './demo-drinks';

/**
 * Seed script — replaces the menu with the demo drinks.
 *
 * Usage:
 *   npm run build && npm run seed
 *
 * Prerequisites:
 *   - The database is reachable with the .env settings
 *   - Migrations have been applied (npm run migration:run)
 *
 * Idempotent: clears the drinks table before inserting.
 */
async function seed(): Promise<void> {
  const logger = new Logger('Seed');

  logger.log('Initializing data source...');
  await AppDataSource.initialize();

  const queryRunner = AppDataSource.createQueryRunner();
  await queryRunner.connect();
  await queryRunner.startTransaction();

  try {
    logger.log('Clearing drinks...');
    await queryRunner.manager.clear(Drink);

    const drinks = await insertDemoDrinks(queryRunner.manager);
    await queryRunner.commitTransaction();

    logger.log(`Inserted ${drinks.length} drinks`);
  } catch (error) {
    logger.error('Seed failed, rolling back transaction...');
    await queryRunner.rollbackTransaction();
    throw error;
  } finally {
    await queryRunner.release();
    await AppDataSource.destroy();
  }
}

seed().catch((error: Error) => {
  // eslint-disable-next-line no-console
  console.error('Fatal seed error:', error.message);
  process.exit(1);
});
