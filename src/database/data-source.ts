import { config } from 'dotenv';
import { DataSource } from 'typeorm';
import { join } from 'path';
import { buildDataSourceOptions } from './typeorm.config';

/**
 * Load env vars from the project root .env file
 * (two levels up from both src/database and dist/database).
 */
config({ path: join(__dirname, '../../.env') });

/**
 * TypeORM DataSource for CLI-driven work:
 * - `typeorm migration:run -d dist/database/data-source.js`
 * - `typeorm migration:revert -d dist/database/data-source.js`
 * - the seed script
 */
const AppDataSource = new DataSource(
  buildDataSourceOptions((key, fallback) => process.env[key] || fallback),
);

export default AppDataSource;
