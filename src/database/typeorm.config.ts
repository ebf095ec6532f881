import type { DataSourceOptions } from 'typeorm';
import { Drink } from './entities/drink.entity';
import { CreateDrinks1760000000000 } from './migrations/1760000000000-CreateDrinks';

/** All entity classes registered in this database library */
export const ENTITIES = [Drink];

/** Migrations applied in order by `migration:run` or DB_MIGRATIONS_RUN */
export const MIGRATIONS = [CreateDrinks1760000000000];

export type DatabaseType = 'postgres' | 'better-sqlite3';

/** Reads one setting, falling back to the given default */
export type SettingReader = (key: string, fallback: string) => string;

function isEnabled(read: SettingReader, key: string): boolean {
  return read(key, 'false') === 'true';
}

function readDatabaseType(read: SettingReader): DatabaseType {
  const type = read('DB_TYPE', 'postgres');
  if (type !== 'postgres' && type !== 'better-sqlite3') {
    throw new Error(
      `DB_TYPE must be "postgres" or "better-sqlite3", received "${type}"`,
    );
  }
  return type;
}

/**
 * Builds the TypeORM connection options from a setting reader.
 *
 * Shared by the Nest DatabaseModule (reader backed by ConfigService) and the
 * CLI data source used for migrations and seeding (reader backed by
 * process.env), so both always agree on the connection.
 */
export function buildDataSourceOptions(read: SettingReader): DataSourceOptions {
  const common = {
    entities: ENTITIES,
    migrations: MIGRATIONS,
    synchronize: isEnabled(read, 'DB_SYNCHRONIZE'),
    migrationsRun: isEnabled(read, 'DB_MIGRATIONS_RUN'),
    logging: isEnabled(read, 'DB_LOGGING'),
  };

  if (readDatabaseType(read) === 'better-sqlite3') {
    return {
      ...common,
      type: 'better-sqlite3',
      database: read('SQLITE_DATABASE', 'drinks.sqlite'),
    };
  }

  return {
    ...common,
    type: 'postgres',
    host: read('POSTGRES_HOST', 'localhost'),
    port: parseInt(read('POSTGRES_PORT', '5432'), 10),
    username: read('POSTGRES_USER', 'drinks'),
    password: read('POSTGRES_PASSWORD', 'drinks_secret'),
    database: read('POSTGRES_DB', 'drinks'),
  };
}
