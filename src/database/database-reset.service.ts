import { Injectable, Logger, OnApplicationBootstrap } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { insertDemoDrinks } from './seeds/demo-drinks';

/**
 * Rebuilds the schema from scratch on startup when DB_RESET_ON_STARTUP=true.
 *
 * Drops every table, recreates them from the entities and inserts the demo
 * drinks. All existing records are lost, so this stays off unless asked for.
 */
@Injectable()
export class DatabaseResetService implements OnApplicationBootstrap {
  private readonly logger = new Logger(DatabaseResetService.name);

  constructor(
    private readonly dataSource: DataSource,
    private readonly configService: ConfigService,
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    if (this.configService.get<string>('DB_RESET_ON_STARTUP', 'false') !== 'true') {
      return;
    }

    this.logger.warn('DB_RESET_ON_STARTUP is set: dropping and recreating the schema');
    await this.dataSource.synchronize(true);

    const drinks = await insertDemoDrinks(this.dataSource.manager);
    this.logger.log(`Schema reset, inserted ${drinks.length} demo drinks`);
  }
}
