import { Module, DynamicModule } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { DatabaseResetService } from './database-reset.service';
import { buildDataSourceOptions, ENTITIES } from './typeorm.config';

/**
 * DatabaseModule — owns the TypeORM connection and the entity repositories.
 *
 * The connection is built from ConfigService (see buildDataSourceOptions for
 * the keys), so tests switch to in-memory SQLite through the environment
 * alone.
 *
 * @example
 * ```ts
 * @Module({
 *   imports: [DatabaseModule.forRoot()],
 * })
 * export class AppModule {}
 * ```
 */
@Module({})
export class DatabaseModule {
  static forRoot(): DynamicModule {
    return {
      module: DatabaseModule,
      imports: [
        TypeOrmModule.forRootAsync({
          inject: [ConfigService],
          useFactory: (configService: ConfigService) =>
            buildDataSourceOptions((key, fallback) =>
              configService.get<string>(key, fallback),
            ),
        }),
        TypeOrmModule.forFeature([...ENTITIES]),
      ],
      providers: [DatabaseResetService],
      exports: [TypeOrmModule],
    };
  }
}
