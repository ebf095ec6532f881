import { MigrationInterface, QueryRunner } from 'typeorm';

/**
 * Creates the drinks table.
 *
 * Hand-written to match the Drink entity. The SQL is PostgreSQL-specific
 * (SERIAL); SQLite deployments build the schema with DB_SYNCHRONIZE instead.
 */
export class CreateDrinks1760000000000 implements MigrationInterface {
  name = 'CreateDrinks1760000000000';

  public async up(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`
      CREATE TABLE "drinks" (
        "id"     SERIAL NOT NULL,
        "title"  varchar(80) NOT NULL,
        "recipe" text NOT NULL,
        CONSTRAINT "PK_drinks" PRIMARY KEY ("id"),
        CONSTRAINT "UQ_drinks_title" UNIQUE ("title")
      )
    `);
  }

  public async down(queryRunner: QueryRunner): Promise<void> {
    await queryRunner.query(`DROP TABLE IF EXISTS "drinks"`);
  }
}
