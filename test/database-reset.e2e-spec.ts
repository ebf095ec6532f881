import { Test } from '@nestjs/testing';
import type { NestExpressApplication } from '@nestjs/platform-express';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { APP_OPTIONS, configureApp } from '../src/app.setup';

describe('DB_RESET_ON_STARTUP (e2e)', () => {
  let app: NestExpressApplication;

  beforeAll(async () => {
    process.env.DB_RESET_ON_STARTUP = 'true';

    const moduleRef = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleRef.createNestApplication<NestExpressApplication>({
      ...APP_OPTIONS,
      logger: false,
    });
    configureApp(app);
    await app.init();
  });

  afterAll(async () => {
    await app.close();
    process.env.DB_RESET_ON_STARTUP = 'false';
  });

  it('starts with the demo drinks on the menu', async () => {
    const response = await request(app.getHttpServer()).get('/drinks').expect(200);

    expect(response.body).toEqual({
      success: true,
      drinks: [
        {
          id: 1,
          title: 'Flat White',
          recipe: [
            { color: 'brown', parts: 1 },
            { color: 'white', parts: 2 },
          ],
        },
        {
          id: 2,
          title: 'Matcha Latte',
          recipe: [
            { color: 'green', parts: 1 },
            { color: 'beige', parts: 3 },
          ],
        },
      ],
    });
  });
});
