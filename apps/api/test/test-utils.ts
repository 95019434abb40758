import { Test, TestingModule } from '@nestjs/testing';
import { NestFastifyApplication, FastifyAdapter } from '@nestjs/platform-fastify';
import { AppModule } from '../src/app.module';

/**
 * Boots the statement-insights API on Fastify without listening on a port;
 * supertest drives it through `getHttpServer()`. Only errors are logged.
 */
export async function createTestApp(): Promise<NestFastifyApplication> {
  const moduleFixture: TestingModule = await Test.createTestingModule({
    imports: [AppModule],
  }).compile();

  const app = moduleFixture.createNestApplication<NestFastifyApplication>(new FastifyAdapter(), {
    logger: ['error'],
  });

  await app.init();
  await app.getHttpAdapter().getInstance().ready();

  return app;
}
