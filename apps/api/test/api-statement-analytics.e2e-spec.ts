import { NestFastifyApplication } from '@nestjs/platform-fastify';
import request from 'supertest';
import { createTestApp } from './test-utils';

describe('Statement Analytics API (E2E)', () => {
  let app: NestFastifyApplication;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('POST /statement-analytics/analyze', () => {
    it('should group a request log by statement and template', async () => {
      const response = await request(app.getHttpServer())
        .post('/statement-analytics/analyze')
        .send([
          { statement: 'SELECT * FROM orders WHERE id = $1', positionalArgs: [1], elapsedTime: '20ms' },
          { statement: 'SELECT * FROM orders WHERE id = $1', positionalArgs: [2], elapsedTime: '30ms' },
          { statement: 42 },
        ])
        .expect(200);

      expect(response.body.totalEntries).toBe(3);
      expect(response.body.processedEntries).toBe(2);
      expect(response.body.skippedEntries).toBe(1);
      expect(response.body.modes.parametrized.byStatement).toHaveLength(1);
      expect(response.body.modes.parametrized.byStatement[0].count).toBe(2);
      expect(response.body.modes.valued.byStatement).toHaveLength(2);
      expect(response.body.modes.valued.byTemplate[0].key).toBe('SELECT * FROM orders WHERE id = ?');
      expect(response.body.diagnostics[0].code).toBe('RECORD_SKIPPED');
    });

    it('should reject a body that is not a list', async () => {
      const response = await request(app.getHttpServer())
        .post('/statement-analytics/analyze')
        .send({ statement: 'SELECT 1' })
        .expect(400);

      expect(response.body.message).toBe('Input JSON must be a list of objects');
      expect(response.body.diagnostics[0].code).toBe('INPUT_NOT_A_LIST');
    });
  });

  describe('POST /statement-analytics/template', () => {
    it('should return the template of a statement', async () => {
      const response = await request(app.getHttpServer())
        .post('/statement-analytics/template')
        .send({ statement: "SELECT * FROM users WHERE status = (ACTIVE) AND name = 'alice'" })
        .expect(200);

      expect(response.body).toEqual({
        statement: "SELECT * FROM users WHERE status = (ACTIVE) AND name = 'alice'",
        template: 'SELECT * FROM users WHERE status = (ACTIVE) AND name = ?',
      });
    });

    it('should reject a request without a statement', async () => {
      await request(app.getHttpServer()).post('/statement-analytics/template').send({}).expect(400);
    });
  });

  describe('POST /statement-analytics/substitute', () => {
    it('should bind positional and named values', async () => {
      const response = await request(app.getHttpServer())
        .post('/statement-analytics/substitute')
        .send({ statement: 'a = $1 AND b = $b', positionalArgs: [3], namedArgs: { $b: 'x' } })
        .expect(200);

      expect(response.body).toEqual({
        statement: 'a = $1 AND b = $b',
        valued: "a = 3 AND b = 'x'",
        diagnostics: [],
      });
    });

    it('should reject bindings of the wrong shape', async () => {
      await request(app.getHttpServer())
        .post('/statement-analytics/substitute')
        .send({ statement: 'a = $1', positionalArgs: 'nope' })
        .expect(400);
    });
  });
});
