import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { StatementAnalyticsService } from '../statement-analytics.service';

describe('StatementAnalyticsService', () => {
  let service: StatementAnalyticsService;
  let dir: string;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        StatementAnalyticsService,
        {
          provide: ConfigService,
          useValue: { get: jest.fn().mockReturnValue({ reservedKeywords: ['ACTIVE'] }) },
        },
      ],
    }).compile();
    module.useLogger(false);

    service = module.get<StatementAnalyticsService>(StatementAnalyticsService);
    dir = mkdtempSync(join(tmpdir(), 'statement-analytics-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('analyze', () => {
    it('completes for a list of records', () => {
      const result = service.analyze([{ statement: "SELECT * FROM t WHERE a = 'x'", elapsedTime: '1s' }]);

      expect(result.status).toBe('completed');
      expect(result.report.processedEntries).toBe(1);
      expect(result.report.modes.parametrized.byTemplate[0].key).toBe('SELECT * FROM t WHERE a = ?');
    });

    it('fails for input that is not a list', () => {
      const result = service.analyze({ statement: 'SELECT 1' });

      expect(result).toMatchObject({ status: 'failed', error: 'Input JSON must be a list of objects' });
      expect(result.report.diagnostics).toEqual([
        { level: 'error', code: 'INPUT_NOT_A_LIST', message: 'Input JSON must be a list of objects' },
      ]);
    });
  });

  describe('analyzeFile', () => {
    it('analyzes a request log file', () => {
      const file = join(dir, 'requests.json');
      writeFileSync(file, JSON.stringify([{ statement: 'SELECT 1' }, { statement: 'SELECT 1' }]));

      const result = service.analyzeFile(file);

      expect(result.status).toBe('completed');
      expect(result.report.source).toBe(file);
      expect(result.report.modes.valued.byStatement[0]).toMatchObject({ key: 'SELECT 1', count: 2 });
    });

    it('fails for malformed JSON', () => {
      const file = join(dir, 'broken.json');
      writeFileSync(file, 'not json');

      const result = service.analyzeFile(file);

      expect(result.status).toBe('failed');
      expect(result.report.source).toBe(file);
      expect(result.report.diagnostics[0].code).toBe('FILE_INVALID_JSON');
    });

    it('fails for a missing file', () => {
      const result = service.analyzeFile(join(dir, 'missing.json'));

      expect(result.status).toBe('failed');
      expect(result.report.diagnostics[0].code).toBe('FILE_UNREADABLE');
    });
  });

  describe('template', () => {
    it('templates a cleaned statement', () => {
      expect(service.template("SELECT *\nFROM t WHERE a IN (1, 2) AND b = 'x'")).toBe(
        'SELECT * FROM t WHERE a IN [?, ?, ...] AND b = ?',
      );
    });

    it('honours configured reserved keywords', () => {
      expect(service.template('SELECT * FROM t WHERE s = (ACTIVE)')).toBe('SELECT * FROM t WHERE s = (ACTIVE)');
    });
  });

  describe('substitute', () => {
    it('returns the valued statement and its diagnostics', () => {
      expect(service.substitute('a = $1 AND b = $2', ['x'])).toEqual({
        statement: 'a = $1 AND b = $2',
        valued: "a = 'x' AND b = $2",
        diagnostics: [
          {
            level: 'warn',
            code: 'POSITIONAL_INDEX_OUT_OF_RANGE',
            message: 'Positional argument index 2 out of range (1 bound)',
          },
        ],
      });
    });

    it('substitutes named values', () => {
      expect(service.substitute('name = $name', [], { $name: 'alice' }).valued).toBe("name = 'alice'");
    });
  });
});
