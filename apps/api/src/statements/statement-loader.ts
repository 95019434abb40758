import { readFileSync } from 'fs';
import { plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { DiagnosticCode, StatementMetrics, StatementRecord } from '@statement-insights/shared';
import { StatementRecordDto } from '../common/dto/statement-analytics.dto';
import { DiagnosticSink } from './diagnostics';
import { DurationUnit, parseDuration, parseNumber } from './duration';

// Markers that wrap user data in redacted request logs.
const REDACTION_MARKERS = ['<ud>', '</ud>'];

/** Failure of the whole input; no record of it is analyzed. */
export class StatementInputError extends Error {
  constructor(
    readonly code: DiagnosticCode,
    message: string,
  ) {
    super(message);
    this.name = 'StatementInputError';
  }
}

export interface LoadedRecord {
  index: number;
  record: StatementRecord;
  /** Statement after line breaks and redaction markers are removed. */
  statement: string;
  positionalArgs: unknown[];
  namedArgs: Record<string, unknown>;
  metrics: StatementMetrics;
}

export function cleanStatement(statement: string): string {
  let cleaned = statement.replace(/\r?\n/g, ' ');
  for (const marker of REDACTION_MARKERS) {
    cleaned = cleaned.split(marker).join('');
  }
  return cleaned;
}

export function readStatementFile(filePath: string): unknown {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new StatementInputError(
      'FILE_UNREADABLE',
      `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new StatementInputError(
      'FILE_INVALID_JSON',
      `Invalid JSON format in ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type BindingField = 'positionalArgs' | 'namedArgs';

function constraintsOf(violations: ValidationError[]): string[] {
  return violations.flatMap((violation) => Object.values(violation.constraints ?? {}));
}

/**
 * A malformed binding only disables substitution for its record. An empty
 * list is how exports write "no bindings" and passes silently.
 */
function ignoreBinding(
  field: BindingField,
  value: unknown,
  violations: ValidationError[],
  index: number,
  sink: DiagnosticSink,
): void {
  if (Array.isArray(value) && value.length === 0) return;
  sink.warn('BINDING_IGNORED', `Ignoring ${field}: ${constraintsOf(violations).join('; ')}`, index);
}

function readDuration(
  record: StatementRecord,
  field: 'elapsedTime' | 'cpuTime' | 'serviceTime',
  unit: DurationUnit,
  index: number,
  sink: DiagnosticSink,
): number {
  const value = parseDuration(record[field], unit);
  if (value === null) {
    sink.warn('METRIC_PARSE_FAILED', `Unparsable ${field} ${JSON.stringify(record[field])}, using 0`, index);
    return 0;
  }
  return value;
}

function readCount(
  record: StatementRecord,
  field: 'resultCount' | 'resultSize',
  index: number,
  sink: DiagnosticSink,
): number {
  const raw = record[field];
  if (raw === undefined || raw === null || raw === '') return 0;

  const value = typeof raw === 'number' ? raw : typeof raw === 'string' ? parseNumber(raw) : null;
  if (value === null || !Number.isFinite(value)) {
    sink.warn('METRIC_PARSE_FAILED', `Unparsable ${field} ${JSON.stringify(raw)}, using 0`, index);
    return 0;
  }
  return value;
}

export function measureRecord(record: StatementRecord, index: number, sink: DiagnosticSink): StatementMetrics {
  return {
    elapsedSeconds: readDuration(record, 'elapsedTime', 'seconds', index, sink),
    cpuMicroseconds: readDuration(record, 'cpuTime', 'microseconds', index, sink),
    serviceSeconds: readDuration(record, 'serviceTime', 'seconds', index, sink),
    resultCount: readCount(record, 'resultCount', index, sink),
    resultSizeBytes: readCount(record, 'resultSize', index, sink),
  };
}

/**
 * Validates the entries of a request log export. Entries that are not
 * objects or lack a string statement are skipped with a diagnostic; malformed
 * bindings are dropped and the entry is kept. A top level that is not a list
 * fails the whole input.
 */
export function loadStatementRecords(input: unknown, sink: DiagnosticSink): LoadedRecord[] {
  if (!Array.isArray(input)) {
    throw new StatementInputError('INPUT_NOT_A_LIST', 'Input JSON must be a list of objects');
  }

  const loaded: LoadedRecord[] = [];

  input.forEach((entry: unknown, index: number) => {
    if (!isPlainObject(entry)) {
      sink.warn('RECORD_SKIPPED', 'Skipping entry that is not an object', index);
      return;
    }

    const dto = plainToInstance(StatementRecordDto, entry);
    const violations = validateSync(dto);
    const violationsOf = (property: string) => violations.filter((v) => v.property === property);

    const statementViolations = violationsOf('statement');
    if (statementViolations.length > 0) {
      sink.warn('RECORD_SKIPPED', `Skipping entry: ${constraintsOf(statementViolations).join('; ')}`, index);
      return;
    }

    let positionalArgs = dto.positionalArgs ?? [];
    const positionalViolations = violationsOf('positionalArgs');
    if (positionalViolations.length > 0) {
      ignoreBinding('positionalArgs', entry.positionalArgs, positionalViolations, index, sink);
      positionalArgs = [];
    }

    let namedArgs = dto.namedArgs ?? {};
    const namedViolations = violationsOf('namedArgs');
    if (namedViolations.length > 0) {
      ignoreBinding('namedArgs', entry.namedArgs, namedViolations, index, sink);
      namedArgs = {};
    }

    const record: StatementRecord = { ...entry, statement: dto.statement };
    loaded.push({
      index,
      record,
      statement: cleanStatement(dto.statement),
      positionalArgs,
      namedArgs,
      metrics: measureRecord(record, index, sink),
    });
  });

  return loaded;
}
