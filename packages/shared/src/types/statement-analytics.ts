/**
 * One entry of a request log export. Only `statement` is required; every
 * other field is carried through to the processed record as-is.
 */
export interface StatementRecord {
  statement: string;
  requestTime?: unknown;
  elapsedTime?: unknown;
  cpuTime?: unknown;
  serviceTime?: unknown;
  resultCount?: unknown;
  resultSize?: unknown;
  positionalArgs?: unknown;
  namedArgs?: unknown;
  [field: string]: unknown;
}

export type ProcessingMode = 'parametrized' | 'valued';

export interface StatementMetrics {
  elapsedSeconds: number;
  cpuMicroseconds: number;
  serviceSeconds: number;
  resultCount: number;
  resultSizeBytes: number;
}

export interface StatementGroupSummary {
  representativeTime: string | null;
  key: string;
  avgElapsedSeconds: number;
  totalElapsedSeconds: number;
  avgCpuMicroseconds: number;
  avgServiceSeconds: number;
  avgResultCount: number;
  avgResultSizeBytes: number;
  count: number;
  exampleStatement?: string;
}

export interface ModeReport {
  mode: ProcessingMode;
  records: StatementRecord[];
  byStatement: StatementGroupSummary[];
  byTemplate: StatementGroupSummary[];
}

export type DiagnosticLevel = 'warn' | 'error';

export type DiagnosticCode =
  | 'RECORD_SKIPPED'
  | 'BINDING_IGNORED'
  | 'INPUT_NOT_A_LIST'
  | 'FILE_UNREADABLE'
  | 'FILE_INVALID_JSON'
  | 'POSITIONAL_INDEX_OUT_OF_RANGE'
  | 'POSITIONAL_INDEX_INVALID'
  | 'NAMED_ARG_MISSING'
  | 'METRIC_PARSE_FAILED';

export interface Diagnostic {
  level: DiagnosticLevel;
  code: DiagnosticCode;
  message: string;
  recordIndex?: number;
}

export interface StatementAnalysisReport {
  source: string | null;
  analyzedAt: number;
  totalEntries: number;
  processedEntries: number;
  skippedEntries: number;
  modes: Record<ProcessingMode, ModeReport>;
  diagnostics: Diagnostic[];
}

export type StatementAnalysisResult =
  | { status: 'completed'; report: StatementAnalysisReport }
  | { status: 'failed'; error: string; report: StatementAnalysisReport };
