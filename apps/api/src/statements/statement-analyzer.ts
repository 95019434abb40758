import {
  ModeReport,
  ProcessingMode,
  StatementAnalysisReport,
} from '@statement-insights/shared';
import { DiagnosticsCollector, DiagnosticSink } from './diagnostics';
import { substituteNamed, substitutePositional } from './parameter-substitution';
import { AggregationEntry, groupByStatement, groupByTemplate } from './statement-aggregator';
import { LoadedRecord, loadStatementRecords } from './statement-loader';
import { TemplateBuilder } from './template-builder';

export interface AnalyzeOptions {
  diagnostics: DiagnosticsCollector;
  builder?: TemplateBuilder;
  source?: string | null;
}

export interface Bindings {
  positionalArgs: unknown[];
  namedArgs: Record<string, unknown>;
}

/** Statement with its placeholders replaced by the bound values. Positional first, then named. */
export function valueStatement(
  statement: string,
  bindings: Bindings,
  sink: DiagnosticSink,
  recordIndex?: number,
): string {
  let valued = statement;
  if (bindings.positionalArgs.length > 0) {
    valued = substitutePositional(valued, bindings.positionalArgs, sink, recordIndex);
  }
  if (Object.keys(bindings.namedArgs).length > 0) {
    valued = substituteNamed(valued, bindings.namedArgs, sink, recordIndex);
  }
  return valued;
}

function buildModeReport(
  mode: ProcessingMode,
  loaded: LoadedRecord[],
  statements: string[],
  builder: TemplateBuilder,
): ModeReport {
  const entries: AggregationEntry[] = loaded.map((item, i) => ({
    requestTime: item.record.requestTime,
    statement: statements[i],
    metrics: item.metrics,
  }));

  return {
    mode,
    records: loaded.map((item, i) => ({ ...item.record, statement: statements[i] })),
    byStatement: groupByStatement(entries),
    byTemplate: groupByTemplate(entries, (statement) => builder.build(statement)),
  };
}

export function emptyReport(source: string | null, diagnostics: DiagnosticsCollector): StatementAnalysisReport {
  const empty = (mode: ProcessingMode): ModeReport => ({ mode, records: [], byStatement: [], byTemplate: [] });
  return {
    source,
    analyzedAt: Date.now(),
    totalEntries: 0,
    processedEntries: 0,
    skippedEntries: 0,
    modes: { parametrized: empty('parametrized'), valued: empty('valued') },
    diagnostics: diagnostics.list(),
  };
}

/**
 * Runs the whole pipeline over a parsed request log export: validation,
 * substitution for the valued mode, and grouping by statement and template
 * for both modes. Throws StatementInputError when the input is not a list.
 */
export function analyzeStatementRecords(input: unknown, options: AnalyzeOptions): StatementAnalysisReport {
  const { diagnostics } = options;
  const builder = options.builder ?? new TemplateBuilder();

  const loaded = loadStatementRecords(input, diagnostics);
  const totalEntries = Array.isArray(input) ? input.length : 0;

  const parametrized = loaded.map((item) => item.statement);
  const valued = loaded.map((item) => valueStatement(item.statement, item, diagnostics, item.index));

  return {
    source: options.source ?? null,
    analyzedAt: Date.now(),
    totalEntries,
    processedEntries: loaded.length,
    skippedEntries: totalEntries - loaded.length,
    modes: {
      parametrized: buildModeReport('parametrized', loaded, parametrized, builder),
      valued: buildModeReport('valued', loaded, valued, builder),
    },
    diagnostics: diagnostics.list(),
  };
}
