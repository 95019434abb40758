import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Diagnostic, StatementAnalysisResult } from '@statement-insights/shared';
import { AnalysisConfig } from '../config/configuration';
import { DiagnosticsCollector } from '../statements/diagnostics';
import { analyzeStatementRecords, emptyReport, valueStatement } from '../statements/statement-analyzer';
import { cleanStatement, readStatementFile, StatementInputError } from '../statements/statement-loader';
import { ReservedKeywords } from '../statements/reserved-keywords';
import { TemplateBuilder } from '../statements/template-builder';

export interface SubstitutionResult {
  statement: string;
  valued: string;
  diagnostics: Diagnostic[];
}

@Injectable()
export class StatementAnalyticsService {
  private readonly logger = new Logger(StatementAnalyticsService.name);
  private readonly builder: TemplateBuilder;

  constructor(private readonly configService: ConfigService) {
    const analysis = this.configService.get<AnalysisConfig>('analysis');
    const keywords = ReservedKeywords.defaults().extend(analysis?.reservedKeywords ?? []);
    this.builder = new TemplateBuilder(keywords);
    this.logger.debug(`Template builder ready with ${keywords.size} reserved keywords`);
  }

  /** Analyzes an already parsed request log export. */
  analyze(input: unknown, source: string | null = null): StatementAnalysisResult {
    const diagnostics = new DiagnosticsCollector(this.logger);
    try {
      const report = analyzeStatementRecords(input, { diagnostics, builder: this.builder, source });
      this.logger.log(
        `Analyzed ${report.processedEntries}/${report.totalEntries} entries ` +
          `(${report.modes.parametrized.byStatement.length} statements, ` +
          `${report.modes.parametrized.byTemplate.length} templates, ` +
          `${report.diagnostics.length} diagnostics)`,
      );
      return { status: 'completed', report };
    } catch (error) {
      return this.fail(error, source, diagnostics);
    }
  }

  analyzeFile(filePath: string): StatementAnalysisResult {
    let input: unknown;
    try {
      input = readStatementFile(filePath);
    } catch (error) {
      return this.fail(error, filePath, new DiagnosticsCollector(this.logger));
    }
    return this.analyze(input, filePath);
  }

  template(statement: string): string {
    return this.builder.build(cleanStatement(statement));
  }

  substitute(
    statement: string,
    positionalArgs: unknown[] = [],
    namedArgs: Record<string, unknown> = {},
  ): SubstitutionResult {
    const diagnostics = new DiagnosticsCollector(this.logger);
    const valued = valueStatement(cleanStatement(statement), { positionalArgs, namedArgs }, diagnostics);
    return { statement, valued, diagnostics: diagnostics.list() };
  }

  private fail(error: unknown, source: string | null, diagnostics: DiagnosticsCollector): StatementAnalysisResult {
    if (!(error instanceof StatementInputError)) {
      throw error;
    }
    diagnostics.error(error.code, error.message);
    return { status: 'failed', error: error.message, report: emptyReport(source, diagnostics) };
  }
}
