import { Logger, LoggerService } from '@nestjs/common';
import { InvalidArgumentError } from 'commander';
import { writeFileSync } from 'fs';
import { basename, extname, resolve } from 'path';
import { StatementAnalysisReport, StatementGroupSummary } from '@statement-insights/shared';
import { StatementAnalyticsService } from '../statement-analytics/statement-analytics.service';

export interface AnalyzeCommandOptions {
  output?: string;
  top: number;
}

/** `output_<name>.json` in the working directory for input `<dir>/<name>.<ext>`. */
export function defaultOutputPath(inputPath: string): string {
  const name = basename(inputPath, extname(inputPath));
  return resolve(process.cwd(), `output_${name}.json`);
}

export function parsePositiveInt(value: string): number {
  const parsed = parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError(`Expected a positive integer, got "${value}".`);
  }
  return parsed;
}

export function formatGroupLine(rank: number, group: StatementGroupSummary): string {
  return (
    `${rank}. total=${group.totalElapsedSeconds.toFixed(3)}s ` +
    `avg=${group.avgElapsedSeconds.toFixed(3)}s ` +
    `count=${group.count} ${group.key}`
  );
}

export function summarizeReport(report: StatementAnalysisReport, top: number): string[] {
  const lines: string[] = [];
  for (const mode of [report.modes.parametrized, report.modes.valued]) {
    lines.push(`Top ${mode.mode} templates:`);
    mode.byTemplate.slice(0, top).forEach((group, i) => lines.push(formatGroupLine(i + 1, group)));
  }
  return lines;
}

/**
 * Analyzes `inputPath` and writes the report as JSON. Returns the process
 * exit code: 1 when the file could not be analyzed or held no usable entry.
 */
export function runAnalyzeCommand(
  service: StatementAnalyticsService,
  inputPath: string,
  options: AnalyzeCommandOptions,
  logger: Pick<LoggerService, 'log' | 'error'> = new Logger('AnalyzeCommand'),
): number {
  const result = service.analyzeFile(inputPath);
  if (result.status === 'failed') {
    logger.error(`Analysis of ${inputPath} failed: ${result.error}`);
    return 1;
  }

  const { report } = result;
  if (report.processedEntries === 0) {
    logger.error('No items to process');
    return 1;
  }

  const outputPath = options.output ? resolve(options.output) : defaultOutputPath(inputPath);
  writeFileSync(outputPath, JSON.stringify(report, null, 2));

  for (const line of summarizeReport(report, options.top)) {
    logger.log(line);
  }
  logger.log(`Results written to ${outputPath}`);
  return 0;
}
