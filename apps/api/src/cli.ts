#!/usr/bin/env node
import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { Command } from 'commander';
import { AppModule } from './app.module';
import configuration from './config/configuration';
import { StatementAnalyticsService } from './statement-analytics/statement-analytics.service';
import { AnalyzeCommandOptions, parsePositiveInt, runAnalyzeCommand } from './cli/analyze-command';

const program = new Command();

program
  .name('statement-insights')
  .description('Group recorded query executions by statement and template to find slow queries')
  .version('0.1.0');

program
  .command('analyze')
  .description('Analyze a request log export (JSON list of entries) and write a JSON report')
  .argument('<input>', 'path to the JSON export')
  .option('-o, --output <file>', 'report path (default: output_<input name>.json)')
  .option('-t, --top <n>', 'number of template groups to log per mode', parsePositiveInt, 10)
  .action(async (input: string, options: AnalyzeCommandOptions) => {
    const app = await NestFactory.createApplicationContext(AppModule, {
      logger: configuration().logLevels,
    });
    try {
      process.exitCode = runAnalyzeCommand(app.get(StatementAnalyticsService), input, options);
    } finally {
      await app.close();
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  new Logger('Cli').error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
