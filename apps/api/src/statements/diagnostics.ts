import { Logger, LoggerService } from '@nestjs/common';
import { Diagnostic, DiagnosticCode } from '@statement-insights/shared';

export interface DiagnosticSink {
  warn(code: DiagnosticCode, message: string, recordIndex?: number): void;
  error(code: DiagnosticCode, message: string, recordIndex?: number): void;
}

/**
 * Collects the diagnostics of a single analysis run and mirrors each one
 * to the application logger. One collector per run; never shared.
 */
export class DiagnosticsCollector implements DiagnosticSink {
  private readonly events: Diagnostic[] = [];

  constructor(private readonly logger: Pick<LoggerService, 'warn' | 'error'> = new Logger(DiagnosticsCollector.name)) {}

  warn(code: DiagnosticCode, message: string, recordIndex?: number): void {
    this.push({ level: 'warn', code, message }, recordIndex);
    this.logger.warn(this.format(code, message, recordIndex));
  }

  error(code: DiagnosticCode, message: string, recordIndex?: number): void {
    this.push({ level: 'error', code, message }, recordIndex);
    this.logger.error(this.format(code, message, recordIndex));
  }

  list(): Diagnostic[] {
    return [...this.events];
  }

  count(code?: DiagnosticCode): number {
    return code ? this.events.filter((e) => e.code === code).length : this.events.length;
  }

  private push(event: Diagnostic, recordIndex?: number): void {
    this.events.push(recordIndex === undefined ? event : { ...event, recordIndex });
  }

  private format(code: DiagnosticCode, message: string, recordIndex?: number): string {
    return recordIndex === undefined ? `[${code}] ${message}` : `[${code}] record ${recordIndex}: ${message}`;
  }
}

/** Sink that drops everything, for callers that only want the transformed text. */
export const silentSink: DiagnosticSink = {
  warn: () => undefined,
  error: () => undefined,
};
