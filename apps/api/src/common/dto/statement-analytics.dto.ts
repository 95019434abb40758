import { ApiProperty, ApiPropertyOptional, getSchemaPath } from '@nestjs/swagger';
import { IsArray, IsNotEmpty, IsObject, IsOptional, IsString } from 'class-validator';
import type {
  Diagnostic,
  DiagnosticCode,
  DiagnosticLevel,
  ModeReport,
  ProcessingMode,
  StatementAnalysisReport,
  StatementGroupSummary,
  StatementRecord,
} from '@statement-insights/shared';

/**
 * Shape check for one uploaded request-log entry. Fields other than the
 * statement and its bindings are not inspected.
 */
export class StatementRecordDto {
  @ApiProperty({ description: 'Statement text as executed', example: 'SELECT * FROM users WHERE id = $1' })
  @IsString()
  statement!: string;

  @ApiPropertyOptional({ description: 'Positional parameter values ($1, $2, ...)', type: [Object], example: [42] })
  @IsOptional()
  @IsArray()
  positionalArgs?: unknown[];

  @ApiPropertyOptional({
    description: 'Named parameter values, keyed with the $ sigil',
    type: 'object',
    additionalProperties: true,
    example: { $name: 'alice' },
  })
  @IsOptional()
  @IsObject()
  namedArgs?: Record<string, unknown>;
}

export class TemplateRequestDto {
  @ApiProperty({ description: 'Statement to template', example: "SELECT * FROM users WHERE name = 'alice'" })
  @IsString()
  @IsNotEmpty()
  statement!: string;
}

export class TemplateResponseDto {
  @ApiProperty({ example: "SELECT * FROM users WHERE name = 'alice'" })
  statement!: string;

  @ApiProperty({ example: 'SELECT * FROM users WHERE name = ?' })
  template!: string;
}

export class SubstituteRequestDto extends StatementRecordDto {}

export class DiagnosticDto implements Diagnostic {
  @ApiProperty({ enum: ['warn', 'error'], example: 'warn' })
  level!: DiagnosticLevel;

  @ApiProperty({ description: 'Diagnostic code', example: 'NAMED_ARG_MISSING' })
  code!: DiagnosticCode;

  @ApiProperty({ example: "Named argument '$name' not found in provided arguments" })
  message!: string;

  @ApiPropertyOptional({ description: 'Index of the record in the input list', example: 3 })
  recordIndex?: number;
}

export class SubstituteResponseDto {
  @ApiProperty({ example: 'SELECT * FROM users WHERE id = $1' })
  statement!: string;

  @ApiProperty({ example: 'SELECT * FROM users WHERE id = 42' })
  valued!: string;

  @ApiProperty({ type: [DiagnosticDto] })
  diagnostics!: Diagnostic[];
}

export class StatementGroupSummaryDto implements StatementGroupSummary {
  @ApiProperty({ description: 'requestTime of the first record in the group', nullable: true, type: String })
  representativeTime!: string | null;

  @ApiProperty({ description: 'Statement text or template the group is keyed on' })
  key!: string;

  @ApiProperty({ example: 0.25 })
  avgElapsedSeconds!: number;

  @ApiProperty({ example: 1.5 })
  totalElapsedSeconds!: number;

  @ApiProperty({ example: 1200 })
  avgCpuMicroseconds!: number;

  @ApiProperty({ example: 0.24 })
  avgServiceSeconds!: number;

  @ApiProperty({ example: 10 })
  avgResultCount!: number;

  @ApiProperty({ example: 2048 })
  avgResultSizeBytes!: number;

  @ApiProperty({ example: 6 })
  count!: number;

  @ApiPropertyOptional({ description: 'First raw statement of a template group' })
  exampleStatement?: string;
}

export class ModeReportDto implements ModeReport {
  @ApiProperty({ enum: ['parametrized', 'valued'] })
  mode!: ProcessingMode;

  @ApiProperty({ description: 'Input records with the processed statement', type: [Object] })
  records!: StatementRecord[];

  @ApiProperty({ type: [StatementGroupSummaryDto] })
  byStatement!: StatementGroupSummary[];

  @ApiProperty({ type: [StatementGroupSummaryDto] })
  byTemplate!: StatementGroupSummary[];
}

export class StatementAnalysisReportDto implements StatementAnalysisReport {
  @ApiProperty({ description: 'Input file, when analyzing a file', nullable: true, type: String })
  source!: string | null;

  @ApiProperty({ description: 'Unix timestamp in milliseconds' })
  analyzedAt!: number;

  @ApiProperty()
  totalEntries!: number;

  @ApiProperty()
  processedEntries!: number;

  @ApiProperty()
  skippedEntries!: number;

  @ApiProperty({
    type: 'object',
    properties: {
      parametrized: { $ref: getSchemaPath(ModeReportDto) },
      valued: { $ref: getSchemaPath(ModeReportDto) },
    },
  })
  modes!: Record<ProcessingMode, ModeReport>;

  @ApiProperty({ type: [DiagnosticDto] })
  diagnostics!: Diagnostic[];
}
