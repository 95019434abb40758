import { Body, Controller, HttpCode, HttpException, HttpStatus, Post } from '@nestjs/common';
import { ApiBody, ApiExtraModels, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { StatementAnalysisReport } from '@statement-insights/shared';
import { StatementAnalyticsService } from './statement-analytics.service';
import {
  ModeReportDto,
  StatementAnalysisReportDto,
  StatementRecordDto,
  SubstituteRequestDto,
  SubstituteResponseDto,
  TemplateRequestDto,
  TemplateResponseDto,
} from '../common/dto/statement-analytics.dto';

@ApiTags('statement-analytics')
@ApiExtraModels(ModeReportDto)
@Controller('statement-analytics')
export class StatementAnalyticsController {
  constructor(private readonly statementAnalyticsService: StatementAnalyticsService) {}

  @Post('analyze')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: 'Analyze a request log export',
    description: 'Groups the entries by statement and by template, with and without parameter values',
  })
  @ApiBody({ type: [StatementRecordDto] })
  @ApiResponse({ status: 200, description: 'Analysis report', type: StatementAnalysisReportDto })
  @ApiResponse({ status: 400, description: 'Body is not a list of entries' })
  analyze(@Body() body: unknown): StatementAnalysisReport {
    const result = this.statementAnalyticsService.analyze(body);
    if (result.status === 'failed') {
      throw new HttpException(
        { message: result.error, diagnostics: result.report.diagnostics },
        HttpStatus.BAD_REQUEST,
      );
    }
    return result.report;
  }

  @Post('template')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Replace the literal values of a statement with placeholders' })
  @ApiResponse({ status: 200, type: TemplateResponseDto })
  @ApiResponse({ status: 400, description: 'Missing statement' })
  template(@Body() dto: TemplateRequestDto): TemplateResponseDto {
    return { statement: dto.statement, template: this.statementAnalyticsService.template(dto.statement) };
  }

  @Post('substitute')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Replace the placeholders of a statement with bound values' })
  @ApiResponse({ status: 200, type: SubstituteResponseDto })
  @ApiResponse({ status: 400, description: 'Invalid statement or bindings' })
  substitute(@Body() dto: SubstituteRequestDto): SubstituteResponseDto {
    return this.statementAnalyticsService.substitute(dto.statement, dto.positionalArgs, dto.namedArgs);
  }
}
