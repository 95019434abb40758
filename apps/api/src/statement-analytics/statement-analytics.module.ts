import { Module } from '@nestjs/common';
import { StatementAnalyticsService } from './statement-analytics.service';
import { StatementAnalyticsController } from './statement-analytics.controller';

@Module({
  providers: [StatementAnalyticsService],
  controllers: [StatementAnalyticsController],
  exports: [StatementAnalyticsService],
})
export class StatementAnalyticsModule {}
