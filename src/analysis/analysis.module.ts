import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { metricsProviders } from '../common/metrics.providers';
import { EnrichmentModule } from '../enrichment/enrichment.module';
import { SignalsModule } from '../signals/signals.module';
import { ScoringModule } from '../scoring/scoring.module';
import { AnalysisService } from './analysis.service';
import { AnalysisController } from './analysis.controller';
import { AnalysisExceptionFilter } from './filters/analysis-exception.filter';

@Module({
  imports: [EnrichmentModule, SignalsModule, ScoringModule],
  controllers: [AnalysisController],
  providers: [
    AnalysisService,
    {
      provide: APP_FILTER,
      useClass: AnalysisExceptionFilter,
    },
    ...metricsProviders,
  ],
  exports: [AnalysisService],
})
export class AnalysisModule {}
