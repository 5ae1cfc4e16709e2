import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { EnrichmentService } from './enrichment.service';
import { MockEnrichmentProvider } from './providers/mock.provider';
import { FullEnrichProvider } from './providers/fullenrich.provider';
import { ENRICHMENT_PROVIDER } from './interfaces/enrichment-provider.interface';

@Module({
  imports: [ConfigModule],
  providers: [
    EnrichmentService,
    MockEnrichmentProvider,
    FullEnrichProvider,
    {
      provide: ENRICHMENT_PROVIDER,
      useFactory: (
        configService: ConfigService,
        mock: MockEnrichmentProvider,
        fullEnrich: FullEnrichProvider,
      ) => {
        const provider = configService.get<string>(
          'ENRICHMENT_PROVIDER',
          'FULLENRICH',
        );

        switch (provider.toUpperCase()) {
          case 'MOCK':
            return mock;
          case 'FULLENRICH':
          default:
            return fullEnrich;
        }
      },
      inject: [ConfigService, MockEnrichmentProvider, FullEnrichProvider],
    },
  ],
  exports: [EnrichmentService],
})
export class EnrichmentModule {}
