import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { MarketSignalsService } from './market-signals.service';
import { TavilyProvider } from './providers/tavily.provider';
import { SEARCH_PROVIDER } from './interfaces/search-provider.interface';

@Module({
  imports: [ConfigModule],
  providers: [
    MarketSignalsService,
    {
      provide: SEARCH_PROVIDER,
      useClass: TavilyProvider,
    },
  ],
  exports: [MarketSignalsService],
})
export class SignalsModule {}
