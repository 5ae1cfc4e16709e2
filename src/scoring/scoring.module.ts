import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScoringService } from './scoring.service';
import { SimpleScoringStrategy } from './strategies/simple.strategy';
import { AdvancedScoringStrategy } from './strategies/advanced.strategy';
import { GroqProvider } from './providers/groq.provider';
import { GeminiProvider } from './providers/gemini.provider';
import { TEXT_GENERATION_PROVIDER } from './interfaces/text-generation-provider.interface';

@Module({
  imports: [ConfigModule],
  providers: [
    ScoringService,
    SimpleScoringStrategy,
    AdvancedScoringStrategy,
    GroqProvider,
    GeminiProvider,
    {
      provide: TEXT_GENERATION_PROVIDER,
      useFactory: (
        configService: ConfigService,
        groq: GroqProvider,
        gemini: GeminiProvider,
      ) => {
        const provider = configService.get<string>(
          'TEXT_GENERATION_PROVIDER',
          'GROQ',
        );
        return provider.toUpperCase() === 'GEMINI' ? gemini : groq;
      },
      inject: [ConfigService, GroqProvider, GeminiProvider],
    },
  ],
  exports: [ScoringService],
})
export class ScoringModule {}
