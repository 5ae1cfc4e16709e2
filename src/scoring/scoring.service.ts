import { Injectable } from '@nestjs/common';
import {
  AnalysisResult,
  ScoringContext,
  ScoringMode,
  ScoringStrategy,
} from './interfaces/scoring.interface';
import { SimpleScoringStrategy } from './strategies/simple.strategy';
import { AdvancedScoringStrategy } from './strategies/advanced.strategy';

/** Dispatches to the strategy the caller selected; never chooses on its own. */
@Injectable()
export class ScoringService {
  constructor(
    private readonly simple: SimpleScoringStrategy,
    private readonly advanced: AdvancedScoringStrategy,
  ) {}

  score(
    mode: ScoringMode,
    context: ScoringContext,
    apiKey: string,
  ): Promise<AnalysisResult> {
    return this.strategyFor(mode).score(context, apiKey);
  }

  private strategyFor(mode: ScoringMode): ScoringStrategy {
    switch (mode) {
      case ScoringMode.SIMPLE:
        return this.simple;
      case ScoringMode.ADVANCED:
        return this.advanced;
    }
  }
}
