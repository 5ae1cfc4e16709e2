import { Inject, Injectable } from '@nestjs/common';
import {
  AnalysisResult,
  ScoringContext,
  ScoringMode,
  ScoringStrategy,
} from '../interfaces/scoring.interface';
import { TEXT_GENERATION_PROVIDER } from '../interfaces/text-generation-provider.interface';
import type { TextGenerationProvider } from '../interfaces/text-generation-provider.interface';
import { runGenerationStage } from '../generation-stage';
import { buildSimplePrompt } from '../prompts/simple.prompt';
import { SimpleVerdictSchema } from '../schemas';

/**
 * One-shot verdict. The GREEN/YELLOW/RED policy lives in the prompt; the
 * returned status is not reconciled against the score.
 */
@Injectable()
export class SimpleScoringStrategy implements ScoringStrategy {
  readonly mode = ScoringMode.SIMPLE;

  constructor(
    @Inject(TEXT_GENERATION_PROVIDER)
    private readonly textGeneration: TextGenerationProvider,
  ) {}

  async score(context: ScoringContext, apiKey: string): Promise<AnalysisResult> {
    const verdict = await runGenerationStage(
      this.textGeneration,
      'simple',
      buildSimplePrompt(context),
      { temperature: 0.3, maxTokens: 2000 },
      apiKey,
      SimpleVerdictSchema,
    );

    return {
      score: verdict.score,
      status: verdict.status,
      reasoning: verdict.reasoning,
      evidence: verdict.evidence,
      recommendation: verdict.recommendation,
      email_draft: verdict.email_draft,
    };
  }
}
