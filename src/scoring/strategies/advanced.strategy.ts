import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  AnalysisResult,
  DimensionScores,
  ExtractedInsights,
  ScoringContext,
  ScoringMode,
  ScoringStrategy,
} from '../interfaces/scoring.interface';
import { TEXT_GENERATION_PROVIDER } from '../interfaces/text-generation-provider.interface';
import type { TextGenerationProvider } from '../interfaces/text-generation-provider.interface';
import { runGenerationStage } from '../generation-stage';
import {
  buildExtractionPrompt,
  buildScoringPrompt,
  buildSynthesisPrompt,
} from '../prompts/advanced.prompts';
import {
  DimensionAssessment,
  DimensionAssessmentSchema,
  ExtractedInsightsSchema,
  SynthesisSchema,
} from '../schemas';
import {
  computeWeightedScore,
  DIMENSION_WEIGHTS,
  statusForScore,
} from '../dimension-weights';

/**
 * Extraction -> dimension scoring -> synthesis. Stages run strictly in
 * sequence; the first failing stage ends the analysis with no partial result.
 */
@Injectable()
export class AdvancedScoringStrategy implements ScoringStrategy {
  readonly mode = ScoringMode.ADVANCED;
  private readonly logger = new Logger(AdvancedScoringStrategy.name);

  constructor(
    @Inject(TEXT_GENERATION_PROVIDER)
    private readonly textGeneration: TextGenerationProvider,
  ) {}

  async score(context: ScoringContext, apiKey: string): Promise<AnalysisResult> {
    const insights: ExtractedInsights = await runGenerationStage(
      this.textGeneration,
      'extraction',
      buildExtractionPrompt(context),
      { temperature: 0.1, maxTokens: 800 },
      apiKey,
      ExtractedInsightsSchema,
    );

    const assessment = await runGenerationStage(
      this.textGeneration,
      'scoring',
      buildScoringPrompt(context.company, insights),
      { temperature: 0.1, maxTokens: 1000 },
      apiKey,
      DimensionAssessmentSchema,
    );

    const detailedScores = this.toDimensionScores(context.domain, assessment);
    const score = Math.round(detailedScores.weighted_score);
    const status = statusForScore(score);

    const synthesis = await runGenerationStage(
      this.textGeneration,
      'synthesis',
      buildSynthesisPrompt(
        context.domain,
        score,
        detailedScores,
        assessment.confidence,
        context.company,
      ),
      { temperature: 0.4, maxTokens: 2000 },
      apiKey,
      SynthesisSchema,
    );

    if (synthesis.status !== status) {
      this.logger.warn(
        `Synthesis status ${synthesis.status} disagrees with score ${score} for ${context.domain}; using ${status}`,
      );
    }

    return {
      score,
      status,
      reasoning: synthesis.reasoning,
      evidence: synthesis.evidence,
      recommendation: synthesis.recommendation,
      email_draft: synthesis.email_draft,
      detailed_scores: detailedScores,
      confidence: assessment.confidence,
      primary_trigger: synthesis.primary_trigger,
      approach_angle: synthesis.approach_angle,
    };
  }

  /** The weighted score is recomputed; the model's own sum is only compared. */
  private toDimensionScores(
    domain: string,
    assessment: DimensionAssessment,
  ): DimensionScores {
    const weighted = computeWeightedScore(assessment.scores);
    const reported = assessment.weighted_score;

    if (reported !== undefined && Math.abs(reported - weighted) > 1) {
      this.logger.warn(
        `Model reported weighted score ${reported} for ${domain}, recomputed ${weighted}`,
      );
    }

    return {
      scores: { ...assessment.scores },
      weights: { ...DIMENSION_WEIGHTS },
      weighted_score: weighted,
      ...(reported !== undefined ? { reported_weighted_score: reported } : {}),
    };
  }
}
