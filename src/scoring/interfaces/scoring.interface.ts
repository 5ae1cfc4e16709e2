import type { CompanyRecord } from '../../enrichment/interfaces/enrichment-provider.interface';
import type { SignalBundle } from '../../signals/signal-topics';

export enum ScoringMode {
  SIMPLE = 'simple',
  ADVANCED = 'advanced',
}

export enum BudgetStatus {
  GREEN = 'GREEN',
  YELLOW = 'YELLOW',
  RED = 'RED',
}

export enum Confidence {
  HIGH = 'high',
  MEDIUM = 'medium',
  LOW = 'low',
}

export enum PrimaryTrigger {
  FUNDING = 'funding',
  HIRING = 'hiring',
  TECH_DEBT = 'tech_debt',
  EXPANSION = 'expansion',
}

export enum HiringGrowth {
  EXPANDING = 'expanding',
  STABLE = 'stable',
  CONTRACTING = 'contracting',
}

export type ScoringDimension =
  | 'timing'
  | 'growth'
  | 'tech_modernization'
  | 'company_size'
  | 'budget_availability';

export interface DimensionScores {
  scores: Record<ScoringDimension, number>;
  weights: Record<ScoringDimension, number>;
  /** Σ score × weight, computed server-side and unrounded. */
  weighted_score: number;
  /** The model's own arithmetic, kept for comparison only. */
  reported_weighted_score?: number;
}

export interface ExtractedInsights {
  funding: {
    months_since_last_round: number | null;
    last_round: string | null;
  };
  hiring: {
    growth: HiringGrowth;
    sales_roles_open: boolean;
    non_sales_roles_open: boolean;
  };
  tech_stack: {
    recent_change: boolean;
    modern: boolean;
    legacy_heavy: boolean;
    technologies: string[];
  };
  expansion_signals: string[];
}

export interface AnalysisResult {
  score: number;
  status: BudgetStatus;
  reasoning: string;
  evidence: string[];
  recommendation: string;
  email_draft: string;
  // Advanced mode only
  detailed_scores?: DimensionScores;
  confidence?: Confidence;
  primary_trigger?: PrimaryTrigger;
  approach_angle?: string;
}

/** Everything the orchestrator gathered; either side may be absent. */
export interface ScoringContext {
  domain: string;
  company: CompanyRecord | null;
  signals: SignalBundle | null;
}

export interface ScoringStrategy {
  readonly mode: ScoringMode;
  score(context: ScoringContext, apiKey: string): Promise<AnalysisResult>;
}
