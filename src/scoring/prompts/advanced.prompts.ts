import type { StagePrompt } from '../generation-stage';
import type {
  Confidence,
  DimensionScores,
  ExtractedInsights,
  ScoringContext,
} from '../interfaces/scoring.interface';
import type { CompanyRecord } from '../../enrichment/interfaces/enrichment-provider.interface';
import { snapshotCompany } from '../../enrichment/company-record';
import { statusForScore } from '../dimension-weights';

/** Characters of the company record handed to the synthesis stage. */
export const COMPANY_SNAPSHOT_LIMIT = 1500;

export const DIMENSION_RUBRIC = `RUBRIC (apply exactly):
- timing: funding <3 months ago -> 100; 3-6 months -> 80; 6-12 months -> 60; >12 months -> 30; unknown -> 50
- growth: active sales hiring AND expansion -> 100; active non-sales hiring -> 70; stable -> 50; contracting -> 20
- tech_modernization: recent stack change -> 90; modern stack -> 70; mixed -> 50; legacy-heavy -> 30
- company_size: 50-500 employees -> 100; 500-2000 -> 80; 2000-5000 -> 60; otherwise -> 40
- budget_availability: recent funding AND hiring -> 100; funding OR hiring -> 70; stable revenue only -> 50; no signal -> 30

WEIGHTS: timing 0.30, growth 0.25, tech_modernization 0.20, company_size 0.15, budget_availability 0.10
weighted_score = sum of (dimension score x weight)`;

const JSON_ONLY = 'Respond with a single JSON object and nothing else.';

export function buildExtractionPrompt(context: ScoringContext): StagePrompt {
  const signals = context.signals
    ? JSON.stringify(context.signals, null, 2)
    : 'NOT_AVAILABLE';

  return {
    system: `You are a market research analyst who turns raw web search results into structured facts. Only report what the results support. ${JSON_ONLY}`,
    user: `Extract buying signals for ${context.domain} from these search results, grouped by topic (funding, hiring, tech_stack):

${signals}

Return this exact structure:
{
  "funding": {
    "months_since_last_round": <number of months since the most recent funding round, or null if unknown>,
    "last_round": "<round name and amount, or null>"
  },
  "hiring": {
    "growth": "<expanding|stable|contracting>",
    "sales_roles_open": <true if sales or revenue roles are being hired>,
    "non_sales_roles_open": <true if other roles are being hired>
  },
  "tech_stack": {
    "recent_change": <true if a migration or new platform adoption is reported>,
    "modern": <true if the stack is predominantly modern/cloud-native>,
    "legacy_heavy": <true if legacy systems dominate>,
    "technologies": ["<technology>", "..."]
  },
  "expansion_signals": ["<new market, office, product line or acquisition>", "..."]
}

Use "contracting" only for layoffs, hiring freezes or closures. ${JSON_ONLY}`,
  };
}

export function buildScoringPrompt(
  company: CompanyRecord | null,
  insights: ExtractedInsights,
): StagePrompt {
  return {
    system: `You are a B2B budget analyst. Score the company on five dimensions using the rubric exactly as written. ${JSON_ONLY}`,
    user: `COMPANY RECORD:
${company ? JSON.stringify(company, null, 2) : 'NOT_AVAILABLE'}

EXTRACTED INSIGHTS:
${JSON.stringify(insights, null, 2)}

${DIMENSION_RUBRIC}

Return this exact structure:
{
  "scores": {
    "timing": <0-100>,
    "growth": <0-100>,
    "tech_modernization": <0-100>,
    "company_size": <0-100>,
    "budget_availability": <0-100>
  },
  "weighted_score": <number>,
  "confidence": "<high|medium|low>"
}

Set confidence to "low" when most dimensions fell back to their unknown/no-signal value. ${JSON_ONLY}`,
  };
}

export function buildSynthesisPrompt(
  domain: string,
  score: number,
  detailedScores: DimensionScores,
  confidence: Confidence,
  company: CompanyRecord | null,
): StagePrompt {
  return {
    system: `You are a senior enterprise sales strategist. Turn a scored budget assessment into a concise verdict and a personalised outreach email. ${JSON_ONLY}`,
    user: `TARGET: ${domain}
BUDGET WINDOW SCORE: ${score} (status must be ${statusForScore(score)})
STATUS THRESHOLDS: GREEN >= 70, YELLOW 40-69, RED < 40
CONFIDENCE: ${confidence}

DIMENSION SCORES:
${JSON.stringify(detailedScores.scores, null, 2)}

COMPANY SNAPSHOT:
${snapshotCompany(company, COMPANY_SNAPSHOT_LIMIT)}

Return this exact structure:
{
  "status": "<GREEN|YELLOW|RED>",
  "reasoning": "<2-3 sentences tying the score to the strongest dimensions>",
  "primary_trigger": "<funding|hiring|tech_debt|expansion>",
  "approach_angle": "<one sentence on how to open the conversation>",
  "evidence": ["<claim 1>", "<claim 2>", "<claim 3>"],
  "recommendation": "<next action for the account executive>",
  "email_draft": "<personalised outreach email under 150 words>"
}

${JSON_ONLY}`,
  };
}
