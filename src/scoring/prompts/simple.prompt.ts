import type { StagePrompt } from '../generation-stage';
import type { ScoringContext } from '../interfaces/scoring.interface';

export const SIMPLE_SCORING_POLICY = `SCORING LOGIC:
- GREEN (70-100): Recent funding (<6 months) OR active hiring OR expansion signals
- YELLOW (40-69): Stable company, potential tech renewal, moderate signals
- RED (0-39): No recent activity, risk signals, or stagnant`;

export function buildSimplePrompt(context: ScoringContext): StagePrompt {
  const payload = {
    domain: context.domain,
    company_info: context.company,
    market_signals: context.signals,
  };

  const user = `You are a sales intelligence AI. Analyze this company data and return ONLY a JSON object with this exact structure:

{
    "score": <number 0-100>,
    "status": "<GREEN|YELLOW|RED>",
    "reasoning": "<2-3 sentence explanation>",
    "evidence": ["<bullet point 1>", "<bullet point 2>", "<bullet point 3>"],
    "recommendation": "<action to take>",
    "email_draft": "<personalized outreach email>"
}

${SIMPLE_SCORING_POLICY}

COMPANY DATA:
${JSON.stringify(payload, null, 2)}

Return ONLY the JSON object, no other text.`;

  return {
    system:
      'You are a sales intelligence expert. Always respond with valid JSON only.',
    user,
  };
}
