import { z } from 'zod';
import type { TextGenerationProvider } from './interfaces/text-generation-provider.interface';
import {
  ScoringContractError,
  ScoringStage,
  TransportError,
} from '../common/errors/analysis.errors';
import { Dependency } from '../common/errors/dependency';
import { parseJsonEnvelope } from './json-envelope';

export interface StagePrompt {
  system: string;
  user: string;
}

export interface StageSettings {
  temperature: number;
  maxTokens: number;
}

/** Reads a model response as the JSON contract of `stage`. */
export function parseContract<S extends z.ZodTypeAny>(
  text: string,
  schema: S,
  stage: ScoringStage,
): z.output<S> {
  let raw: unknown;
  try {
    raw = parseJsonEnvelope(text);
  } catch (error: unknown) {
    throw new ScoringContractError(
      stage,
      error instanceof Error ? error.message : 'unreadable response',
    );
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ScoringContractError(stage, issues);
  }
  return result.data;
}

/**
 * One text-generation call followed by contract parsing. Transport failures
 * and contract failures are both fatal for the analysis.
 */
export async function runGenerationStage<S extends z.ZodTypeAny>(
  provider: TextGenerationProvider,
  stage: ScoringStage,
  prompt: StagePrompt,
  settings: StageSettings,
  apiKey: string,
  schema: S,
): Promise<z.output<S>> {
  let text: string;
  try {
    text = await provider.generate({ ...prompt, ...settings, apiKey });
  } catch (error: unknown) {
    throw TransportError.from(Dependency.TEXT_GENERATION, error, stage);
  }
  return parseContract(text, schema, stage);
}
