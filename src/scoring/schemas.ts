import { z } from 'zod';
import {
  BudgetStatus,
  Confidence,
  HiringGrowth,
  PrimaryTrigger,
} from './interfaces/scoring.interface';

const statusSchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(z.nativeEnum(BudgetStatus));

const confidenceSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.nativeEnum(Confidence));

const triggerSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.nativeEnum(PrimaryTrigger));

const hiringGrowthSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.nativeEnum(HiringGrowth));

const dimensionScore = z.number().finite().min(0).max(100);

export const SimpleVerdictSchema = z.object({
  score: z
    .number()
    .finite()
    .transform((value) => Math.min(100, Math.max(0, Math.round(value)))),
  status: statusSchema,
  reasoning: z.string().default(''),
  evidence: z.array(z.string()).default([]),
  recommendation: z.string().default(''),
  email_draft: z.string().default(''),
});
export type SimpleVerdict = z.infer<typeof SimpleVerdictSchema>;

export const ExtractedInsightsSchema = z.object({
  funding: z.object({
    months_since_last_round: z
      .number()
      .finite()
      .nonnegative()
      .nullable()
      .default(null),
    last_round: z.string().nullable().default(null),
  }),
  hiring: z.object({
    growth: hiringGrowthSchema,
    sales_roles_open: z.boolean().default(false),
    non_sales_roles_open: z.boolean().default(false),
  }),
  tech_stack: z.object({
    recent_change: z.boolean().default(false),
    modern: z.boolean().default(false),
    legacy_heavy: z.boolean().default(false),
    technologies: z.array(z.string()).default([]),
  }),
  expansion_signals: z.array(z.string()).default([]),
});

export const DimensionAssessmentSchema = z.object({
  scores: z.object({
    timing: dimensionScore,
    growth: dimensionScore,
    tech_modernization: dimensionScore,
    company_size: dimensionScore,
    budget_availability: dimensionScore,
  }),
  weighted_score: z.number().finite().optional(),
  confidence: confidenceSchema,
});
export type DimensionAssessment = z.infer<typeof DimensionAssessmentSchema>;

export const SynthesisSchema = z.object({
  status: statusSchema,
  reasoning: z.string().min(1),
  primary_trigger: triggerSchema,
  approach_angle: z.string().min(1),
  evidence: z.array(z.string()).min(1),
  recommendation: z.string().min(1),
  email_draft: z.string().min(1),
});
export type Synthesis = z.infer<typeof SynthesisSchema>;
