import { z } from 'zod';

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

export const EnvSchema = z.object({
  PORT: positiveInt(3000),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  ENRICHMENT_PROVIDER: z
    .string()
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(['FULLENRICH', 'MOCK']))
    .default('FULLENRICH'),
  FULLENRICH_BASE_URL: z.string().url().default('https://api.fullenrich.com/v1'),
  ENRICHMENT_TIMEOUT_MS: positiveInt(30_000),

  TAVILY_BASE_URL: z.string().url().default('https://api.tavily.com'),
  SEARCH_TIMEOUT_MS: positiveInt(30_000),
  SIGNAL_MAX_RESULTS: z.coerce.number().int().min(1).max(20).default(3),

  TEXT_GENERATION_PROVIDER: z
    .string()
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(['GROQ', 'GEMINI']))
    .default('GROQ'),
  GROQ_BASE_URL: z.string().url().default('https://api.groq.com/openai/v1'),
  GROQ_MODEL: z.string().min(1).default('llama-3.3-70b-versatile'),
  GEMINI_MODEL: z.string().min(1).default('gemini-2.0-flash'),
  GENERATION_TIMEOUT_MS: positiveInt(60_000),
});

/**
 * Passed to `ConfigModule.forRoot({ validate })`. Unknown variables are kept
 * so the rest of the process environment stays readable through ConfigService.
 */
export function validateEnv(config: Record<string, unknown>): Record<string, unknown> {
  const result = EnvSchema.passthrough().safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return result.data;
}
