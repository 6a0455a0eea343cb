import { z } from 'zod';

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false', '1', '0'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true' || value === '1');

export const agentConfigSchema = z
  .object({
    AGENT_PORT: z.coerce.number().int().positive().default(8000),
    CORS_ORIGIN: z.string().default('http://localhost:5173'),
    JWT_SECRET_KEY: z.string().min(1, 'JWT_SECRET_KEY is required'),

    OPENAI_API_KEY: z.string().optional(),
    LLM_MODEL_NAME: z.string().default('gpt-4o-mini'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
    LLM_MAX_TOKENS: z.coerce.number().int().positive().default(2048),

    AGENT_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
    AGENT_MAX_STEPS: z.coerce.number().int().min(1).default(8),
    AGENT_MAX_CONSECUTIVE_TOOL_FAILURES: z.coerce
      .number()
      .int()
      .min(1)
      .default(3),
    AGENT_DB_PATH: z.string().default('./data/agent.db'),

    REDIS_HOST: z.string().default('localhost'),
    REDIS_PORT: z.coerce.number().int().positive().default(6379),
    REDIS_PASSWORD: z.string().optional(),
    REDIS_DB: z.coerce.number().int().min(0).default(0),
    CHECKPOINT_TTL_SECONDS: z.coerce.number().int().positive().default(604800),
    CHECKPOINT_LOCK_TTL_MS: z.coerce.number().int().positive().default(120000),
    CHECKPOINT_LOCK_WAIT_MS: z.coerce.number().int().positive().default(60000),

    RATE_LIMIT_ENABLED: booleanFlag(true),
    RATE_LIMIT_PER_MINUTE: z.coerce.number().int().min(1).default(60),

    TRACING_ENABLED: booleanFlag(true),
    TRACING_SAMPLE_RATE: z.coerce
      .number()
      .default(1)
      .transform((rate) => Math.min(1, Math.max(0, rate))),
    TRACE_UI_BASE_URL: z.string().url().optional(),

    DIRECTORY_BASE_URL: z.string().url().default('http://localhost:8080'),

    EVALUATION_LLM: z.string().default('gpt-4o-mini'),
    EVALUATION_API_KEY: z.string().optional(),
    EVALUATION_BASE_URL: z.string().url().optional(),
    EVALUATION_LOOKBACK_HOURS: z.coerce.number().positive().default(24),
    EVALUATION_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(3),
    EVALUATION_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(10000),
    EVALUATION_SLEEP_MS: z.coerce.number().int().min(0).default(1000),
    EVALUATION_PROMPTS_DIR: z.string().default('evals/prompts')
  })
  .superRefine((config, ctx) => {
    // A waiter must outlast a full turn held by the lock owner.
    if (config.CHECKPOINT_LOCK_WAIT_MS < config.AGENT_TIMEOUT_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['CHECKPOINT_LOCK_WAIT_MS'],
        message: 'must be at least AGENT_TIMEOUT_MS'
      });
    }
  });

export type AgentConfig = z.infer<typeof agentConfigSchema>;

/** `validate` hook for `ConfigModule.forRoot`. */
export function validateAgentConfig(env: Record<string, unknown>): AgentConfig {
  const parsed = agentConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid agent configuration: ${issues}`);
  }
  return parsed.data;
}
