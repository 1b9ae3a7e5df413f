import { z } from 'zod';

export const LlmConfigSchema = z.object({
  baseUrl: z.string().url().default('https://generativelanguage.googleapis.com/v1beta/openai'),
  apiKey: z.string().min(1, 'LLM_API_KEY (or GOOGLE_API_KEY) must be set'),
  model: z.string().min(1).default('gemini-2.0-flash'),
  timeoutMs: z.coerce.number().int().min(100).default(20_000),
  temperature: z.coerce.number().min(0).max(2).default(0.7),
  maxTokens: z.coerce.number().int().min(1).optional(),
  maxConcurrent: z.coerce.number().int().min(1).default(4),
  minTimeMs: z.coerce.number().int().min(0).default(0),
});

export type LlmConfig = z.infer<typeof LlmConfigSchema>;

export function loadLlmConfig(env: NodeJS.ProcessEnv = process.env): LlmConfig {
  return LlmConfigSchema.parse({
    baseUrl: env.LLM_PROVIDER_BASEURL || undefined,
    apiKey: env.LLM_API_KEY || env.GOOGLE_API_KEY || '',
    model: env.LLM_MODEL || undefined,
    timeoutMs: env.LLM_TIMEOUT_MS || undefined,
    temperature: env.LLM_TEMPERATURE || undefined,
    maxTokens: env.LLM_MAX_TOKENS || undefined,
    maxConcurrent: env.LLM_MAX_CONCURRENT || undefined,
    minTimeMs: env.LLM_MIN_TIME_MS || undefined,
  });
}
