import { z } from 'zod';

const PipelineConfigSchema = z.object({
  maxAttempts: z.coerce.number().int().min(1).max(5).default(2),
  initialDelayMs: z.coerce.number().int().min(0).default(250),
  maxDelayMs: z.coerce.number().int().min(0).default(2000),
  language: z.string().min(1).default('English'),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export function loadPipelineConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  return PipelineConfigSchema.parse({
    maxAttempts: env.PIPELINE_STAGE_ATTEMPTS || undefined,
    initialDelayMs: env.PIPELINE_RETRY_INITIAL_DELAY_MS || undefined,
    maxDelayMs: env.PIPELINE_RETRY_MAX_DELAY_MS || undefined,
    language: env.PLANNER_LANGUAGE || undefined,
  });
}
