import { z } from 'zod';

const SessionConfigSchema = z.object({
  ttlSec: z.coerce.number().int().min(60).default(3600),
  sweepIntervalSec: z.coerce.number().int().min(1).default(60),
  maxSessions: z.coerce.number().int().min(1).default(10_000),
});

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

export function loadSessionConfig(env: NodeJS.ProcessEnv = process.env): SessionConfig {
  return SessionConfigSchema.parse({
    ttlSec: env.SESSION_TTL_SEC || 3600,
    sweepIntervalSec: env.SESSION_SWEEP_INTERVAL_SEC || 60,
    maxSessions: env.SESSION_MAX_SESSIONS || 10_000,
  });
}
