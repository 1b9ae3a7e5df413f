import { z } from 'zod';

const AppConfigSchema = z.object({
  port: z.coerce.number().int().min(0).max(65535).default(3000),
  line: z
    .object({
      channelSecret: z.string().min(1),
      channelAccessToken: z.string().min(1),
      apiBaseUrl: z.string().url().default('https://api.line.me'),
    })
    .optional(),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type LineConfig = NonNullable<AppConfig['line']>;

/**
 * LINE is optional: without both credentials the LINE webhook answers 503
 * and the other routes keep working.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const channelSecret = env.LINE_CHANNEL_SECRET || env.ChannelSecret;
  const channelAccessToken = env.LINE_CHANNEL_ACCESS_TOKEN || env.ChannelAccessToken;

  return AppConfigSchema.parse({
    port: env.PORT || undefined,
    line:
      channelSecret && channelAccessToken
        ? { channelSecret, channelAccessToken, apiBaseUrl: env.LINE_API_BASE_URL || undefined }
        : undefined,
  });
}
