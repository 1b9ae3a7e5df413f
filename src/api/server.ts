import 'dotenv/config';
import { createPlanner } from '../bootstrap.js';
import { loadAppConfig } from '../config/app.js';
import { createLineMessenger } from '../platforms/line.js';
import { createLogger } from '../util/logging.js';
import { createApp } from './app.js';

const log = createLogger();

async function main(): Promise<void> {
  const appConfig = loadAppConfig();
  const { dispatcher, store } = await createPlanner({ log });

  const line = appConfig.line
    ? {
        channelSecret: appConfig.line.channelSecret,
        messenger: createLineMessenger(appConfig.line, { log }),
      }
    : undefined;
  if (!line) {
    log.warn('LINE credentials not set; /line-webhook is disabled');
  }

  const app = createApp({ dispatcher, store, log, line });
  const server = app.listen(appConfig.port, () => log.info({ port: appConfig.port }, 'HTTP server started'));

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down');
    store.close();
    server.close(() => process.exit(0));
  };
  process.once('SIGTERM', () => shutdown('SIGTERM'));
  process.once('SIGINT', () => shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Startup failed');
  process.exit(1);
});
