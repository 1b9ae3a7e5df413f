import pino from 'pino';
import { scrubPII, scrubRecord } from './redact.js';

export interface LoggerOptions {
  readonly level?: string;
  /** Where log lines go; defaults to stdout. */
  readonly destination?: pino.DestinationStream;
}

/**
 * Creates a pino logger with identifier redaction unless LOG_LEVEL=debug.
 */
export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
  const redactEnabled = level !== 'debug' && level !== 'trace';

  const pinoOptions: pino.LoggerOptions = {
    level,
    base: { service: 'dinner-planner' },
    formatters: {
      log(object) {
        return scrubRecord(object, redactEnabled);
      },
    },
    serializers: {
      err: (err: Error) => scrubPII(pino.stdSerializers.err(err), redactEnabled),
    },
  };

  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}
