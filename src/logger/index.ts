import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

/** Logger settings, see `ClientConfig.logging`. */
export interface LoggingConfig {
  level: string;
  pretty: boolean;
}

/**
 * Creates the package logger. `pretty` routes output through pino-pretty,
 * otherwise pino writes raw JSON lines.
 */
export function createLogger(config: LoggingConfig): Logger {
  return pino({
    name: 'blob-requests',
    level: config.level,
    ...(config.pretty ? { transport: { target: 'pino-pretty' } } : {}),
  });
}
