import pino from 'pino';

export interface LoggerOptions {
  level?: string;
  pretty?: boolean;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const pretty = options.pretty ?? process.stdout.isTTY === true;

  return pino({
    name: options.name ?? 'ferry',
    level: options.level ?? process.env.LOG_LEVEL ?? 'info',
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(pretty
      ? {
          transport: {
            target: 'pino-pretty',
            options: { colorize: true }
          }
        }
      : {})
  });
}
