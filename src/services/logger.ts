import pino from 'pino';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

function isLogLevel(v: unknown): v is LogLevel {
  return LOG_LEVELS.some((level) => level === v);
}

function defaultLevel(env: NodeJS.ProcessEnv): LogLevel {
  if (env.NODE_ENV === 'test') return 'silent';
  return isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : 'info';
}

export const logger = pino({
  level: defaultLevel(process.env),
  transport:
    process.env.NODE_ENV === 'development'
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
});

// Level once configuration is parsed; tests stay silent whatever LOG_LEVEL says.
export function configuredLevel(config: { nodeEnv: string; logLevel: LogLevel }): LogLevel {
  return config.nodeEnv === 'test' ? 'silent' : config.logLevel;
}
