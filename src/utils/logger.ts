import pino from 'pino';

// One id per process run, attached to every child logger
let runId: string | undefined;

function generateRunId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

function loggerOptions(): pino.LoggerOptions {
  const base: pino.LoggerOptions = {
    name: 'sleep-metrics',
    level: process.env.LOG_LEVEL || 'info',
  };
  if (process.env.NODE_ENV !== 'development') {
    return base;
  }
  return {
    ...base,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname,name',
      },
    },
  };
}

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  const baseLogger = pino(loggerOptions());

  runId ??= generateRunId();

  return baseLogger.child({
    runId,
    ...context,
  });
}
