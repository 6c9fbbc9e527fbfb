import pino from 'pino';

const level = process.env.LOG_LEVEL || 'info';

/** Customer emails never reach the log output */
export const REDACTED_PATHS = ['email', '*.email', '*.*.email'];

export function createLogger(destination?: pino.DestinationStream): pino.Logger {
  const options: pino.LoggerOptions = {
    level,
    base: { service: 'store-assistant' },
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
    },
    redact: { paths: REDACTED_PATHS, censor: '[REDACTED]' },
  };

  if (destination) {
    return pino(options, destination);
  }
  return pino({
    ...options,
    ...(process.env.NODE_ENV === 'development'
      ? { transport: { target: 'pino/file', options: { destination: 1 } } }
      : {}),
  });
}

export const logger = createLogger();

/** Child logger scoped to one conversation turn */
export function turnLogger(requestId: string, sessionId: string, extra?: Record<string, unknown>): pino.Logger {
  return logger.child({ requestId, sessionId, ...extra });
}
