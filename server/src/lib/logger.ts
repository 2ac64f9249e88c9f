import pino from 'pino';

const isProduction = process.env.NODE_ENV === 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';

function defaultLevel(): string {
  if (isTest) return 'silent';
  return isProduction ? 'info' : 'debug';
}

const logger = pino({
  level: process.env.LOG_LEVEL ?? defaultLevel(),
  ...(isProduction || isTest
    ? {}
    : {
        transport: {
          target: 'pino-pretty',
          options: { colorize: true },
        },
      }),
});

/**
 * Creates a child logger scoped to one pipeline run.
 */
export function createRunLogger(
  runId: string,
  extra?: Record<string, unknown>,
) {
  return logger.child({ run_id: runId, ...extra });
}

export default logger;
