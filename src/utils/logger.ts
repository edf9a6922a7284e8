import pino from 'pino';

let runId: string | undefined;
let configuredLevel: pino.LevelWithSilent | undefined;

function setRunId(id: string): void {
  runId = id;
}

function generateRunId(): string {
  return `${Date.now()}-${Math.random().toString(36).substring(2, 9)}`;
}

/** Level for loggers created from now on; set once the configuration is validated. */
export function configureLogging(level: pino.LevelWithSilent): void {
  configuredLevel = level;
}

// Unknown LOG_LEVEL values fall back to info until the configuration is validated
function resolveLevel(): string {
  if (configuredLevel) {
    return configuredLevel;
  }
  const fromEnv = process.env.LOG_LEVEL;
  return fromEnv && (fromEnv === 'silent' || fromEnv in pino.levels.values) ? fromEnv : 'info';
}

export function createLogger(context?: Record<string, unknown>): pino.Logger {
  const level = resolveLevel();
  const loggerOptions: pino.LoggerOptions =
    process.env.NODE_ENV === 'development'
      ? {
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          },
        }
      : { level };

  const baseLogger = pino(loggerOptions);

  if (!runId) {
    setRunId(generateRunId());
  }

  return baseLogger.child({
    runId,
    ...context,
  });
}
