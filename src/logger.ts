import pino, { Logger as PinoLogger, LoggerOptions } from 'pino';

type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const validLevels: readonly LogLevel[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
];

function isLogLevel(value: string): value is LogLevel {
  return (validLevels as readonly string[]).includes(value);
}

export function resolveLogLevel(value?: string): LogLevel {
  if (!value) {
    return 'info';
  }
  const normalized = value.toLowerCase();
  return isLogLevel(normalized) ? normalized : 'info';
}

export type Logger = PinoLogger;

// Pretty output only for an interactive terminal, unless JSON is requested
const isTTY = Boolean(process.stdout.isTTY);
const useJsonOutput = process.env.GEOTAG_LOG_JSON === 'true';

function hasPinoPretty(): boolean {
  try {
    // Optional: npm install -D pino-pretty
    require.resolve('pino-pretty');
    return true;
  } catch {
    return false;
  }
}

function buildLoggerOptions(): LoggerOptions {
  const base: LoggerOptions = {
    level: resolveLogLevel(process.env.GEOTAG_LOG_LEVEL),
    base: { app: 'geotag-extract' },
  };

  if (!isTTY || useJsonOutput || !hasPinoPretty()) {
    return base;
  }

  return {
    ...base,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'HH:MM:ss',
        ignore: 'pid,hostname,app',
        singleLine: false,
        messageFormat: '{msg}',
      },
    },
  };
}

export const logger: Logger = pino(buildLoggerOptions());
