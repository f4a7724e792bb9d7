import pino, { type Logger as PinoLogger, type LoggerOptions as PinoLoggerOptions, type TransportSingleOptions } from 'pino';
import { createRedactRules } from './logger-redact.js';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
export type LogFormat = 'json' | 'pretty';

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
  format?: LogFormat;
  transport?: TransportSingleOptions;
  bindings?: Record<string, unknown>;
  redactPaths?: string[];
}

export type Logger = PinoLogger;

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function serializeError(err: unknown): unknown {
  if (!err || typeof err !== 'object') {
    return err;
  }

  if ('toJSON' in err && typeof err.toJSON === 'function') {
    return err.toJSON();
  }

  if (err instanceof Error) {
    return {
      name: err.name,
      message: err.message,
      stack: err.stack,
    };
  }

  return err;
}

function createPrettyTransport(): TransportSingleOptions {
  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      translateTime: 'HH:MM:ss.l',
      ignore: 'pid,hostname',
      singleLine: false
    }
  };
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const {
    level = 'info',
    name,
    format,
    transport,
    bindings = {},
    redactPaths = []
  } = options;

  let finalTransport: TransportSingleOptions | undefined;
  if (format === 'json') {
    finalTransport = undefined;
  } else if (format === 'pretty') {
    finalTransport = createPrettyTransport();
  } else if (transport !== undefined) {
    finalTransport = transport;
  } else {
    finalTransport = process.env.INVENTORY_LOG_FORMAT?.toLowerCase() === 'json'
      ? undefined
      : createPrettyTransport();
  }

  const config: PinoLoggerOptions = {
    level,
    name,
    redact: createRedactRules(redactPaths),
    transport: finalTransport,
    serializers: {
      err: serializeError,
      error: serializeError
    }
  };

  const logger = pino(config);
  return Object.keys(bindings).length > 0 ? logger.child(bindings) : logger;
}

export function getLoggerOptionsFromEnv(
  configOptions: LoggerOptions = {},
  env: NodeJS.ProcessEnv = process.env
): LoggerOptions {
  const options: LoggerOptions = { ...configOptions };

  const level = env.INVENTORY_LOG_LEVEL?.toLowerCase();
  if (level && isLogLevel(level)) {
    options.level = level;
  }

  const format = env.INVENTORY_LOG_FORMAT?.toLowerCase();
  if (format === 'json' || format === 'pretty') {
    options.format = format;
  }

  return options;
}

/** Logger that drops everything; the default for components built without one. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

export default createLogger;
