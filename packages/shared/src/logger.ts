import pino from 'pino';

/**
 * Logger interface for dependency injection.
 *
 * Matches the subset of Pino's API the simulator uses, so entities
 * can take a logger without coupling to Pino directly.
 */
export interface Logger {
  debug(obj: object, msg?: string): void;
  debug(msg: string): void;
  info(obj: object, msg?: string): void;
  info(msg: string): void;
  warn(obj: object, msg?: string): void;
  warn(msg: string): void;
  error(obj: object, msg?: string): void;
  error(msg: string): void;
  fatal(obj: object, msg?: string): void;
  fatal(msg: string): void;

  /** Create a child logger with additional context */
  child(bindings: Record<string, unknown>): Logger;
}

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface LoggerConfig {
  /** Process name, bound to every entry */
  name: string;
  level: LogLevel;
  /** Enable pretty printing (development) */
  pretty: boolean;
}

const DEFAULT_CONFIG: LoggerConfig = {
  name: 'factory-sim',
  level: 'info',
  pretty: process.env['NODE_ENV'] !== 'production',
};

/**
 * Create the process logger: pino-pretty on the console in development,
 * newline-delimited JSON on stdout otherwise.
 */
export function createLogger(config: Partial<LoggerConfig> = {}): pino.Logger {
  const { name, level, pretty } = { ...DEFAULT_CONFIG, ...config };

  if (!pretty) {
    return pino({ name, level });
  }

  return pino({
    name,
    level,
    transport: {
      target: 'pino-pretty',
      options: { colorize: true, translateTime: 'SYS:HH:MM:ss.l', ignore: 'pid,hostname' },
    },
  });
}
