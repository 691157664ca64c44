/**
 * Logger - Leveled logging for the monitor pipeline
 *
 * Writes to stderr by default so stdout stays reserved for command and
 * MCP output.
 */

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'] as const;

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  /** Prefix added after the level tag */
  name?: string;
  sink?: LogSink;
}

const stderrSink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

/**
 * Leveled logger writing one formatted line per call
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly name: string | undefined;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.level ?? 'warn';
    this.name = options.name;
    this.sink = options.sink ?? stderrSink;
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, args);
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVEL_PRIORITY[level] > LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const timestamp = new Date().toISOString();
    const scope = this.name ? ` [${this.name}]` : '';
    let formattedMessage = `[${timestamp}] [${level.toUpperCase()}]${scope} ${message}`;

    if (args.length > 0) {
      formattedMessage += ` ${args.map(formatArg).join(' ')}`;
    }

    this.sink(formattedMessage);
  }
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return `${arg.message}\n${arg.stack ?? ''}`;
  }
  if (typeof arg === 'object' && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new ConsoleLogger(options);
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Resolve the effective level: DEBUG in the environment wins, then
 * SOCKGRAPH_LOG_LEVEL, then the configured value
 */
export function resolveLogLevel(
  configured: LogLevel | undefined,
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  if (env['DEBUG']) return 'debug';
  const fromEnv = env['SOCKGRAPH_LOG_LEVEL'];
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  return configured ?? 'warn';
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  error: () => undefined,
  warn: () => undefined,
  info: () => undefined,
  debug: () => undefined,
};
