/**
 * @fileoverview Structured stderr logger
 *
 * stdout carries the MCP stdio protocol, so every level is written to stderr.
 * Level filtering follows LOG_LEVEL (debug | info | warn | error); DEBUG=1
 * forces debug output on.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as readonly string[]).includes(value);
}

function currentLevel(): LogLevel {
  if (process.env.DEBUG) return 'debug';
  const level = process.env.LOG_LEVEL?.toLowerCase() ?? 'info';
  return isLogLevel(level) ? level : 'info';
}

// Error instances stringify to {} by default
function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export class Logger {
  constructor(
    private readonly prefix: string = 'slate',
    private readonly write: (line: string) => void = line => process.stderr.write(line + '\n')
  ) {}

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  /**
   * Logger for a sub-component, sharing the sink
   */
  child(name: string): Logger {
    return new Logger(`${this.prefix}:${name}`, this.write);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(currentLevel());
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    if (!this.shouldLog(level)) return;

    const timestamp = new Date().toISOString();
    let line = `[${timestamp}] ${level.toUpperCase()} [${this.prefix}] ${message}`;
    if (context && Object.keys(context).length > 0) {
      line += ` ${JSON.stringify(context, replacer)}`;
    }
    this.write(line);
  }
}

export const logger = new Logger('slate');
