/**
 * Structured Logger
 *
 * JSON lines with a bound context (service, chain, nonce).
 * Bigints are written as decimal strings.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LogContext {
  chain?: string;
  nonce?: bigint;
  [key: string]: unknown;
}

export interface Logger {
  info(context: LogContext, message: string): void;
  warn(context: LogContext, message: string): void;
  error(context: LogContext, message: string): void;
  debug(context: LogContext, message: string): void;
  child(context: LogContext): Logger;
}

export type LogWriter = (line: string) => void;

// =============================================================================
// JSON LOGGER IMPLEMENTATION
// =============================================================================

export class JsonLogger implements Logger {
  constructor(
    private readonly context: LogContext = {},
    private readonly level: LogLevel = 'info',
    private readonly write: LogWriter = (line) => console.log(line)
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private log(level: LogLevel, context: LogContext, message: string): void {
    if (!this.shouldLog(level)) return;

    const entry: Record<string, unknown> = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.context,
      ...context,
    };

    // Remove undefined values
    const cleaned = Object.fromEntries(
      Object.entries(entry).filter(([_, v]) => v !== undefined)
    );

    // Serialize errors
    if (cleaned.error instanceof Error) {
      const err = cleaned.error;
      cleaned.error = {
        name: err.name,
        message: err.message,
        ...('code' in err ? { code: err.code } : {}),
        stack: err.stack,
      };
    }

    this.write(JSON.stringify(cleaned, (_key, value: unknown) =>
      typeof value === 'bigint' ? value.toString() : value
    ));
  }

  info(context: LogContext, message: string): void {
    this.log('info', context, message);
  }

  warn(context: LogContext, message: string): void {
    this.log('warn', context, message);
  }

  error(context: LogContext, message: string): void {
    this.log('error', context, message);
  }

  debug(context: LogContext, message: string): void {
    this.log('debug', context, message);
  }

  child(context: LogContext): Logger {
    return new JsonLogger({ ...this.context, ...context }, this.level, this.write);
  }
}

// =============================================================================
// FACTORY
// =============================================================================

export function createLogger(
  options?: {
    level?: LogLevel;
    service?: string;
    write?: LogWriter;
  }
): Logger {
  return new JsonLogger(
    { service: options?.service ?? 'cctp-gateway' },
    options?.level ?? 'info',
    options?.write
  );
}
