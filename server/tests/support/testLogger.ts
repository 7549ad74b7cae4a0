import type { EngineLogger, LogContext, LogLevel } from '../../logger';

export interface CapturedLog {
  level: LogLevel;
  message: string;
  context: LogContext;
}

/**
 * Keeps log calls in memory so tests can assert on them without console noise.
 */
export class CapturingLogger implements EngineLogger {
  readonly entries: CapturedLog[] = [];

  debug(message: string, context: LogContext = {}): void {
    this.entries.push({ level: 'debug', message, context });
  }

  info(message: string, context: LogContext = {}): void {
    this.entries.push({ level: 'info', message, context });
  }

  warn(message: string, context: LogContext = {}): void {
    this.entries.push({ level: 'warn', message, context });
  }

  error(message: string, context: LogContext = {}): void {
    this.entries.push({ level: 'error', message, context });
  }

  messages(level: LogLevel): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.message);
  }
}
