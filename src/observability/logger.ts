import { AsyncLocalStorage } from 'async_hooks';
import crypto from 'crypto';

export interface LogContext {
  requestId: string;
  tenantId?: string;
  path?: string;
}

export const LOG_LEVELS = ['info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  requestId: string;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  tenantId?: string;
  path?: string;
}

/**
 * JSON-lines logger. Request context is scoped with AsyncLocalStorage so
 * concurrent requests never see each other's ids.
 */
class Logger {
  private readonly scope = new AsyncLocalStorage<LogContext>();
  private threshold = 0;

  setLevel(level: LogLevel): void {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  /** Everything logged inside `fn`, including after awaits, carries `context`. */
  runWithContext<T>(context: LogContext, fn: () => T): T {
    return this.scope.run(context, fn);
  }

  private log(level: LogLevel, phase: string, message: string, data?: Record<string, unknown>): void {
    if (LOG_LEVELS.indexOf(level) < this.threshold) return;

    const context = this.scope.getStore();
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      requestId: context?.requestId ?? 'system',
      phase,
      message,
      data,
    };

    if (context?.tenantId) entry.tenantId = context.tenantId;
    if (context?.path) entry.path = context.path;

    console.log(JSON.stringify(entry));
  }

  info(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('info', phase, message, data);
  }

  warn(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('warn', phase, message, data);
  }

  error(phase: string, message: string, data?: Record<string, unknown>): void {
    this.log('error', phase, message, data);
  }
}

export const logger = new Logger();

export function generateRequestId(): string {
  return crypto.randomBytes(8).toString('hex');
}
