import crypto from 'crypto';

export type LogLevel = 'info' | 'warn' | 'error' | 'silent';

export interface LogContext {
  faultId?: string;
  kind?: string;
  cascadeDepth?: number;
}

interface LogEntry {
  timestamp: string;
  level: Exclude<LogLevel, 'silent'>;
  faultId: string;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  kind?: string;
  cascadeDepth?: number;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'info' || value === 'warn' || value === 'error' || value === 'silent';
}

// Shared by every child logger so a level change applies process-wide.
const settings: { level: LogLevel } = {
  level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info',
};

export class Logger {
  constructor(private readonly context: LogContext | null = null) {}

  child(context: LogContext): Logger {
    return new Logger({ ...this.context, ...context });
  }

  setLevel(level: LogLevel): void {
    settings.level = level;
  }

  getLevel(): LogLevel {
    return settings.level;
  }

  private log(level: Exclude<LogLevel, 'silent'>, phase: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[settings.level]) return;

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      faultId: this.context?.faultId || 'none',
      phase,
      message,
      data,
    };

    if (this.context?.kind) entry.kind = this.context.kind;
    if (this.context?.cascadeDepth !== undefined) entry.cascadeDepth = this.context.cascadeDepth;

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

export function generateFaultId(): string {
  return crypto.randomBytes(8).toString('hex');
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
