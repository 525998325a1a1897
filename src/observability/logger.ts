import crypto from 'crypto';

export interface LogContext {
  runId: string;
  root?: string;
  command?: string;
}

type LogLevel = 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  runId: string;
  phase: string;
  message: string;
  data?: Record<string, unknown>;
  root?: string;
  command?: string;
}

const LEVEL_RANK: Record<LogLevel | 'silent', number> = {
  info: 0,
  warn: 1,
  error: 2,
  silent: 3,
};

function thresholdFromEnv(): number {
  const configured = process.env.LOG_LEVEL;
  if (configured === 'info' || configured === 'warn' || configured === 'error' || configured === 'silent') {
    return LEVEL_RANK[configured];
  }
  return LEVEL_RANK.info;
}

class Logger {
  private context: LogContext | null = null;

  setContext(context: LogContext): void {
    this.context = context;
  }

  clearContext(): void {
    this.context = null;
  }

  // stdout carries the report, so log lines go to stderr.
  private log(level: LogLevel, phase: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_RANK[level] < thresholdFromEnv()) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      runId: this.context?.runId || 'unknown',
      phase,
      message,
      data,
    };

    if (this.context?.root) entry.root = this.context.root;
    if (this.context?.command) entry.command = this.context.command;

    console.error(JSON.stringify(entry));
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

export function generateRunId(): string {
  return crypto.randomBytes(8).toString('hex');
}
