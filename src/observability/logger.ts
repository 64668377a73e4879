import env from '../config/env';

export type LogSeverity = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type StructuredLogPayload = {
  message: string;
  severity: LogSeverity;
  time: string;
  component?: string;
  context?: Record<string, unknown>;
};

type LoggerContext = {
  component?: string;
  level?: LogLevel;
  defaultFields?: Record<string, unknown>;
  sink?: LogSink;
};

export type LogSink = (severity: LogSeverity, line: string) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  with(options: { component?: string; defaultFields?: Record<string, unknown> }): Logger;
}

const serviceName = 'strava-rest-client';

const severityRank: Record<LogSeverity, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40
};

const levelThreshold: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: Number.POSITIVE_INFINITY
};

const mergeContext = (
  left?: Record<string, unknown>,
  right?: Record<string, unknown>
): Record<string, unknown> | undefined => {
  if (!left && !right) {
    return undefined;
  }

  return {
    ...(left ?? {}),
    ...(right ?? {})
  };
};

const consoleSink: LogSink = (severity, line) => {
  switch (severity) {
    case 'ERROR':
      console.error(line);
      return;
    case 'WARNING':
      console.warn(line);
      return;
    default:
      console.log(line);
  }
};

class StructuredLogger implements Logger {
  constructor(private readonly context: LoggerContext = {}) {}

  with(options: { component?: string; defaultFields?: Record<string, unknown> }): Logger {
    return new StructuredLogger({
      ...this.context,
      component: options.component ?? this.context.component,
      defaultFields: mergeContext(this.context.defaultFields, options.defaultFields)
    });
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('DEBUG', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('INFO', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('WARNING', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('ERROR', message, context);
  }

  private write(severity: LogSeverity, message: string, context?: Record<string, unknown>): void {
    const level = this.context.level ?? env.LOG_LEVEL;
    if (severityRank[severity] < levelThreshold[level]) {
      return;
    }

    const payload: StructuredLogPayload = {
      message,
      severity,
      time: new Date().toISOString(),
      component: this.context.component,
      context: mergeContext(this.context.defaultFields, context)
    };

    const entry = {
      serviceContext: {
        service: serviceName
      },
      ...payload
    };

    const sink = this.context.sink ?? consoleSink;
    sink(severity, JSON.stringify(entry));
  }
}

export const createLogger = (context: LoggerContext = {}): Logger => new StructuredLogger(context);

export const baseLogger = createLogger({ component: 'strava' });

export type { LoggerContext };
