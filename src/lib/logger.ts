import { AsyncLocalStorage } from 'async_hooks';
import { v4 as uuidv4 } from 'uuid';
import type { LogLevel } from '../config';

type Level = Exclude<LogLevel, 'silent'>;
export type LogFields = Record<string, unknown>;
export type LogSink = (level: Level, line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const correlation = new AsyncLocalStorage<string>();

export const newCorrelationId = (): string => uuidv4();

export function getCorrelationId(): string | undefined {
  return correlation.getStore();
}

/** Runs `fn` with `id` (or a fresh one) as the correlation id of every log line it emits. */
export function withCorrelationId<T>(id: string | undefined, fn: () => T): T {
  return correlation.run(id ?? newCorrelationId(), fn);
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else console.log(line);
};

const serializeError = (error: unknown): unknown => {
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return error;
};

export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(scope: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  sink?: LogSink;
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const sink = options.sink ?? consoleSink;

  const emit = (level: Level, message: string, fields: LogFields = {}) => {
    if (LEVEL_ORDER[level] < threshold) return;
    const payload: LogFields = {
      timestamp: new Date().toISOString(),
      level,
      scope,
      message,
      correlationId: getCorrelationId(),
    };
    for (const [key, value] of Object.entries(fields)) {
      payload[key] = key === 'error' ? serializeError(value) : value;
    }
    sink(level, JSON.stringify(payload));
  };

  return {
    debug: (message, fields) => emit('debug', message, fields),
    info: (message, fields) => emit('info', message, fields),
    warn: (message, fields) => emit('warn', message, fields),
    error: (message, fields) => emit('error', message, fields),
    child: (child) => createLogger(`${scope}:${child}`, options),
  };
}

export type AuditEventName =
  | 'trade.applied'
  | 'trade.rejected'
  | 'cash.adjusted'
  | 'snapshot.created'
  | 'snapshot.skipped'
  | 'validation.failed'
  | 'backfill.completed'
  | 'risk.stop_loss_breached';

const WARN_EVENTS = new Set<AuditEventName>(['trade.rejected', 'validation.failed', 'risk.stop_loss_breached']);

/** Domain events for the audit trail; one JSON line each, tagged with the current correlation id. */
export class AuditLog {
  constructor(private readonly logger: Logger) {}

  event(name: AuditEventName, attrs: LogFields = {}): void {
    const level = WARN_EVENTS.has(name) ? 'warn' : 'info';
    this.logger[level](name, { event: name, ...attrs });
  }
}

export const silentLogger: Logger = createLogger('silent', { level: 'silent' });
