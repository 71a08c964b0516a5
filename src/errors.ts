export type ErrorKind = 'validation' | 'not_found' | 'repository' | 'config' | 'market_data';

export class AppError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class ValidationError extends AppError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('validation', message);
    this.issues = issues;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('not_found', message);
  }
}

/** Storage unavailable, lock wait exhausted, or a write failed and was rolled back. */
export class RepositoryError extends AppError {
  readonly code?: string;

  constructor(message: string, options: { cause?: unknown; code?: string } = {}) {
    super('repository', message, { cause: options.cause });
    this.code = options.code;
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super('config', message);
  }
}

export class MarketDataError extends AppError {
  readonly tickers: string[];

  constructor(message: string, tickers: string[] = []) {
    super('market_data', message);
    this.tickers = tickers;
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;

export function statusForError(error: unknown): number {
  if (!isAppError(error)) return 500;
  switch (error.kind) {
    case 'validation':
      return 400;
    case 'not_found':
      return 404;
    case 'market_data':
      return 502;
    case 'repository':
      return 503;
    case 'config':
      return 500;
  }
}
