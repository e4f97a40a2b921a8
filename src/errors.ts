/**
 * Error taxonomy for the scraping engine.
 * Per-entity failures (not found, navigation) are recorded in the batch result;
 * session loss ends the batch.
 */

export class ScrapeError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, statusCode: number = 500, context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      ...(process.env.NODE_ENV === 'development' ? { context: this.context } : {}),
    };
  }
}

// Request Errors (400)
export class ValidationError extends ScrapeError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'VALIDATION_ERROR', 400, { issues });
    this.issues = issues;
  }

  toJSON() {
    return { error: this.code, message: this.message, issues: this.issues };
  }
}

// Entity Errors
export class NotFoundError extends ScrapeError {
  constructor(query: string, reason: string) {
    super(`No match for "${query}": ${reason}`, 'NOT_FOUND', 404, { query });
  }
}

export class NavigationError extends ScrapeError {
  constructor(url: string, reason: string) {
    super(`Failed to load ${url}: ${reason}`, 'NAVIGATION_FAILED', 502, { url });
  }
}

// Batch-level Errors
export class SessionError extends ScrapeError {
  constructor(message: string, originalError?: unknown) {
    super(message, 'SESSION_LOST', 500, { originalError: getErrorMessage(originalError) });
  }
}

export class LoginError extends ScrapeError {
  constructor(message: string) {
    super(message, 'LOGIN_FAILED', 401);
  }
}

const CLOSED_TARGET = /target (page, context or browser )?(has been |is )?closed|browser has been closed|browser has disconnected|context (has been )?closed/i;

/**
 * True when a driver error means the page, context or browser is gone,
 * so no further navigation in this session can succeed.
 */
export function isSessionFatal(error: unknown): boolean {
  if (error instanceof SessionError) return true;
  if (error instanceof Error) return CLOSED_TARGET.test(error.message);
  return false;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (error === undefined) return '';
  return String(error);
}
