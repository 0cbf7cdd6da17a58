/**
 * Error classes carrying an HTTP status
 * Thrown by services, turned into JSON by errorMiddleware
 */

interface ErrorDetails {
  [key: string]: unknown;
}

interface ErrorJSON {
  success: false;
  message: string;
  error: string;
  code: number;
  type: string;
  details: ErrorDetails;
  timestamp: string;
}

class VncError extends Error {
  code: number;
  details: ErrorDetails;

  constructor(message: string, code = 500, details: ErrorDetails = {}) {
    super(message);
    this.name = 'VncError';
    this.code = code;
    this.details = details;
  }

  toJSON(): ErrorJSON {
    return {
      success: false,
      message: this.message,
      error: this.message,
      code: this.code,
      type: this.name,
      details: this.details,
      timestamp: new Date().toISOString(),
    };
  }
}

/** Bad request input (400) */
class ValidationError extends VncError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 400, details);
    this.name = 'ValidationError';
  }
}

/** Missing or invalid credentials (401) */
class AuthError extends VncError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 401, details);
    this.name = 'AuthError';
  }
}

/** Authenticated but not allowed (403) */
class ForbiddenError extends VncError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 403, details);
    this.name = 'ForbiddenError';
  }
}

class NotFoundError extends VncError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 404, details);
    this.name = 'NotFoundError';
  }
}

/**
 * An LSF or ssh command failed to run or exited non-zero (502 Bad Gateway)
 */
class SchedulerError extends VncError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 502, details);
    this.name = 'SchedulerError';
  }
}

/** Unreadable or malformed configuration file */
class ConfigError extends VncError {
  constructor(message: string, details: ErrorDetails = {}) {
    super(message, 500, details);
    this.name = 'ConfigError';
  }
}

/**
 * Extract safe log details from an unknown catch value.
 * Use in log.error/log.warn calls: log.error('msg', errorDetails(err))
 */
function errorDetails(err: unknown): { error: string; stack?: string } | { detail: string } {
  return err instanceof Error
    ? { error: err.message, stack: err.stack }
    : { detail: String(err) };
}

/**
 * Extract a plain error message string from an unknown catch value.
 */
function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export {
  VncError,
  ValidationError,
  AuthError,
  ForbiddenError,
  NotFoundError,
  SchedulerError,
  ConfigError,
  errorDetails,
  errorMessage,
};
export type { ErrorDetails, ErrorJSON };
