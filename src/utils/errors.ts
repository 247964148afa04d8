// src/utils/errors.ts

export class AppError extends Error {
  constructor(
    message: string,
    public code: string,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

// OAuth errors
export class OAuthError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'OAUTH_ERROR', details);
  }
}

export class OAuthConfigError extends OAuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'OAUTH_CONFIG_ERROR';
  }
}

export class MissingParameterError extends OAuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'MISSING_PARAMETER';
  }
}

export class AuthStateMismatchError extends OAuthError {
  constructor(message: string = 'OAuth state mismatch', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'AUTH_STATE_MISMATCH';
  }
}

export class AuthExchangeFailedError extends OAuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'AUTH_EXCHANGE_FAILED';
  }
}

export class OAuthDeniedError extends OAuthError {
  constructor(message: string = 'User denied authorization', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'OAUTH_DENIED';
  }
}

export class TokenRefreshError extends OAuthError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'TOKEN_REFRESH_FAILED';
  }
}

// Content retrieval
export class FetchFailedError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'FETCH_FAILED', details);
  }
}

// API errors
export class ApiError extends AppError {
  constructor(
    message: string,
    public status: number,
    details?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', { ...details, status });
  }
}

export class ApiClientError extends ApiError {
  constructor(message: string, status: number = 400, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_CLIENT_ERROR';
  }
}

export class ApiServerError extends ApiError {
  constructor(message: string, status: number = 500, details?: Record<string, unknown>) {
    super(message, status, details);
    this.code = 'API_SERVER_ERROR';
  }
}

// Network errors
export class NetworkError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', details);
  }
}

export class NetworkTimeoutError extends NetworkError {
  constructor(message: string = 'Request timeout', details?: Record<string, unknown>) {
    super(message, details);
    this.code = 'NETWORK_TIMEOUT';
  }
}

/**
 * Message of an unknown thrown value, for logs and user-facing text.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
