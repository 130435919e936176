// src/utils/errors.ts

export class SDKError extends Error {
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

// Configuration errors
export class ConfigError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
  }
}

// Normalization errors
export class SchemaValidationError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SCHEMA_VALIDATION_FAILED', details);
  }
}

// OAuth errors
export class OAuthError extends SDKError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'OAUTH_ERROR', details);
  }
}

// API errors
export class ApiError extends SDKError {
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

export class RateLimitError extends ApiError {
  constructor(
    message: string = 'Rate limit exceeded',
    public retryAfter?: number,
    details?: Record<string, unknown>
  ) {
    super(message, 429, { ...details, retryAfter });
    this.code = 'RATE_LIMIT_EXCEEDED';
  }
}

// Network errors
export class NetworkError extends SDKError {
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
