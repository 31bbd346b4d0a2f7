export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  details?: Record<string, unknown>;
}

export function createError(
  message: string,
  statusCode: number = 500,
  code: string = 'INTERNAL_ERROR',
  details?: Record<string, unknown>
): AppError {
  const error: AppError = new Error(message);
  error.statusCode = statusCode;
  error.code = code;
  error.details = details;
  return error;
}

abstract class HttpMappedError extends Error implements AppError {
  abstract readonly statusCode: number;
  abstract readonly code: string;
  details?: Record<string, unknown>;

  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.details = options?.details;
  }
}

/**
 * Missing credential, or a credential the provider refused. The user can fix this.
 */
export class ConfigurationError extends HttpMappedError {
  readonly statusCode = 401;
  readonly code = 'CONFIGURATION_ERROR';
}

/**
 * Network or provider-side failure while generating. The underlying error is kept as `cause`.
 */
export class ProviderError extends HttpMappedError {
  readonly statusCode = 502;
  readonly code = 'PROVIDER_ERROR';
}

/**
 * Model output that could not be decoded into a complete analysis.
 */
export class SchemaValidationError extends HttpMappedError {
  readonly statusCode = 502;
  readonly code = 'SCHEMA_VALIDATION_ERROR';
}

export class CatalogAuthError extends HttpMappedError {
  readonly statusCode = 401;
  readonly code = 'CATALOG_AUTH_ERROR';
}

export class CatalogConnectionError extends HttpMappedError {
  readonly statusCode = 502;
  readonly code = 'CATALOG_CONNECTION_ERROR';
}

export class CatalogNotFoundError extends HttpMappedError {
  readonly statusCode = 404;
  readonly code = 'NOT_FOUND';
}

/**
 * HTTP status carried by SDK errors (OpenAI, Anthropic and Gemini all expose `status`).
 */
export function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
