/**
 * Base application error class with status code support
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: string;

  constructor(
    message: string,
    statusCode = 500,
    code = 'INTERNAL_ERROR',
    isOperational = true,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error (400) for malformed tool input
 */
export class ValidationError extends AppError {
  public readonly details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 400, 'VALIDATION_ERROR');
    this.details = details;
  }
}

/**
 * Configuration could not be read, parsed or validated
 */
export class ConfigError extends AppError {
  public readonly source: string;

  constructor(message: string, source: string, options?: ErrorOptions) {
    super(message, 500, 'CONFIG_ERROR', false, options);
    this.source = source;
  }
}

/**
 * URL validation error (400)
 */
export class UrlValidationError extends AppError {
  public readonly url: string;

  constructor(message: string, url: string) {
    super(message, 400, 'INVALID_URL');
    this.url = url;
  }
}

export class UnsupportedSchemeError extends AppError {
  public readonly scheme: string;

  constructor(scheme: string) {
    super(`Unsupported URL scheme: ${scheme}`, 400, 'UNSUPPORTED_SCHEME');
    this.scheme = scheme;
  }
}

export type DenyReason =
  | 'not_in_allowlist'
  | 'local_host'
  | 'private_ip'
  | 'resolution_failed'
  | 'resolves_to_private_ip';

const DENY_MESSAGES: Readonly<Record<DenyReason, string>> = {
  not_in_allowlist: 'host is not in BROWSE_ALLOWED_HOSTS',
  local_host:
    'refusing to browse localhost (set BROWSE_ALLOW_PRIVATE=true or BROWSE_ALLOWED_HOSTS to override)',
  private_ip:
    'refusing to browse private/loopback IP (set BROWSE_ALLOW_PRIVATE=true or BROWSE_ALLOWED_HOSTS to override)',
  resolution_failed: 'host did not resolve',
  resolves_to_private_ip:
    'refusing to browse host that resolves to a private IP (set BROWSE_ALLOW_PRIVATE=true to override)',
};

/**
 * Browse target rejected by the host policy (403)
 */
export class PolicyDeniedError extends AppError {
  public readonly host: string;
  public readonly reason: DenyReason;

  constructor(host: string, reason: DenyReason) {
    super(`${host}: ${DENY_MESSAGES[reason]}`, 403, 'POLICY_DENIED');
    this.host = host;
    this.reason = reason;
  }
}

/**
 * Connect, send or body-read failure (502)
 */
export class TransportError extends AppError {
  public readonly url: string;

  constructor(
    message: string,
    url: string,
    code = 'TRANSPORT_ERROR',
    statusCode = 502,
    options?: ErrorOptions
  ) {
    super(message, statusCode, code, true, options);
    this.url = url;
  }
}

/**
 * Whole-call deadline exceeded (504)
 */
export class TimeoutError extends TransportError {
  public readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    super(`Request timeout after ${timeoutMs}ms`, url, 'TIMEOUT', 504);
    this.timeoutMs = timeoutMs;
  }
}

export class TooManyRedirectsError extends AppError {
  public readonly maxRedirects: number;

  constructor(maxRedirects: number) {
    super(
      `Too many redirects (BROWSE_MAX_REDIRECTS=${maxRedirects})`,
      502,
      'TOO_MANY_REDIRECTS'
    );
    this.maxRedirects = maxRedirects;
  }
}

export class BadRedirectError extends AppError {
  public readonly url: string;
  public readonly httpStatus: number;

  constructor(message: string, url: string, httpStatus: number) {
    super(message, 502, 'BAD_REDIRECT');
    this.url = url;
    this.httpStatus = httpStatus;
  }
}

/**
 * Non-2xx response that was not a followed redirect
 */
export class HttpStatusError extends AppError {
  public readonly url: string;
  public readonly httpStatus: number;
  public readonly bodySnippet: string;

  constructor(url: string, httpStatus: number, bodySnippet: string) {
    super(
      bodySnippet
        ? `HTTP ${httpStatus}: ${bodySnippet}`
        : `HTTP ${httpStatus}`,
      502,
      'HTTP_STATUS'
    );
    this.url = url;
    this.httpStatus = httpStatus;
    this.bodySnippet = bodySnippet;
  }
}

export class UnsupportedContentTypeError extends AppError {
  public readonly contentType: string;

  constructor(contentType: string) {
    super(
      `Unsupported content-type for browse: ${contentType}`,
      415,
      'UNSUPPORTED_CONTENT_TYPE'
    );
    this.contentType = contentType;
  }
}

export class BodyTooLargeError extends AppError {
  public readonly url: string;
  public readonly maxBytes: number;

  constructor(url: string, maxBytes: number) {
    super(
      `Response exceeded BROWSE_MAX_BYTES (${maxBytes})`,
      413,
      'BODY_TOO_LARGE'
    );
    this.url = url;
    this.maxBytes = maxBytes;
  }
}

export class InvalidEncodingError extends AppError {
  public readonly url: string;

  constructor(url: string) {
    super('Response was not valid UTF-8 text', 422, 'INVALID_ENCODING');
    this.url = url;
  }
}

/**
 * SearXNG answered with something other than a usable 2xx
 */
export class UpstreamError extends AppError {
  public readonly endpoint: string;
  public readonly httpStatus?: number;

  constructor(
    message: string,
    endpoint: string,
    httpStatus?: number,
    options?: ErrorOptions
  ) {
    super(message, 502, 'UPSTREAM_ERROR', true, options);
    this.endpoint = endpoint;
    this.httpStatus = httpStatus;
  }
}
