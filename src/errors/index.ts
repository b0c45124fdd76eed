/**
 * Error types for the REST JSON client.
 *
 * Transport failures and non-success statuses are reported as response data;
 * the classes here cover configuration, lifecycle, and JSON/tree failures.
 *
 * @module errors
 */

/**
 * Error codes for client errors.
 */
export enum HttpClientErrorCode {
  // Configuration
  ConfigurationError = 'CONFIGURATION_ERROR',

  // Lifecycle
  TransportInitialization = 'TRANSPORT_INITIALIZATION',
  ClientClosed = 'CLIENT_CLOSED',
  ClientBusy = 'CLIENT_BUSY',

  // JSON / property tree
  JsonDecode = 'JSON_DECODE',
  TreePath = 'TREE_PATH',
  TreeCoercion = 'TREE_COERCION',
}

/**
 * Base client error class.
 */
export class HttpClientError extends Error {
  /** Error code */
  readonly code: HttpClientErrorCode;
  /** Additional error details */
  readonly details?: Record<string, unknown>;

  constructor(options: {
    code: HttpClientErrorCode;
    message: string;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(options.message, { cause: options.cause });
    this.name = 'HttpClientError';
    this.code = options.code;
    this.details = options.details;
  }

  /**
   * Creates a JSON representation of the error.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Invalid client configuration.
 */
export class ConfigurationError extends HttpClientError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({
      code: HttpClientErrorCode.ConfigurationError,
      message,
      details,
    });
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Lifecycle Errors
// ============================================================================

/**
 * The transport handle could not be created. Not recoverable per request.
 */
export class TransportInitializationError extends HttpClientError {
  constructor(cause: unknown) {
    super({
      code: HttpClientErrorCode.TransportInitialization,
      message: `Failed to initialize transport handle: ${describeCause(cause)}`,
      cause,
    });
    this.name = 'TransportInitializationError';
  }
}

/**
 * A request was issued after the client released its transport handle.
 */
export class ClientClosedError extends HttpClientError {
  constructor(method: string, url: string) {
    super({
      code: HttpClientErrorCode.ClientClosed,
      message: `Cannot ${method} ${url}: client is closed`,
      details: { method, url },
    });
    this.name = 'ClientClosedError';
  }
}

/**
 * A request was issued while another one was still running on the same handle.
 */
export class ClientBusyError extends HttpClientError {
  constructor(method: string, url: string, inFlight: string) {
    super({
      code: HttpClientErrorCode.ClientBusy,
      message: `Cannot ${method} ${url}: a request is already in flight (${inFlight})`,
      details: { method, url, inFlight },
    });
    this.name = 'ClientBusyError';
  }
}

// ============================================================================
// JSON / Property Tree Errors
// ============================================================================

/**
 * A response body could not be decoded as JSON.
 */
export class JsonDecodeError extends HttpClientError {
  readonly url: string;
  readonly body: string;

  constructor(url: string, body: string, cause: unknown) {
    super({
      code: HttpClientErrorCode.JsonDecode,
      message: `Failed to decode JSON from ${url}: ${describeCause(cause)}`,
      details: { url },
      cause,
    });
    this.name = 'JsonDecodeError';
    this.url = url;
    this.body = body;
  }
}

/**
 * A property tree path did not resolve to a node.
 */
export class TreePathError extends HttpClientError {
  constructor(path: string) {
    super({
      code: HttpClientErrorCode.TreePath,
      message: `No such node: ${path}`,
      details: { path },
    });
    this.name = 'TreePathError';
  }
}

/**
 * A property tree value could not be converted to the requested type.
 */
export class TreeCoercionError extends HttpClientError {
  /** Why the conversion failed, without the value or position */
  readonly reason: string;

  constructor(value: string, reason: string, options: { key?: string; index?: number; cause?: unknown } = {}) {
    const where = options.index !== undefined ? ` at element ${options.index}` : '';
    super({
      code: HttpClientErrorCode.TreeCoercion,
      message: `Cannot convert value "${value}"${where}: ${reason}`,
      details: { value, key: options.key, index: options.index },
      cause: options.cause,
    });
    this.name = 'TreeCoercionError';
    this.reason = reason;
  }
}

/**
 * Checks if an error is a client error.
 */
export function isHttpClientError(error: unknown): error is HttpClientError {
  return error instanceof HttpClientError;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
