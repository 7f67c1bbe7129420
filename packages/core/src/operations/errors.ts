/**
 * Error classes for the operations platform client
 */

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error class for all operations platform errors
 */
export class OperationsError extends Error {
  constructor(message: string, options?: { cause?: Error }) {
    super(message);
    this.name = "OperationsError";
    this.cause = options?.cause;
  }
}

// =============================================================================
// Request Errors
// =============================================================================

/**
 * Error thrown when the platform answers with a non-success status
 */
export class OperationsApiError extends OperationsError {
  /** HTTP status code from the response */
  public readonly statusCode: number;
  /** The API endpoint that was called */
  public readonly endpoint: string;

  constructor(
    message: string,
    options: { statusCode: number; endpoint: string; cause?: Error }
  ) {
    super(message, options);
    this.name = "OperationsApiError";
    this.statusCode = options.statusCode;
    this.endpoint = options.endpoint;
  }

  isNotFound(): boolean {
    return this.statusCode === 404;
  }
}

/**
 * Error thrown when the platform rejects the token (HTTP 401)
 */
export class UnauthorizedError extends OperationsApiError {
  constructor(endpoint: string, options?: { cause?: Error }) {
    super(`Platform rejected the token (401) for ${endpoint}`, {
      statusCode: 401,
      endpoint,
      cause: options?.cause,
    });
    this.name = "UnauthorizedError";
  }
}

/**
 * Error thrown on transport failures, timeouts and transient statuses
 */
export class NetworkError extends OperationsError {
  /** The API endpoint that was called */
  public readonly endpoint: string;
  /** HTTP status code, absent when no response arrived */
  public readonly statusCode?: number;

  constructor(
    message: string,
    options: { endpoint: string; statusCode?: number; cause?: Error }
  ) {
    super(message, options);
    this.name = "NetworkError";
    this.endpoint = options.endpoint;
    this.statusCode = options.statusCode;
  }

  /**
   * Check if the request may succeed when repeated
   */
  isRetryable(): boolean {
    if (this.statusCode === undefined) {
      return true;
    }
    return (
      this.statusCode === 408 ||
      this.statusCode === 429 ||
      (this.statusCode >= 500 && this.statusCode < 600)
    );
  }
}

// =============================================================================
// Domain Errors
// =============================================================================

/**
 * Error thrown when no usable token can be obtained, or the platform keeps
 * rejecting fresh tokens
 */
export class AuthError extends OperationsError {
  constructor(message: string, options?: { cause?: Error }) {
    super(message, options);
    this.name = "AuthError";
  }
}

/**
 * Error thrown when an explicitly named VM does not exist on the platform
 */
export class VmNotFoundError extends OperationsError {
  public readonly vmName: string;

  constructor(vmName: string) {
    super(`VM "${vmName}" was not found on the operations platform`);
    this.name = "VmNotFoundError";
    this.vmName = vmName;
  }
}

/**
 * Error thrown when a response body does not have the expected shape
 */
export class UnexpectedResponseError extends OperationsError {
  public readonly endpoint: string;

  constructor(message: string, endpoint: string, options?: { cause?: Error }) {
    super(message, options);
    this.name = "UnexpectedResponseError";
    this.endpoint = endpoint;
  }
}
