// errors.ts - Error Types and Helpers

// =============================================================================
// CATEGORIES
// =============================================================================

export const ERROR_CATEGORIES = [
  'validation',
  'auth',
  'not_found',
  'transport',
  'api',
  'timeout',
  'cancelled',
  'schema',
  'internal',
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

export type LifecycleOperation = 'create' | 'read' | 'delete';

interface ErrorOptions {
  code?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/** Base error class for all riftctl errors */
export class RiftError extends Error {
  readonly code: string;
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(
    code: string,
    message: string,
    category: ErrorCategory,
    options?: { details?: Record<string, unknown>; cause?: unknown },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'RiftError';
    this.code = code;
    this.category = category;
    this.details = options?.details;
  }
}

// =============================================================================
// TAXONOMY
// =============================================================================

/** Missing or malformed input, raised before any network call */
export class ValidationError extends RiftError {
  constructor(message: string, options?: ErrorOptions) {
    super(options?.code ?? 'INVALID_INPUT', message, 'validation', options);
    this.name = 'ValidationError';
  }
}

/** Token rejected, or the identity behind it is empty */
export class AuthenticationError extends RiftError {
  constructor(message: string, options?: ErrorOptions) {
    super(options?.code ?? 'UNAUTHORIZED', message, 'auth', options);
    this.name = 'AuthenticationError';
  }
}

/**
 * The targeted resource does not exist. Raised for HTTP 404 and for by-id
 * lookups that find the resource Inactive.
 */
export class NotFoundError extends RiftError {
  readonly resourceType: string;
  readonly resourceId: string;

  constructor(resourceType: string, resourceId: string, options?: { cause?: unknown }) {
    super(
      `${resourceType.toUpperCase().replace(/[^A-Z0-9]+/g, '_')}_NOT_FOUND`,
      `${resourceType} ${resourceId} not found`,
      'not_found',
      { details: { resourceType, resourceId }, cause: options?.cause },
    );
    this.name = 'NotFoundError';
    this.resourceType = resourceType;
    this.resourceId = resourceId;
  }
}

/** Network-level failure that survived every retry */
export class TransportError extends RiftError {
  readonly retries: number;

  constructor(url: string, retries: number, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? options.cause.message : String(options?.cause);
    super(
      'NETWORK_ERROR',
      `request ${url} failed: ${reason}, the failed request was retried: ${retries}x`,
      'transport',
      { details: { url, retries }, cause: options?.cause },
    );
    this.name = 'TransportError';
    this.retries = retries;
  }
}

/** Non-2xx, non-404 response */
export class ApiError extends RiftError {
  readonly url: string;
  readonly status: number;
  readonly body: string;

  constructor(url: string, status: number, body: string, options?: { code?: string }) {
    super(
      options?.code ?? 'API_ERROR',
      `request ${url} failed: ${status}: body: ${body}`,
      'api',
      { details: { url, status, body } },
    );
    this.name = 'ApiError';
    this.url = url;
    this.status = status;
    this.body = body;
  }
}

/** Provisioning deadline exceeded */
export class TimeoutError extends RiftError {
  constructor(message: string, options?: ErrorOptions) {
    super(options?.code ?? 'OPERATION_TIMEOUT', message, 'timeout', options);
    this.name = 'TimeoutError';
  }
}

/** External cancellation observed while polling */
export class CancellationError extends RiftError {
  constructor(message: string, options?: ErrorOptions) {
    super(options?.code ?? 'OPERATION_CANCELLED', message, 'cancelled', options);
    this.name = 'CancellationError';
  }
}

/** A success status whose body does not have the expected shape. Never retried. */
export class SchemaError extends RiftError {
  readonly operation: string;

  constructor(operation: string, message: string, options?: ErrorOptions) {
    super(options?.code ?? 'INVALID_RESPONSE', `${operation}: ${message}`, 'schema', options);
    this.name = 'SchemaError';
    this.operation = operation;
  }
}

// =============================================================================
// LIFECYCLE OPERATION WRAPPERS
// =============================================================================

/** Wraps an underlying failure with the lifecycle operation and instance it hit */
export class LifecycleError extends RiftError {
  readonly operation: LifecycleOperation;
  readonly instanceId?: string;

  constructor(
    operation: LifecycleOperation,
    message: string,
    options?: { instanceId?: string; code?: string; cause?: unknown; details?: Record<string, unknown> },
  ) {
    const underlying = options?.cause;
    super(
      options?.code ?? `${operation.toUpperCase()}_FAILED`,
      message,
      underlying instanceof RiftError ? underlying.category : 'internal',
      {
        details: { ...options?.details, operation, instanceId: options?.instanceId },
        cause: underlying,
      },
    );
    this.name = 'LifecycleError';
    this.operation = operation;
    this.instanceId = options?.instanceId;
  }
}

export class CreateError extends LifecycleError {
  constructor(
    message: string,
    options?: { instanceId?: string; code?: string; cause?: unknown; details?: Record<string, unknown> },
  ) {
    super('create', message, options);
    this.name = 'CreateError';
  }
}

export class ReadError extends LifecycleError {
  constructor(message: string, options?: { instanceId?: string; cause?: unknown }) {
    super('read', message, options);
    this.name = 'ReadError';
  }
}

export class DeleteError extends LifecycleError {
  constructor(message: string, options?: { instanceId?: string; cause?: unknown }) {
    super('delete', message, options);
    this.name = 'DeleteError';
  }
}

// =============================================================================
// ERROR CODES BY CATEGORY
// =============================================================================

export const ERROR_CODES_BY_CATEGORY: Record<ErrorCategory, string[]> = {
  validation: ['INVALID_INPUT', 'MISSING_REQUIRED_FIELD', 'INVALID_FORMAT'],
  auth: ['UNAUTHORIZED', 'INVALID_TOKEN'],
  not_found: ['RESOURCE_NOT_FOUND', 'INSTANCE_NOT_FOUND', 'SSH_KEY_NOT_FOUND', 'RECIPE_NOT_FOUND'],
  transport: ['NETWORK_ERROR'],
  api: ['API_ERROR'],
  timeout: ['OPERATION_TIMEOUT'],
  cancelled: ['OPERATION_CANCELLED'],
  schema: ['INVALID_RESPONSE', 'MISSING_PAYLOAD'],
  internal: ['INTERNAL_ERROR', 'NO_VM_RECIPES', 'UNEXPECTED_INSTANCE_COUNT'],
};

/** Determine error category from an error code string */
export function categoryForCode(code: string): ErrorCategory {
  for (const category of ERROR_CATEGORIES) {
    if (ERROR_CODES_BY_CATEGORY[category].includes(code)) {
      return category;
    }
  }
  return 'internal';
}

// =============================================================================
// HELPERS
// =============================================================================

export function isRiftError(err: unknown): err is RiftError {
  return err instanceof RiftError;
}

/**
 * The NotFound sentinel test. Only a direct NotFoundError counts; a lifecycle
 * wrapper around one does not, so idempotent paths never swallow a wrapped
 * failure by accident.
 */
export function isNotFound(err: unknown): err is NotFoundError {
  return err instanceof NotFoundError;
}

/** Flatten an error and its cause chain into a single message */
export function describeError(err: unknown): string {
  const parts: string[] = [];
  let current: unknown = err;
  const seen = new Set<unknown>();
  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    if (current instanceof Error) {
      parts.push(current.message);
      current = current.cause;
    } else {
      parts.push(String(current));
      break;
    }
  }
  return parts.join(': ');
}
