// provider/errors.ts - Provider Error Taxonomy

import type { ProviderName } from "./types";

// =============================================================================
// Error Codes & Categories
// =============================================================================

export type ProviderOperationErrorCode =
  | "AUTH_ERROR"
  | "RATE_LIMIT_ERROR"
  | "QUOTA_EXCEEDED"
  | "INVALID_SPEC"
  | "NETWORK_ERROR"
  | "TIMEOUT_ERROR"
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "INVALID_STATE"
  | "PROVIDER_INTERNAL"
  | "COMMAND_FAILED";

export type ProviderOperationErrorCategory =
  | "capacity"
  | "auth"
  | "rate_limit"
  | "validation"
  | "not_found"
  | "conflict"
  | "internal";

// =============================================================================
// Base Error Class
// =============================================================================

export abstract class ProviderOperationError extends Error {
  abstract readonly code: ProviderOperationErrorCode;
  abstract readonly category: ProviderOperationErrorCategory;
  abstract readonly retryable: boolean;
  abstract readonly retry_after_ms?: number;

  constructor(
    message: string,
    public readonly provider: ProviderName,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Concrete provider error for use by all providers. Providers pass their
 * name and error details; no subclass needed.
 */
export class ConcreteProviderError extends ProviderOperationError {
  readonly code: ProviderOperationErrorCode;
  readonly category: ProviderOperationErrorCategory;
  readonly retryable: boolean;
  readonly retry_after_ms?: number;

  constructor(
    provider: ProviderName,
    code: ProviderOperationErrorCode,
    message: string,
    options?: {
      retryable?: boolean;
      retry_after_ms?: number;
      details?: Record<string, unknown>;
    }
  ) {
    super(message, provider, options?.details);
    this.code = code;
    this.category = categorizeErrorCode(code);
    this.retryable = options?.retryable ?? false;
    this.retry_after_ms = options?.retry_after_ms;
  }
}

// =============================================================================
// AWS Error Mapping
// =============================================================================

function readStringField(err: object, field: string): string | undefined {
  const value: unknown = Reflect.get(err, field);
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/** Extract the error code from an AWS SDK v3 error (exposed via .name / .Code / .code) */
export function getAwsErrorCode(err: unknown): string {
  if (err && typeof err === "object") {
    return readStringField(err, "name") ?? readStringField(err, "Code") ?? readStringField(err, "code") ?? "Unknown";
  }
  return "Unknown";
}

/** HTTP status of an AWS SDK v3 error, when the response got that far */
export function getAwsHttpStatus(err: unknown): number | undefined {
  if (!err || typeof err !== "object") return undefined;
  const metadata: unknown = Reflect.get(err, "$metadata");
  if (!metadata || typeof metadata !== "object") return undefined;
  const status: unknown = Reflect.get(metadata, "httpStatusCode");
  return typeof status === "number" ? status : undefined;
}

/**
 * Map AWS error codes (EKS, S3, EC2, IAM, ECR, STS) to the provider error
 * taxonomy.
 */
export function mapAwsError(err: unknown): ProviderOperationError {
  if (err instanceof ProviderOperationError) return err;

  const awsCode = getAwsErrorCode(err);
  const message = err instanceof Error ? err.message : String(err);
  const details = { awsCode };

  switch (awsCode) {
    case "AuthFailure":
    case "UnauthorizedAccess":
    case "UnrecognizedClientException":
    case "InvalidClientTokenId":
    case "SignatureDoesNotMatch":
    case "ExpiredToken":
    case "ExpiredTokenException":
    case "AccessDenied":
    case "AccessDeniedException":
      return new ConcreteProviderError("aws", "AUTH_ERROR", message, { details });
    case "RequestLimitExceeded":
    case "Throttling":
    case "ThrottlingException":
    case "TooManyRequestsException":
    case "SlowDown":
      return new ConcreteProviderError("aws", "RATE_LIMIT_ERROR", message, { retryable: true, retry_after_ms: 5000, details });
    case "ResourceNotFoundException":
    case "RepositoryNotFoundException":
    case "NoSuchEntity":
    case "NoSuchEntityException":
    case "NoSuchBucket":
    case "NotFound":
    case "InvalidVpcEndpointId.NotFound":
    case "InvalidVpcID.NotFound":
      return new ConcreteProviderError("aws", "NOT_FOUND", message, { details });
    case "ResourceInUseException":
    case "RepositoryAlreadyExistsException":
    case "EntityAlreadyExists":
    case "EntityAlreadyExistsException":
    case "BucketAlreadyOwnedByYou":
    case "RouteAlreadyExists":
      return new ConcreteProviderError("aws", "ALREADY_EXISTS", message, { details });
    case "BucketAlreadyExists":
      // Name taken by another account: creating again will never succeed
      return new ConcreteProviderError("aws", "INVALID_STATE", message, { details });
    case "LimitExceeded":
    case "LimitExceededException":
    case "VpcEndpointLimitExceeded":
    case "TooManyBuckets":
      return new ConcreteProviderError("aws", "QUOTA_EXCEEDED", message, { details });
    case "DeleteConflict":
    case "DeleteConflictException":
    case "RepositoryNotEmptyException":
    case "BucketNotEmpty":
      return new ConcreteProviderError("aws", "INVALID_STATE", message, { details });
    case "InvalidParameterValue":
    case "InvalidParameterException":
    case "InvalidParameterCombination":
    case "MalformedPolicyDocument":
    case "ValidationError":
      return new ConcreteProviderError("aws", "INVALID_SPEC", message, { details });
    case "ServiceUnavailable":
    case "ServiceUnavailableException":
    case "ServerException":
    case "InternalError":
    case "InternalFailure":
      return new ConcreteProviderError("aws", "PROVIDER_INTERNAL", message, { retryable: true, details });
    case "TimeoutError":
    case "RequestTimeout":
      return new ConcreteProviderError("aws", "TIMEOUT_ERROR", message, { retryable: true, details });
    case "ECONNRESET":
    case "ECONNREFUSED":
    case "ENOTFOUND":
    case "EPIPE":
    case "NetworkingError":
      return new ConcreteProviderError("aws", "NETWORK_ERROR", message, { retryable: true, details });
  }

  const status = getAwsHttpStatus(err);
  if (status === 404) {
    return new ConcreteProviderError("aws", "NOT_FOUND", message, { details: { ...details, status } });
  }
  if (status !== undefined && status >= 500) {
    return new ConcreteProviderError("aws", "PROVIDER_INTERNAL", message, { retryable: true, details: { ...details, status } });
  }
  return new ConcreteProviderError("aws", "PROVIDER_INTERNAL", message, { details });
}

// =============================================================================
// Error Handling Helpers
// =============================================================================

export function mapProviderOperationError(
  provider: ProviderName,
  error: unknown
): ProviderOperationError {
  if (error instanceof ProviderOperationError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new ConcreteProviderError(provider, "PROVIDER_INTERNAL", message, {
    details: { originalError: error },
  });
}

/**
 * Wrap an async provider operation with error mapping.
 * Catches non-ProviderOperationError exceptions and maps them using the
 * provided mapper function (or falls back to mapProviderOperationError).
 *
 * Usage:
 *   await withProviderErrorMapping("aws", async () => { ... }, mapAwsError);
 */
export async function withProviderErrorMapping<T>(
  provider: ProviderName,
  fn: () => Promise<T>,
  mapper?: (error: unknown) => ProviderOperationError,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof ProviderOperationError) throw error;
    if (mapper) throw mapper(error);
    throw mapProviderOperationError(provider, error);
  }
}

export function categorizeErrorCode(code: ProviderOperationErrorCode): ProviderOperationErrorCategory {
  switch (code) {
    case "QUOTA_EXCEEDED":
      return "capacity";
    case "AUTH_ERROR":
      return "auth";
    case "RATE_LIMIT_ERROR":
      return "rate_limit";
    case "INVALID_SPEC":
      return "validation";
    case "NOT_FOUND":
      return "not_found";
    case "ALREADY_EXISTS":
    case "INVALID_STATE":
      return "conflict";
    default:
      return "internal";
  }
}

export function shouldRetry(error: ProviderOperationError): boolean {
  return error.retryable && error.category !== "auth";
}

/** The resource a create call targeted is already there */
export function isAlreadyExists(error: unknown): boolean {
  return error instanceof ProviderOperationError && error.code === "ALREADY_EXISTS";
}

/** The resource a describe/delete call targeted is not there */
export function isNotFound(error: unknown): boolean {
  return error instanceof ProviderOperationError && error.code === "NOT_FOUND";
}
