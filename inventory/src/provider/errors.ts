// provider/errors.ts - Provider Error Taxonomy

import { err, ok, type ProviderName, type Result } from "@amiwatch/contracts";

// =============================================================================
// Error Codes & Categories
// =============================================================================

export type ProviderOperationErrorCode =
  | "AUTH_ERROR"
  | "RATE_LIMIT_ERROR"
  | "INVALID_REQUEST"
  | "REGION_UNAVAILABLE"
  | "NETWORK_ERROR"
  | "NOT_FOUND"
  | "PROVIDER_INTERNAL";

export type ProviderOperationErrorCategory =
  | "auth"
  | "rate_limit"
  | "validation"
  | "not_found"
  | "network"
  | "internal";

// =============================================================================
// Base Error Class
// =============================================================================

export abstract class ProviderOperationError extends Error {
  abstract readonly code: ProviderOperationErrorCode;
  abstract readonly category: ProviderOperationErrorCategory;
  abstract readonly retryable: boolean;

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
 * Concrete provider error for use by all providers.
 * Providers pass their name and error details; no subclass needed.
 */
export class ConcreteProviderError extends ProviderOperationError {
  readonly code: ProviderOperationErrorCode;
  readonly category: ProviderOperationErrorCategory;
  readonly retryable: boolean;

  constructor(
    provider: ProviderName,
    code: ProviderOperationErrorCode,
    message: string,
    options?: {
      retryable?: boolean;
      details?: Record<string, unknown>;
    }
  ) {
    super(message, provider, options?.details);
    this.code = code;
    this.category = categorizeErrorCode(code);
    this.retryable = options?.retryable ?? false;
  }
}

// =============================================================================
// Error Handling Helpers
// =============================================================================

export type ProviderResult<T> = Result<T, ProviderOperationError>;

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
 * Run a provider call and capture any failure as a typed error instead of
 * throwing. Non-ProviderOperationError exceptions go through `mapper` (or
 * mapProviderOperationError when none is given).
 *
 * Usage:
 *   const result = await withProviderResult("aws", async () => { ... }, toEC2Error);
 *   if (!result.ok) console.error(result.error.message);
 */
export async function withProviderResult<T>(
  provider: ProviderName,
  fn: () => Promise<T>,
  mapper?: (error: unknown) => ProviderOperationError,
): Promise<ProviderResult<T>> {
  try {
    return ok(await fn());
  } catch (error) {
    if (error instanceof ProviderOperationError) return err(error);
    return err(mapper ? mapper(error) : mapProviderOperationError(provider, error));
  }
}

export function categorizeErrorCode(code: ProviderOperationErrorCode): ProviderOperationErrorCategory {
  switch (code) {
    case "AUTH_ERROR":
      return "auth";
    case "RATE_LIMIT_ERROR":
      return "rate_limit";
    case "INVALID_REQUEST":
    case "REGION_UNAVAILABLE":
      return "validation";
    case "NOT_FOUND":
      return "not_found";
    case "NETWORK_ERROR":
      return "network";
    default:
      return "internal";
  }
}
