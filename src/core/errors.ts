/**
 * Domain error hierarchy. Use these instead of generic Error.
 * `retryable` is the explicit tag the retry executor dispatches on.
 */

export interface DomainErrorOptions {
  retryable?: boolean;
  cause?: unknown;
}

export class DomainError extends Error {
  readonly retryable: boolean;

  constructor(
    message: string,
    public readonly code: string = "INTERNAL_ERROR",
    options: DomainErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "DomainError";
    this.retryable = options.retryable ?? false;
  }
}

export class ConfigurationError extends DomainError {
  constructor(message: string, options: { cause?: unknown; code?: string } = {}) {
    super(message, options.code ?? "CONFIGURATION_ERROR", { cause: options.cause });
    this.name = "ConfigurationError";
  }
}

export class ProviderNotRegisteredError extends ConfigurationError {
  constructor(public readonly providerId: string) {
    super(`There is no provider registered for: ${providerId}`, { code: "PROVIDER_NOT_REGISTERED" });
    this.name = "ProviderNotRegisteredError";
  }
}

export class ValidationError extends DomainError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class NotFoundError extends DomainError {
  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`, "NOT_FOUND");
    this.name = "NotFoundError";
  }
}

export class TimeoutError extends DomainError {
  constructor(
    public readonly operation: string,
    public readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, "TIMEOUT", { retryable: true });
    this.name = "TimeoutError";
  }
}

export class TransientNetworkError extends DomainError {
  constructor(message: string, cause?: unknown) {
    super(message, "TRANSIENT_NETWORK_ERROR", { retryable: true, cause });
    this.name = "TransientNetworkError";
  }
}

export class RequestExhaustedError extends DomainError {
  constructor(
    public readonly entityId: string,
    public readonly attempts: number,
    cause?: unknown
  ) {
    super(`Could not fetch ${entityId} in ${attempts} attempts`, "REQUEST_EXHAUSTED", { cause });
    this.name = "RequestExhaustedError";
  }
}

export class AmbiguousTargetError extends DomainError {
  constructor(
    public readonly keyName: string,
    public readonly valueName: string,
    public readonly matches: number
  ) {
    super(
      `Custom target ${keyName}=${valueName} is not unique (${matches} matches)`,
      "AMBIGUOUS_TARGET"
    );
    this.name = "AmbiguousTargetError";
  }
}

export class AdapterError extends DomainError {
  constructor(
    message: string,
    public readonly adapterType?: string,
    cause?: unknown
  ) {
    super(message, "ADAPTER_ERROR", { cause });
    this.name = "AdapterError";
  }
}

/** True when the failure is tagged as worth an immediate retry. */
export function isRetryable(err: unknown): boolean {
  return err instanceof DomainError && err.retryable;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
