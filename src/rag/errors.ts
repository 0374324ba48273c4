/**
 * Error kinds raised by the pipeline.
 *
 * Configuration problems are fatal at startup. Failures of an external service
 * (embedding, generation, PubMed, document download) surface as `ServiceError`,
 * or `ServiceTimeoutError` when the call ran past its timeout.
 */

export class RagError extends Error {
  readonly code: string;

  constructor(message: string, code: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
  }
}

export class ConfigError extends RagError {
  constructor(message: string, cause?: unknown) {
    super(message, "CONFIG_INVALID", cause);
  }
}

export type ServiceName = "embedding" | "generation" | "pubmed" | "download";

export class ServiceError extends RagError {
  readonly service: ServiceName;
  readonly status?: number;

  constructor(
    service: ServiceName,
    message: string,
    options: { status?: number; code?: string; cause?: unknown } = {},
  ) {
    super(message, options.code ?? "SERVICE_FAILED", options.cause);
    this.service = service;
    this.status = options.status;
  }
}

export class ServiceTimeoutError extends ServiceError {
  readonly timeoutMs: number;

  constructor(service: ServiceName, timeoutMs: number, cause?: unknown) {
    super(service, `${service} call timed out after ${timeoutMs}ms`, {
      code: "SERVICE_TIMEOUT",
      cause,
    });
    this.timeoutMs = timeoutMs;
  }
}

/**
 * False for client errors a retry cannot fix (4xx other than 429). Timeouts,
 * transport failures and 5xx responses are transient.
 */
export function isTransientError(err: unknown): boolean {
  if (!(err instanceof ServiceError) || err.status === undefined) return true;
  return err.status >= 500 || err.status === 429;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
