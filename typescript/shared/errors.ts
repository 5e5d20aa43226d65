export class AuditError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends AuditError {
  constructor(message: string) {
    super("VALIDATION_ERROR", message);
  }
}

export class ConfigError extends AuditError {
  constructor(message: string) {
    super("CONFIG_ERROR", message);
  }
}

/**
 * Non-2xx response, or a body that does not match the expected shape.
 */
export class UpstreamError extends AuditError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super("UPSTREAM_ERROR", message);
    this.status = status;
  }
}

export class CheckTimeoutError extends AuditError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super("CHECK_TIMEOUT", `Check timed out after ${timeoutMs}ms`);
    this.timeoutMs = timeoutMs;
  }
}

export class AuditFailedError extends AuditError {
  readonly pagesPlanned: number;

  constructor(pagesPlanned: number) {
    super("AUDIT_FAILED", "No pages could be audited");
    this.pagesPlanned = pagesPlanned;
  }
}

export function errorMessage(error: unknown, fallback = "Unknown error"): string {
  if (error instanceof Error) {
    return error.message || fallback;
  }
  return typeof error === "string" && error ? error : fallback;
}
