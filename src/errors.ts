export type ErrorCode =
  | "UNSUPPORTED_FORMAT"
  | "IO_ERROR"
  | "STYLE_CONFLICT"
  | "UNREACHABLE"
  | "RATE_LIMITED"
  | "INVALID_RESPONSE"
  | "CANCELLATION_REQUESTED"
  | "NOTHING_REFINED"
  | "INVALID_CONFIG";

export type ErrorInfo = {
  code: ErrorCode | "UNEXPECTED";
  message: string;
};

export class HumanizeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class UnsupportedFormatError extends HumanizeError {
  constructor(message: string) {
    super("UNSUPPORTED_FORMAT", message);
  }
}

export class DocumentIOError extends HumanizeError {
  constructor(message: string, cause?: unknown) {
    super("IO_ERROR", message, { cause });
  }
}

export class StyleConflictError extends HumanizeError {
  constructor(message: string) {
    super("STYLE_CONFLICT", message);
  }
}

export class UnreachableError extends HumanizeError {
  constructor(message: string, cause?: unknown) {
    super("UNREACHABLE", message, { cause });
  }
}

export class RateLimitedError extends HumanizeError {
  readonly retryAfterMs?: number;

  constructor(message: string, retryAfterMs?: number) {
    super("RATE_LIMITED", message);
    this.retryAfterMs = retryAfterMs;
  }
}

export class InvalidResponseError extends HumanizeError {
  constructor(message: string, cause?: unknown) {
    super("INVALID_RESPONSE", message, { cause });
  }
}

export class CancellationRequestedError extends HumanizeError {
  constructor(message = "Processing was cancelled.") {
    super("CANCELLATION_REQUESTED", message);
  }
}

export class NothingRefinedError extends HumanizeError {
  constructor(message: string) {
    super("NOTHING_REFINED", message);
  }
}

export class InvalidConfigError extends HumanizeError {
  constructor(message: string) {
    super("INVALID_CONFIG", message);
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof UnreachableError || error instanceof RateLimitedError;
}

export function toErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof HumanizeError) {
    return { code: error.code, message: error.message };
  }
  const code = typeof error === "object" && error !== null && "code" in error ? error.code : undefined;
  if (typeof code === "string" && /^E[A-Z]+$/.test(code)) {
    return {
      code: "IO_ERROR",
      message: error instanceof Error ? error.message : String(error)
    };
  }
  return {
    code: "UNEXPECTED",
    message: error instanceof Error ? error.message : "Unexpected error."
  };
}
