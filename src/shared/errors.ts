export type RankerErrorCode =
  | "unsupported_format"
  | "corrupt_document"
  | "service_error"
  | "invalid_input";

export abstract class RankerError extends Error {
  abstract readonly code: RankerErrorCode;
}

export class UnsupportedFormatError extends RankerError {
  readonly code = "unsupported_format";

  constructor(readonly fileName: string) {
    super(`Unsupported file format: ${fileName}. Please upload PDF or DOCX.`);
    this.name = "UnsupportedFormatError";
  }
}

export class CorruptDocumentError extends RankerError {
  readonly code = "corrupt_document";

  constructor(readonly fileName: string, cause: unknown) {
    super(`Could not decode document ${fileName}: ${describeError(cause)}`, { cause });
    this.name = "CorruptDocumentError";
  }
}

/**
 * Failure of the completion service (network, auth, rate limit, malformed body).
 * Never retried here; `retryable` is a hint for callers.
 */
export class ServiceError extends RankerError {
  readonly code = "service_error";

  constructor(
    message: string,
    readonly options: { status?: number; retryable: boolean; cause?: unknown },
  ) {
    super(message, { cause: options.cause });
    this.name = "ServiceError";
  }

  get status(): number | undefined {
    return this.options.status;
  }

  get retryable(): boolean {
    return this.options.retryable;
  }
}

export class InvalidInputError extends RankerError {
  readonly code = "invalid_input";

  constructor(message: string) {
    super(message);
    this.name = "InvalidInputError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
