/**
 * Egress Handler Errors
 *
 * Every error raised by the handler carries its classification from the point
 * where it is created: a wire code, and whether it is an infrastructure fault
 * (fatal) or attributable to the request.
 */

export type ErrorCode =
  | "not_found"
  | "deadline_exceeded"
  | "invalid_argument"
  | "unavailable"
  | "internal";

const ERROR_CODES: readonly ErrorCode[] = [
  "not_found",
  "deadline_exceeded",
  "invalid_argument",
  "unavailable",
  "internal",
];

export type EgressErrorOptions = {
  code?: ErrorCode;
  fatal?: boolean;
  cause?: unknown;
};

export class EgressError extends Error {
  readonly code: ErrorCode;
  readonly fatal: boolean;

  constructor(message: string, options: EgressErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "EgressError";
    this.code = options.code ?? "internal";
    this.fatal = options.fatal ?? false;
  }
}

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === "string" && ERROR_CODES.some((code) => code === value);
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function errorCodeOf(err: unknown): ErrorCode {
  return err instanceof EgressError ? err.code : "internal";
}

/** Tag an error as an infrastructure fault */
export function fatal(err: unknown): EgressError {
  if (err instanceof EgressError && err.fatal) {
    return err;
  }
  return new EgressError(toErrorMessage(err), {
    code: errorCodeOf(err),
    fatal: true,
    cause: err,
  });
}

export function isFatal(err: unknown): boolean {
  return err instanceof EgressError && err.fatal;
}

export function userError(message: string, code: ErrorCode = "invalid_argument"): EgressError {
  return new EgressError(message, { code });
}

export function errEgressNotFound(): EgressError {
  return new EgressError("egress not found", { code: "not_found" });
}

export function deadlineExceeded(message: string): EgressError {
  return new EgressError(message, { code: "deadline_exceeded" });
}
