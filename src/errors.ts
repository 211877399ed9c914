import type { ContentfulStatusCode } from "hono/utils/http-status";

export type Result<T, E = ErrorOutcome> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const err = <E>(error: E): { ok: false; error: E } => ({ ok: false, error });

export type AuthErrorKind = "auth.missing" | "auth.invalid" | "auth.expired";

export type ValidationErrorKind =
  | "validation.no_files"
  | "validation.too_many_files"
  | "validation.unsupported_extension"
  | "validation.unsupported_content_type"
  | "validation.invalid_body"
  | "validation.payload_too_large";

export type UpstreamErrorKind =
  | "upstream.transient"
  | "upstream.permanent"
  | "upstream.malformed_response";

export interface AuthError {
  kind: AuthErrorKind;
  message: string;
}

export interface RateLimitExceeded {
  kind: "rate_limited";
  message: string;
  retryAfterSeconds: number;
}

export interface ValidationError {
  kind: ValidationErrorKind;
  message: string;
  /** 1-based position of the offending image, when the failure concerns one file. */
  position?: number;
}

export interface UpstreamFailure {
  kind: UpstreamErrorKind;
  message: string;
  providerStatus?: number;
  timedOut?: boolean;
}

export interface InternalError {
  kind: "internal";
  message: string;
}

export interface NotFoundError {
  kind: "not_found";
  message: string;
}

export type ErrorOutcome =
  | AuthError
  | RateLimitExceeded
  | ValidationError
  | UpstreamFailure
  | InternalError
  | NotFoundError;

export type ErrorKind = ErrorOutcome["kind"];

export const INTERNAL_ERROR_MESSAGE = "Internal server error";

export const internalError = (): InternalError => ({
  kind: "internal",
  message: INTERNAL_ERROR_MESSAGE,
});

/**
 * Thrown inside the upstream client and caught at its boundary; never escapes the pipeline.
 */
export class UpstreamError extends Error {
  constructor(
    public readonly kind: UpstreamErrorKind,
    message: string,
    public readonly providerStatus?: number,
    public readonly timedOut = false,
  ) {
    super(message);
    this.name = "UpstreamError";
  }

  get retryable(): boolean {
    return this.kind === "upstream.transient";
  }

  toOutcome(): UpstreamFailure {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.providerStatus !== undefined && { providerStatus: this.providerStatus }),
      ...(this.timedOut && { timedOut: true }),
    };
  }
}

export function statusForError(error: ErrorOutcome): ContentfulStatusCode {
  switch (error.kind) {
    case "auth.missing":
    case "auth.invalid":
    case "auth.expired":
      return 401;
    case "rate_limited":
      return 429;
    case "validation.payload_too_large":
      return 413;
    case "validation.no_files":
    case "validation.too_many_files":
    case "validation.unsupported_extension":
    case "validation.unsupported_content_type":
    case "validation.invalid_body":
      return 400;
    case "upstream.transient":
      return error.timedOut ? 504 : 502;
    case "upstream.permanent":
    case "upstream.malformed_response":
      return 502;
    case "not_found":
      return 404;
    case "internal":
      return 500;
  }
}

export interface ErrorResponseBody {
  error_kind: ErrorKind;
  message: string;
}

export function toErrorResponse(error: ErrorOutcome): {
  status: ContentfulStatusCode;
  body: ErrorResponseBody;
} {
  return {
    status: statusForError(error),
    body: {
      error_kind: error.kind,
      message: error.kind === "internal" ? INTERNAL_ERROR_MESSAGE : error.message,
    },
  };
}
