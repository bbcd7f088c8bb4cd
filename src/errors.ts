export type ErrorKind =
  | "AuthenticationError"
  | "FetchError"
  | "ParseError"
  | "NotFoundError"
  | "RateLimitError"
  | "ValidationError";

/** Kinds a failure can carry once it leaves a component; bugs surface as "UnexpectedError". */
export type FailureKind = ErrorKind | "UnexpectedError";

export interface Failure {
  kind: FailureKind;
  message: string;
}

export abstract class CatalogError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad credentials against the catalog site or the entity API. Never retried. */
export class AuthenticationError extends CatalogError {
  readonly kind = "AuthenticationError" as const;
}

/** Network or transport failure, or an unexpected upstream status. */
export class FetchError extends CatalogError {
  readonly kind = "FetchError" as const;

  constructor(
    message: string,
    readonly status: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A page or stored document that cannot be interpreted. */
export class ParseError extends CatalogError {
  readonly kind = "ParseError" as const;
}

export class NotFoundError extends CatalogError {
  readonly kind = "NotFoundError" as const;
}

export class RateLimitError extends CatalogError {
  readonly kind = "RateLimitError" as const;
}

/** Caller input rejected before any network call. */
export class ValidationError extends CatalogError {
  readonly kind = "ValidationError" as const;

  constructor(
    message: string,
    readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function toFailure(err: unknown): Failure {
  if (err instanceof CatalogError) {
    return { kind: err.kind, message: err.message };
  }
  return { kind: "UnexpectedError", message: errorMessage(err) };
}

export function httpStatusFor(kind: FailureKind): number {
  switch (kind) {
    case "ValidationError":
      return 400;
    case "AuthenticationError":
      return 401;
    case "NotFoundError":
      return 404;
    case "RateLimitError":
      return 429;
    case "FetchError":
    case "ParseError":
      return 502;
    case "UnexpectedError":
      return 500;
  }
}

export function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
