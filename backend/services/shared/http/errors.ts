// backend/services/shared/http/errors.ts
/**
 * Typed request failures. Handlers throw (or next()) these; the shared
 * errorProblemJson middleware turns them into RFC 7807 Problem+JSON.
 */

export type ProblemCode =
  | "NOT_FOUND"
  | "CONFLICT"
  | "UNAUTHORIZED"
  | "INVALID_CREDENTIALS"
  | "VALIDATION_ERROR";

export class HttpProblemError extends Error {
  public readonly status: number;
  public readonly title: string;
  public readonly code: ProblemCode;

  constructor(status: number, title: string, code: ProblemCode, detail: string) {
    super(detail);
    this.name = "HttpProblemError";
    this.status = status;
    this.title = title;
    this.code = code;
  }
}

export class BadRequestError extends HttpProblemError {
  constructor(detail: string) {
    super(400, "Bad Request", "VALIDATION_ERROR", detail);
    this.name = "BadRequestError";
  }
}

export class NotFoundError extends HttpProblemError {
  constructor(detail = "Resource not found") {
    super(404, "Not Found", "NOT_FOUND", detail);
    this.name = "NotFoundError";
  }
}

/** Uniqueness, duplication and deletion-blocked failures. Reported as 400. */
export class ConflictError extends HttpProblemError {
  constructor(detail: string) {
    super(400, "Bad Request", "CONFLICT", detail);
    this.name = "ConflictError";
  }
}

export class UnauthorizedError extends HttpProblemError {
  constructor(detail = "Could not validate credentials") {
    super(401, "Unauthorized", "UNAUTHORIZED", detail);
    this.name = "UnauthorizedError";
  }
}

/** One message for both unknown user and wrong password. */
export class InvalidCredentialsError extends HttpProblemError {
  constructor() {
    super(400, "Bad Request", "INVALID_CREDENTIALS", "Incorrect username or password");
    this.name = "InvalidCredentialsError";
  }
}

export function isHttpProblemError(err: unknown): err is HttpProblemError {
  return err instanceof HttpProblemError;
}
