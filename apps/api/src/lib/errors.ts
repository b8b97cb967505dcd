export type ErrorKind = "validation" | "not_found" | "conflict" | "internal";

export class HttpError extends Error {
  readonly statusCode: number;
  readonly kind: ErrorKind;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown, kind: ErrorKind = "internal") {
    super(message);
    this.name = "HttpError";
    this.statusCode = statusCode;
    this.kind = kind;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Input is malformed or outside loan policy. */
export class ValidationError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(400, message, details, "validation");
    this.name = "ValidationError";
  }
}

/** A referenced author, book, reader or loan does not exist. */
export class NotFoundError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(404, message, details, "not_found");
    this.name = "NotFoundError";
  }
}

/** The requested transition is impossible given the stored records. */
export class ConflictError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(409, message, details, "conflict");
    this.name = "ConflictError";
  }
}
