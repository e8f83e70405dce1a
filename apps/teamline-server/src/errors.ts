export type ErrorCode =
  | "AUTHENTICATION_FAILED"
  | "ACCESS_DENIED"
  | "VALIDATION_FAILED"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "PROTOCOL_ERROR";

/** Base for every failure a client is allowed to see */
export class ChatError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly statusCode: number
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Missing or invalid bearer token */
export class AuthenticationError extends ChatError {
  constructor(message = "Invalid token") {
    super("AUTHENTICATION_FAILED", message, 401);
  }
}

/** Caller is not a member of the scope */
export class AuthorizationError extends ChatError {
  constructor(message = "Access denied") {
    super("ACCESS_DENIED", message, 403);
  }
}

export class ValidationError extends ChatError {
  constructor(message: string) {
    super("VALIDATION_FAILED", message, 400);
  }
}

/** Member of the scope, but not allowed to touch this message */
export class ForbiddenError extends ChatError {
  constructor(message: string) {
    super("FORBIDDEN", message, 403);
  }
}

export class NotFoundError extends ChatError {
  constructor(message: string) {
    super("NOT_FOUND", message, 404);
  }
}

export class ProtocolError extends ChatError {
  constructor(message: string) {
    super("PROTOCOL_ERROR", message, 400);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
