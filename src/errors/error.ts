import type { AuthErrorCode } from "./codes.js";

export type AuthError = {
  code: AuthErrorCode;
  message: string;
  details?: unknown;
};

export function err(
  code: AuthErrorCode,
  message: string,
  details?: unknown,
): AuthError {
  return { code, message, ...(details !== undefined ? { details } : {}) };
}

/**
 * Base class for everything this package throws.
 * `code` is stable and safe to send to clients; `message` is for humans.
 */
export class AuthCoreError extends Error {
  readonly code: AuthErrorCode;
  readonly details?: unknown;

  constructor(code: AuthErrorCode, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (details !== undefined) this.details = details;
  }

  toAuthError(): AuthError {
    return err(this.code, this.message, this.details);
  }
}

export class InvalidIdentityError extends AuthCoreError {
  constructor(message = "identity must be a non-empty username") {
    super("AUTH_INVALID_IDENTITY", message);
  }
}

/** Key material that cannot back HS256. Fatal at startup. */
export class InvalidKeyError extends AuthCoreError {
  constructor(message: string, details?: unknown) {
    super("AUTH_INVALID_KEY", message, details);
  }
}

export class InvalidTokenError extends AuthCoreError {
  constructor(message = "Token invalid", details?: unknown) {
    super("AUTH_TOKEN_INVALID", message, details);
  }
}

export class TokenExpiredError extends AuthCoreError {
  constructor(message = "Token expired") {
    super("AUTH_TOKEN_EXPIRED", message);
  }
}

export class ConfigError extends AuthCoreError {
  constructor(message: string, details?: unknown) {
    super("AUTH_CONFIG_ERROR", message, details);
  }
}

export class UsernameTakenError extends AuthCoreError {
  constructor(username: string) {
    super("EMPLOYEE_USERNAME_TAKEN", `Username: ${username} is taken`, {
      username,
    });
  }
}

export class NoRolesError extends AuthCoreError {
  constructor(username: string) {
    super("EMPLOYEE_NO_ROLES", "An employee must have at least one role", {
      username,
    });
  }
}

export class InvalidRoleError extends AuthCoreError {
  constructor(roleName: string, message: string) {
    super("EMPLOYEE_INVALID_ROLE", message, { roleName });
  }
}

export class EmployeeNotFoundError extends AuthCoreError {
  constructor(id: number) {
    super("EMPLOYEE_NOT_FOUND", `Employee with id ${id} does not exist`, {
      id,
    });
  }
}

/** Wraps a failed login or authorization result so it can be thrown. */
export class AccessDeniedError extends AuthCoreError {
  constructor(error: AuthError) {
    super(error.code, error.message, error.details);
  }
}

export function toAuthError(e: unknown): AuthError {
  if (e instanceof AuthCoreError) return e.toAuthError();
  return err("AUTH_INTERNAL_ERROR", "Internal error", { cause: String(e) });
}
