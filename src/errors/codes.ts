export const AUTH_ERROR_CODES = [
  "AUTH_INVALID_CREDENTIALS",
  "AUTH_USER_LOCKED",
  "AUTH_USER_DISABLED",
  "AUTH_NO_ROLES",
  "AUTH_INVALID_IDENTITY",
  "AUTH_INVALID_KEY",
  "AUTH_TOKEN_MISSING",
  "AUTH_TOKEN_INVALID",
  "AUTH_TOKEN_EXPIRED",
  "AUTH_FORBIDDEN",
  "AUTH_CONFIG_ERROR",
  "AUTH_INTERNAL_ERROR",
  "EMPLOYEE_USERNAME_TAKEN",
  "EMPLOYEE_NO_ROLES",
  "EMPLOYEE_INVALID_ROLE",
  "EMPLOYEE_NOT_FOUND",
] as const;

export type AuthErrorCode = (typeof AUTH_ERROR_CODES)[number];
