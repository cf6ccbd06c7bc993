import type {
  AccessGuard,
  CredentialChecker,
  EmployeeRepository,
  ManagerPrincipal,
  PasswordHasher,
  RoleProvider,
} from "../adapters/types.js";
import { AccessDeniedError, err } from "../errors/error.js";
import type { AuthCore } from "../types.js";

const BEARER = /^Bearer\s+(\S+)\s*$/i;

export function extractBearerToken(
  authorizationHeader: string | undefined,
): string | undefined {
  const m = authorizationHeader?.match(BEARER);
  return m?.[1];
}

/** Username/password check against stored employees. Soft-deleted employees are disabled. */
export function createEmployeeCredentialChecker(
  employees: EmployeeRepository,
  passwordHasher: PasswordHasher,
): CredentialChecker {
  return {
    async checkUserNamePassword(principal, password) {
      const employee = await employees.findByUsername(principal);
      if (!employee) return { ok: false, reason: "USER_NOT_FOUND" };
      if (employee.deleted) return { ok: false, reason: "USER_DISABLED" };

      const matches = await passwordHasher.verify(
        password,
        employee.passwordHash,
      );
      if (!matches) return { ok: false, reason: "INVALID_CREDENTIALS" };

      return {
        ok: true,
        userId: String(employee.id),
        username: employee.username,
      };
    },
  };
}

export function createEmployeeRoleProvider(
  employees: EmployeeRepository,
): RoleProvider {
  return {
    async getUserRoles(userId) {
      const employee = await employees.findById(Number(userId));
      return employee ? employee.roles : [];
    },
  };
}

/**
 * In-process replacement for asking a remote security service whether the
 * caller may manage employees: the bearer token must verify and carry one of
 * `managerRoles`.
 */
export function createBearerAccessGuard(
  authCore: AuthCore,
  managerRoles: string[],
): AccessGuard {
  return {
    async requireManager(authorizationHeader): Promise<ManagerPrincipal> {
      const token = extractBearerToken(authorizationHeader);
      if (!token) {
        throw new AccessDeniedError(
          err("AUTH_TOKEN_MISSING", "Bearer token is required"),
        );
      }

      const decision = await authCore.doAuthorize({
        token,
        required: { anyRoles: managerRoles },
      });
      if (!decision.ok) throw new AccessDeniedError(decision.error);

      return { username: decision.username, authorities: decision.authorities };
    },
  };
}
