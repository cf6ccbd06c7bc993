import type { RoleRecord } from "../token/types.js";
import type {
  Employee,
  EmployeePatch,
  NewEmployee,
} from "../employees/types.js";

export type CredentialFailureReason =
  | "INVALID_CREDENTIALS"
  | "USER_NOT_FOUND"
  | "USER_LOCKED"
  | "USER_DISABLED";

export interface CredentialChecker {
  checkUserNamePassword(
    principal: string,
    password: string,
  ): Promise<
    | { ok: true; userId: string; username: string }
    | { ok: false; reason?: CredentialFailureReason }
  >;
}

export interface RoleProvider {
  getUserRoles(userId: string): Promise<RoleRecord[]>;
}

/**
 * Storage for employees and their roles. Implementations own transactions:
 * `update` with `roles` set must replace the previous roles as one unit.
 * Usernames are unique across all rows, deleted ones included: `create` and
 * a renaming `update` throw UsernameTakenError when another row holds the name.
 */
export interface EmployeeRepository {
  findById(id: number): Promise<Employee | undefined>;
  findByUsername(username: string): Promise<Employee | undefined>;
  create(employee: NewEmployee): Promise<Employee>;
  update(id: number, patch: EmployeePatch): Promise<Employee>;
  markDeleted(id: number): Promise<void>;
}

export interface PasswordHasher {
  hash(plain: string): Promise<string>;
  verify(plain: string, hash: string): Promise<boolean>;
}

export type ManagerPrincipal = {
  username: string;
  authorities: string[];
};

/** Decides whether an Authorization header may manage employees. */
export interface AccessGuard {
  requireManager(
    authorizationHeader: string | undefined,
  ): Promise<ManagerPrincipal>;
}
