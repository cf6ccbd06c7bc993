import type { Logger } from "pino";
import type {
  AccessGuard,
  EmployeeRepository,
  PasswordHasher,
} from "../adapters/types.js";
import {
  AccessDeniedError,
  EmployeeNotFoundError,
  InvalidIdentityError,
  InvalidRoleError,
  NoRolesError,
  UsernameTakenError,
} from "../errors/error.js";
import { logger as defaultLogger } from "../logger.js";
import { AUTHORITY_SEPARATOR } from "../token/authorities.js";
import type { RoleRecord } from "../token/types.js";
import type { AuthCore } from "../types.js";
import type {
  Employee,
  EmployeeManagementConfig,
  EmployeePatch,
  EmployeeView,
  LoginRequest,
  LoginResponse,
  RegisterEmployeeRequest,
  UpdateEmployeeRequest,
} from "./types.js";

export const DEFAULT_MANAGER_ROLES = ["ADMIN"];

export type EmployeeManagementAdapters = {
  employees: EmployeeRepository;
  passwordHasher: PasswordHasher;
  accessGuard: AccessGuard;
  authCore: AuthCore;
  logger?: Logger;
};

export interface EmployeeManagement {
  registerEmployees(
    authorizationHeader: string | undefined,
    requests: RegisterEmployeeRequest[],
  ): Promise<EmployeeView[]>;
  registerAdmins(requests: RegisterEmployeeRequest[]): Promise<EmployeeView[]>;
  login(request: LoginRequest): Promise<LoginResponse>;
  updateEmployee(
    authorizationHeader: string | undefined,
    id: number,
    update: UpdateEmployeeRequest,
  ): Promise<EmployeeView>;
  deleteEmployee(
    authorizationHeader: string | undefined,
    id: number,
  ): Promise<number>;
}

export function toEmployeeView(employee: Employee): EmployeeView {
  const { passwordHash: _omit, ...view } = employee;
  return view;
}

/**
 * Drops blank role names and repeated ones, keeping first-seen order.
 * A name containing the authorities separator would split in the token
 * claim, so it is rejected with InvalidRoleError.
 */
export function distinctRoles(roles: Iterable<RoleRecord>): RoleRecord[] {
  const seen = new Set<string>();
  const out: RoleRecord[] = [];
  for (const { roleName } of roles) {
    const name = roleName.trim();
    if (name.includes(AUTHORITY_SEPARATOR)) {
      throw new InvalidRoleError(
        name,
        `Role name must not contain "${AUTHORITY_SEPARATOR}"`,
      );
    }
    if (!name || seen.has(name)) continue;
    seen.add(name);
    out.push({ roleName: name });
  }
  return out;
}

export function createEmployeeManagement(
  config: EmployeeManagementConfig,
  adapters: EmployeeManagementAdapters,
): EmployeeManagement {
  const { employees, passwordHasher, accessGuard, authCore } = adapters;
  const managerRoles = config.managerRoles ?? DEFAULT_MANAGER_ROLES;
  if (managerRoles.length === 0) {
    throw new Error("EmployeeManagementConfig.managerRoles must not be empty");
  }
  const log = (adapters.logger ?? defaultLogger).child({
    component: "employee-management",
  });

  async function findLive(id: number): Promise<Employee> {
    const employee = await employees.findById(id);
    if (!employee || employee.deleted) throw new EmployeeNotFoundError(id);
    return employee;
  }

  // Every request is checked before the first one is stored.
  async function createAll(
    requests: RegisterEmployeeRequest[],
  ): Promise<EmployeeView[]> {
    const batch = new Set<string>();
    const prepared: Array<{ request: RegisterEmployeeRequest; roles: RoleRecord[] }> = [];

    for (const request of requests) {
      const username = request.username.trim();
      if (!username) throw new InvalidIdentityError();

      if (batch.has(username) || (await employees.findByUsername(username))) {
        throw new UsernameTakenError(username);
      }
      batch.add(username);

      const roles = distinctRoles(request.roles);
      if (roles.length === 0) throw new NoRolesError(username);

      prepared.push({ request: { ...request, username }, roles });
    }

    const created: EmployeeView[] = [];
    for (const { request, roles } of prepared) {
      const employee = await employees.create({
        username: request.username,
        email: request.email,
        passwordHash: await passwordHasher.hash(request.password),
        roles,
      });
      log.info(
        { id: employee.id, username: employee.username, roles: roles.length },
        "employee registered",
      );
      created.push(toEmployeeView(employee));
    }
    return created;
  }

  async function registerEmployees(
    authorizationHeader: string | undefined,
    requests: RegisterEmployeeRequest[],
  ): Promise<EmployeeView[]> {
    const manager = await accessGuard.requireManager(authorizationHeader);
    log.debug(
      { manager: manager.username, count: requests.length },
      "register employees",
    );
    return createAll(requests);
  }

  async function registerAdmins(
    requests: RegisterEmployeeRequest[],
  ): Promise<EmployeeView[]> {
    log.debug({ count: requests.length }, "register admins");
    return createAll(requests);
  }

  async function login(request: LoginRequest): Promise<LoginResponse> {
    const result = await authCore.doAuthenticate({
      principal: request.username,
      password: request.password,
    });
    if (!result.ok) throw new AccessDeniedError(result.error);
    return { token: result.accessToken, expiresAt: result.expiresAt };
  }

  async function updateEmployee(
    authorizationHeader: string | undefined,
    id: number,
    update: UpdateEmployeeRequest,
  ): Promise<EmployeeView> {
    const manager = await accessGuard.requireManager(authorizationHeader);
    const current = await findLive(id);

    const patch: EmployeePatch = {};

    if (update.username !== undefined) {
      const username = update.username.trim();
      if (!username) throw new InvalidIdentityError();
      if (username !== current.username) {
        if (await employees.findByUsername(username)) {
          throw new UsernameTakenError(username);
        }
        patch.username = username;
      }
    }

    if (update.email !== undefined) patch.email = update.email;

    if (update.password !== undefined) {
      patch.passwordHash = await passwordHasher.hash(update.password);
    }

    // An empty role set leaves the current roles in place.
    const roles = distinctRoles(update.roles ?? []);
    if (roles.length > 0) patch.roles = roles;

    const updated = await employees.update(id, patch);
    log.info(
      { id, manager: manager.username, fields: Object.keys(patch) },
      "employee updated",
    );
    return toEmployeeView(updated);
  }

  async function deleteEmployee(
    authorizationHeader: string | undefined,
    id: number,
  ): Promise<number> {
    const manager = await accessGuard.requireManager(authorizationHeader);
    await findLive(id);
    await employees.markDeleted(id);
    log.info({ id, manager: manager.username }, "employee deleted");
    return id;
  }

  return {
    registerEmployees,
    registerAdmins,
    login,
    updateEmployee,
    deleteEmployee,
  };
}
