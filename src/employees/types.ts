import type { RoleRecord } from "../token/types.js";

export type Employee = {
  id: number;
  username: string;
  email: string;
  passwordHash: string;
  roles: RoleRecord[];
  deleted: boolean;
};

export type NewEmployee = Omit<Employee, "id" | "deleted">;

export type EmployeePatch = Partial<
  Pick<Employee, "username" | "email" | "passwordHash" | "roles">
>;

/** Employee as returned to callers: never carries the password hash. */
export type EmployeeView = Omit<Employee, "passwordHash">;

export type RegisterEmployeeRequest = {
  username: string;
  password: string;
  email: string;
  roles: RoleRecord[];
};

export type UpdateEmployeeRequest = {
  username?: string;
  password?: string;
  email?: string;
  roles?: RoleRecord[];
};

export type LoginRequest = {
  username: string;
  password: string;
};

export type LoginResponse = {
  token: string;
  expiresAt: string;
};

export type EmployeeManagementConfig = {
  managerRoles?: string[];
};
