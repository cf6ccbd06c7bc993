import type { EmployeeRepository } from "../adapters/types.js";
import { EmployeeNotFoundError, UsernameTakenError } from "../errors/error.js";
import type { Employee, EmployeePatch, NewEmployee } from "./types.js";

function copy(e: Employee): Employee {
  return { ...e, roles: e.roles.map((r) => ({ ...r })) };
}

/**
 * Process-local EmployeeRepository for tests and examples.
 * Returned records are copies; mutate through `update`.
 */
export class InMemoryEmployeeRepository implements EmployeeRepository {
  private readonly rows = new Map<number, Employee>();
  private nextId = 1;

  async findById(id: number): Promise<Employee | undefined> {
    const row = this.rows.get(id);
    return row ? copy(row) : undefined;
  }

  async findByUsername(username: string): Promise<Employee | undefined> {
    for (const row of this.rows.values()) {
      if (row.username === username) return copy(row);
    }
    return undefined;
  }

  private assertUsernameFree(username: string, exceptId?: number) {
    for (const row of this.rows.values()) {
      if (row.username === username && row.id !== exceptId) {
        throw new UsernameTakenError(username);
      }
    }
  }

  async create(employee: NewEmployee): Promise<Employee> {
    this.assertUsernameFree(employee.username);
    const row: Employee = { ...employee, id: this.nextId++, deleted: false };
    this.rows.set(row.id, copy(row));
    return copy(row);
  }

  async update(id: number, patch: EmployeePatch): Promise<Employee> {
    const row = this.rows.get(id);
    if (!row) throw new EmployeeNotFoundError(id);
    if (patch.username !== undefined) this.assertUsernameFree(patch.username, id);

    const next: Employee = {
      ...row,
      ...(patch.username !== undefined ? { username: patch.username } : {}),
      ...(patch.email !== undefined ? { email: patch.email } : {}),
      ...(patch.passwordHash !== undefined
        ? { passwordHash: patch.passwordHash }
        : {}),
      ...(patch.roles !== undefined ? { roles: patch.roles } : {}),
    };
    this.rows.set(id, copy(next));
    return copy(next);
  }

  async markDeleted(id: number): Promise<void> {
    const row = this.rows.get(id);
    if (!row) throw new EmployeeNotFoundError(id);
    row.deleted = true;
  }

  get size(): number {
    return this.rows.size;
  }
}
