import type { EmployeePatch, EmployeeProfile, NewEmployee } from '../../entities/employee.js';

export interface EmployeeRepositoryPort {
  findById(employeeId: number): Promise<EmployeeProfile | null>;
  findByIds(employeeIds: readonly number[]): Promise<EmployeeProfile[]>;
  findByCode(employeeCode: string): Promise<EmployeeProfile | null>;
  /** ACTIVE work status first, then by employee code. Disabled accounts are listed unless `includeDisabled` is false. */
  list(opts?: { includeDisabled?: boolean }): Promise<EmployeeProfile[]>;
  create(employee: NewEmployee): Promise<EmployeeProfile>;
  update(employeeId: number, patch: EmployeePatch): Promise<EmployeeProfile | null>;
  /** Enabled accounts only, unless `includeDisabled` is set. */
  count(opts?: { includeDisabled?: boolean }): Promise<number>;
}
