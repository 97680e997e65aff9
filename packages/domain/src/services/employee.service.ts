import type { EmployeePatch, EmployeeProfile, EmployeeRole, NewEmployee } from '../entities/employee.js';
import { BusinessRuleError, NotFoundError } from '../errors.js';
import type { EmployeeRepositoryPort } from '../ports/outbound/employee-repository.port.js';
import { optionalText, requireAdmin, requireText } from './access.js';

export interface EmployeeInput {
  employeeCode: string;
  firstName: string;
  lastName: string;
  division?: string | null;
  department?: string | null;
  position?: string | null;
  role?: EmployeeRole;
}

export class EmployeeService {
  constructor(private readonly employees: EmployeeRepositoryPort) {}

  async list(actor: EmployeeProfile): Promise<EmployeeProfile[]> {
    requireAdmin(actor);
    return this.employees.list();
  }

  async create(actor: EmployeeProfile, input: EmployeeInput): Promise<EmployeeProfile> {
    requireAdmin(actor);
    const employeeCode = requireText(input.employeeCode, 'employeeCode');
    await this.ensureCodeFree(employeeCode);

    const employee: NewEmployee = {
      employeeCode,
      firstName: requireText(input.firstName, 'firstName'),
      lastName: requireText(input.lastName, 'lastName'),
      division: optionalText(input.division),
      department: optionalText(input.department),
      position: optionalText(input.position),
      role: input.role ?? 'EMP',
    };
    return this.employees.create(employee);
  }

  async update(actor: EmployeeProfile, employeeId: number, input: Partial<EmployeeInput>): Promise<EmployeeProfile> {
    requireAdmin(actor);
    const current = await this.require(employeeId);

    const patch: EmployeePatch = {};
    if (input.employeeCode !== undefined) {
      const code = requireText(input.employeeCode, 'employeeCode');
      if (code !== current.employeeCode) await this.ensureCodeFree(code);
      patch.employeeCode = code;
    }
    if (input.firstName !== undefined) patch.firstName = requireText(input.firstName, 'firstName');
    if (input.lastName !== undefined) patch.lastName = requireText(input.lastName, 'lastName');
    if (input.division !== undefined) patch.division = optionalText(input.division);
    if (input.department !== undefined) patch.department = optionalText(input.department);
    if (input.position !== undefined) patch.position = optionalText(input.position);
    if (input.role !== undefined) patch.role = input.role;

    return this.save(employeeId, patch);
  }

  /** Flips the work status between ACTIVE and INACTIVE. */
  async toggleStatus(actor: EmployeeProfile, employeeId: number): Promise<EmployeeProfile> {
    requireAdmin(actor);
    const current = await this.require(employeeId);
    return this.save(employeeId, { workStatus: current.workStatus === 'ACTIVE' ? 'INACTIVE' : 'ACTIVE' });
  }

  /** Employees are never removed: "delete" disables the account. */
  async disable(actor: EmployeeProfile, employeeId: number): Promise<EmployeeProfile> {
    requireAdmin(actor);
    if (actor.id === employeeId) {
      throw new BusinessRuleError('cannot_disable_self', 'an admin cannot disable their own account');
    }
    await this.require(employeeId);
    return this.save(employeeId, { isActive: false, workStatus: 'INACTIVE' });
  }

  private async require(employeeId: number): Promise<EmployeeProfile> {
    const employee = await this.employees.findById(employeeId);
    if (!employee) throw new NotFoundError('employee', employeeId);
    return employee;
  }

  private async save(employeeId: number, patch: EmployeePatch): Promise<EmployeeProfile> {
    const updated = await this.employees.update(employeeId, patch);
    if (!updated) throw new NotFoundError('employee', employeeId);
    return updated;
  }

  private async ensureCodeFree(employeeCode: string): Promise<void> {
    const taken = await this.employees.findByCode(employeeCode);
    if (taken) {
      throw new BusinessRuleError('employee_code_taken', `employee code ${employeeCode} is already in use`, {
        employeeCode,
      });
    }
  }
}
