export type EmployeeRole = 'EMP' | 'ADM';

export type WorkStatus = 'ACTIVE' | 'INACTIVE';

export const EMPLOYEE_ROLES: readonly EmployeeRole[] = ['EMP', 'ADM'];

export const WORK_STATUSES: readonly WorkStatus[] = ['ACTIVE', 'INACTIVE'];

export interface EmployeeProfile {
  readonly id: number;
  readonly employeeCode: string;
  readonly firstName: string;
  readonly lastName: string;
  readonly division: string | null;
  readonly department: string | null;
  readonly position: string | null;
  readonly role: EmployeeRole;
  readonly workStatus: WorkStatus;
  /** Account enabled; a disabled account cannot act at all. */
  readonly isActive: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewEmployee {
  employeeCode: string;
  firstName: string;
  lastName: string;
  division?: string | null;
  department?: string | null;
  position?: string | null;
  role?: EmployeeRole;
}

export interface EmployeePatch extends Partial<NewEmployee> {
  workStatus?: WorkStatus;
  isActive?: boolean;
}

/** Capability check: administrative clerks with an enabled account. */
export function isAdmin(profile: Pick<EmployeeProfile, 'role' | 'isActive'>): boolean {
  return profile.isActive && profile.role === 'ADM';
}

export function fullName(profile: Pick<EmployeeProfile, 'firstName' | 'lastName' | 'employeeCode'>): string {
  const name = `${profile.firstName} ${profile.lastName}`.trim();
  return name || profile.employeeCode;
}
