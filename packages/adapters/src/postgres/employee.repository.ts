import { EMPLOYEE_ROLES, WORK_STATUSES } from '@carpool/domain';
import type {
  EmployeePatch,
  EmployeeProfile,
  EmployeeRepositoryPort,
  NewEmployee,
} from '@carpool/domain';
import { pgDatabase } from './pool.js';
import type { Queryable, Row } from './pool.js';
import { assignments, bool, num, oneOf, str, strOrNull, timestamp } from './row.js';

export class PgEmployeeRepository implements EmployeeRepositoryPort {
  constructor(private readonly db: Queryable = pgDatabase) {}

  async findById(employeeId: number): Promise<EmployeeProfile | null> {
    const { rows } = await this.db.query(`SELECT * FROM carpool.employees WHERE id = $1`, [employeeId]);
    return rows[0] ? mapEmployeeRow(rows[0]) : null;
  }

  async findByIds(employeeIds: readonly number[]): Promise<EmployeeProfile[]> {
    if (employeeIds.length === 0) return [];
    const { rows } = await this.db.query(
      `SELECT * FROM carpool.employees WHERE id = ANY($1::int[]) ORDER BY id`,
      [[...employeeIds]],
    );
    return rows.map(mapEmployeeRow);
  }

  async findByCode(employeeCode: string): Promise<EmployeeProfile | null> {
    const { rows } = await this.db.query(`SELECT * FROM carpool.employees WHERE employee_code = $1`, [employeeCode]);
    return rows[0] ? mapEmployeeRow(rows[0]) : null;
  }

  async list(opts: { includeDisabled?: boolean } = {}): Promise<EmployeeProfile[]> {
    const where = opts.includeDisabled === false ? 'WHERE is_active = TRUE' : '';
    const { rows } = await this.db.query(
      `SELECT * FROM carpool.employees ${where}
       ORDER BY (work_status <> 'ACTIVE'), employee_code`,
    );
    return rows.map(mapEmployeeRow);
  }

  async count(opts: { includeDisabled?: boolean } = {}): Promise<number> {
    const where = opts.includeDisabled ? '' : 'WHERE is_active = TRUE';
    const { rows } = await this.db.query(`SELECT COUNT(*)::int AS total FROM carpool.employees ${where}`);
    return rows[0] ? num(rows[0], 'total') : 0;
  }

  async create(employee: NewEmployee): Promise<EmployeeProfile> {
    const { rows } = await this.db.query(
      `INSERT INTO carpool.employees
         (employee_code, first_name, last_name, division, department, position, role)
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       RETURNING *`,
      [
        employee.employeeCode,
        employee.firstName,
        employee.lastName,
        employee.division ?? null,
        employee.department ?? null,
        employee.position ?? null,
        employee.role ?? 'EMP',
      ],
    );
    const row = rows[0];
    if (!row) throw new Error('employee insert returned no row');
    return mapEmployeeRow(row);
  }

  async update(employeeId: number, patch: EmployeePatch): Promise<EmployeeProfile | null> {
    const { sets, params } = assignments([
      ['employee_code', patch.employeeCode],
      ['first_name', patch.firstName],
      ['last_name', patch.lastName],
      ['division', patch.division],
      ['department', patch.department],
      ['position', patch.position],
      ['role', patch.role],
      ['work_status', patch.workStatus],
      ['is_active', patch.isActive],
    ]);
    if (sets.length === 0) return this.findById(employeeId);

    const { rows } = await this.db.query(
      `UPDATE carpool.employees SET ${sets.join(', ')}, updated_at = NOW()
       WHERE id = $${params.length + 1} RETURNING *`,
      [...params, employeeId],
    );
    return rows[0] ? mapEmployeeRow(rows[0]) : null;
  }
}

export function mapEmployeeRow(row: Row): EmployeeProfile {
  return {
    id: num(row, 'id'),
    employeeCode: str(row, 'employee_code'),
    firstName: str(row, 'first_name'),
    lastName: str(row, 'last_name'),
    division: strOrNull(row, 'division'),
    department: strOrNull(row, 'department'),
    position: strOrNull(row, 'position'),
    role: oneOf(row, 'role', EMPLOYEE_ROLES),
    workStatus: oneOf(row, 'work_status', WORK_STATUSES),
    isActive: bool(row, 'is_active'),
    createdAt: timestamp(row, 'created_at'),
    updatedAt: timestamp(row, 'updated_at'),
  };
}
