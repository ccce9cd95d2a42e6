import { figureFor } from "./month";
import { Department, Employee, MonthKey } from "./types";

export function createDepartment(name: string): Department {
  return {
    name,
    managerId: null,
    employeeIds: [],
    plan: {},
  };
}

// Duplicates are not filtered out; callers add each employee once.
export function addEmployee(department: Department, employee: Employee): void {
  department.employeeIds.push(employee.id);
}

export function setPlan(
  department: Department,
  month: MonthKey,
  value: number,
): void {
  department.plan[month] = value;
}

/**
 * Splits the month's plan evenly and records each share as the members'
 * production, replacing whatever was recorded for that month.
 *
 * `members` are the department's employees in department order. Returns the
 * share written, or `null` when there was nobody to distribute to.
 */
export function distributePlan(
  department: Department,
  members: Employee[],
  month: MonthKey,
): number | null {
  if (members.length === 0) {
    return null;
  }

  const share = figureFor(department.plan, month) / members.length;
  for (const employee of members) {
    employee.production[month] = share;
  }
  return share;
}

/**
 * Makes `employee` the department's manager. A previous manager keeps their
 * membership and goes back to the plain employee role.
 */
export function assignManager(
  department: Department,
  employee: Employee,
  previous: Employee | null,
): void {
  if (previous && previous.id !== employee.id) {
    previous.role = "EMPLOYEE";
  }
  department.managerId = employee.id;
  employee.role = "MANAGER";
}
