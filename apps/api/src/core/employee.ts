import { resolveBonus } from "./bonus";
import { figureFor } from "./month";
import { calculatePayment } from "./payment";
import { Department, Employee, MonthKey, SalaryLine } from "./types";

/**
 * Salary of one employee for one month.
 *
 * Missing production or a missing plan count as 0; so does a department that
 * is not known (`null`), which leaves only the non plan-based parts of the
 * payment.
 */
export function calculateSalary(
  employee: Employee,
  department: Department | null,
  month: MonthKey,
): SalaryLine {
  const actual = figureFor(employee.production, month);
  const plan = department ? figureFor(department.plan, month) : 0;
  const base = employee.baseSalary;
  const bonus = resolveBonus(employee.bonus, base, plan, actual);

  return {
    employeeId: employee.id,
    employeeName: employee.name,
    position: employee.position,
    departmentName: employee.departmentName,
    month,
    plan,
    actual,
    bonus,
    salary: calculatePayment(employee.paymentScheme, base, bonus, plan, actual),
  };
}

export function recordProduction(
  employee: Employee,
  month: MonthKey,
  value: number,
): void {
  employee.production[month] = value;
}
