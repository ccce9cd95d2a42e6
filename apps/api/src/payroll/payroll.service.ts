import { Injectable, Logger } from "@nestjs/common";
import * as Papa from "papaparse";
import { calculateSalary, Employee, MonthKey, SalaryLine } from "../core";
import { assertMonthKey } from "../common/month-key";
import { EmployeesService } from "../employees/employees.service";
import { StoreService } from "../store/store.service";

export interface PayrollLine extends SalaryLine {
  display: string;
}

export interface PayrollReport {
  month: MonthKey;
  total: number;
  lines: PayrollLine[];
}

@Injectable()
export class PayrollService {
  private readonly logger = new Logger(PayrollService.name);

  constructor(
    private readonly store: StoreService,
    private readonly employeesService: EmployeesService,
  ) { }

  calculateSalaries(month: string): PayrollReport {
    const monthKey = assertMonthKey(month);
    const lines = this.employeesService
      .list()
      .map((employee) => this.lineFor(employee, monthKey));
    const total = lines.reduce((sum, line) => sum + line.salary, 0);

    this.logger.log(`Salaries for ${monthKey} calculated for ${lines.length} employee(s)`);
    return { month: monthKey, total, lines };
  }

  calculateForEmployee(employeeId: string, month: string): PayrollLine {
    const monthKey = assertMonthKey(month);
    return this.lineFor(this.employeesService.getOrThrow(employeeId), monthKey);
  }

  exportSalariesCsv(month: string): string {
    const report = this.calculateSalaries(month);

    const headers = [
      "month",
      "employee",
      "position",
      "department",
      "plan",
      "actual",
      "bonus",
      "salary",
    ];

    const rows = report.lines.map((line) => [
      line.month,
      line.employeeName,
      line.position,
      line.departmentName,
      String(line.plan),
      String(line.actual),
      String(line.bonus),
      line.display,
    ]);

    return Papa.unparse({ fields: headers, data: rows }, { quotes: true, newline: "\n" });
  }

  private lineFor(employee: Employee, month: MonthKey): PayrollLine {
    const department = this.store.findDepartment(employee.departmentName);
    const line = calculateSalary(employee, department, month);
    return { ...line, display: line.salary.toFixed(2) };
  }
}
