import { Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import { Department, Employee } from "../core";

/**
 * In-memory registry of departments (keyed by name) and employees (keyed by
 * id). Maps keep insertion order, which is the order used for listings and
 * payroll runs.
 */
@Injectable()
export class StoreService implements OnModuleDestroy {
  private readonly logger = new Logger(StoreService.name);

  readonly departments = new Map<string, Department>();
  readonly employees = new Map<string, Employee>();

  findDepartment(name: string): Department | null {
    return this.departments.get(name) ?? null;
  }

  findEmployee(id: string): Employee | null {
    return this.employees.get(id) ?? null;
  }

  membersOf(department: Department): Employee[] {
    const members: Employee[] = [];
    for (const id of department.employeeIds) {
      const employee = this.employees.get(id);
      if (employee) {
        members.push(employee);
      }
    }
    return members;
  }

  clear(): void {
    this.departments.clear();
    this.employees.clear();
  }

  onModuleDestroy(): void {
    this.logger.log(
      `Dropping ${this.departments.size} department(s) and ${this.employees.size} employee(s)`,
    );
    this.clear();
  }
}
