import { Injectable, Logger, NotFoundException } from "@nestjs/common";
import { v4 as uuidv4 } from "uuid";
import {
  addEmployee,
  BonusScheme,
  BonusSchemeKind,
  Employee,
  MonthlyFigures,
  PaymentSchemeKind,
  recordProduction,
} from "../core";
import { assertMonthKey } from "../common/month-key";
import { DepartmentsService } from "../departments/departments.service";
import { StoreService } from "../store/store.service";
import { CreateEmployeeDto } from "./dto/create-employee.dto";
import { RecordProductionDto } from "./dto/record-production.dto";

export interface NewEmployee {
  name: string;
  position: string;
  departmentName: string;
  baseSalary: number;
  paymentScheme: PaymentSchemeKind;
  bonusScheme: BonusSchemeKind;
  bonusAmount?: number;
  production?: MonthlyFigures;
}

export function buildBonusScheme(kind: BonusSchemeKind, amount = 0): BonusScheme {
  switch (kind) {
    case "FIXED":
      return { kind, amount };
    case "PERCENT_OF_BASE":
    case "PLAN_PERFORMANCE":
      return { kind };
  }
}

@Injectable()
export class EmployeesService {
  private readonly logger = new Logger(EmployeesService.name);

  constructor(
    private readonly store: StoreService,
    private readonly departmentsService: DepartmentsService,
  ) { }

  create(dto: CreateEmployeeDto): Employee {
    return this.insert({ ...dto, position: dto.position ?? "" });
  }

  /**
   * Adds an already validated employee to the registry and to the named
   * department, which must exist.
   */
  insert(input: NewEmployee): Employee {
    const department = this.departmentsService.getOrThrow(input.departmentName);
    const employee: Employee = {
      id: uuidv4(),
      name: input.name,
      position: input.position,
      role: "EMPLOYEE",
      departmentName: department.name,
      baseSalary: input.baseSalary,
      paymentScheme: { kind: input.paymentScheme },
      bonus: buildBonusScheme(input.bonusScheme, input.bonusAmount),
      production: { ...(input.production ?? {}) },
    };

    this.store.employees.set(employee.id, employee);
    addEmployee(department, employee);
    this.logger.log(`Employee ${employee.name} added to "${department.name}"`);
    return employee;
  }

  list(): Employee[] {
    return Array.from(this.store.employees.values());
  }

  getOrThrow(id: string): Employee {
    const employee = this.store.findEmployee(id);
    if (!employee) {
      throw new NotFoundException("Employee not found");
    }
    return employee;
  }

  recordProduction(id: string, month: string, dto: RecordProductionDto): Employee {
    const monthKey = assertMonthKey(month);
    const employee = this.getOrThrow(id);
    recordProduction(employee, monthKey, dto.value);
    return employee;
  }
}
