import {
  BadRequestException,
  ConflictException,
  Injectable,
  Logger,
  NotFoundException,
} from "@nestjs/common";
import {
  assignManager,
  createDepartment,
  Department,
  distributePlan,
  MonthlyFigures,
  setPlan,
} from "../core";
import { assertMonthKey } from "../common/month-key";
import { StoreService } from "../store/store.service";
import { AssignManagerDto } from "./dto/assign-manager.dto";
import { CreateDepartmentDto } from "./dto/create-department.dto";
import { SetPlanDto } from "./dto/set-plan.dto";

export interface DepartmentSummary {
  name: string;
  managerId: string | null;
  staffCount: number;
  plan: MonthlyFigures;
}

@Injectable()
export class DepartmentsService {
  private readonly logger = new Logger(DepartmentsService.name);

  constructor(private readonly store: StoreService) { }

  create(dto: CreateDepartmentDto): DepartmentSummary {
    const name = dto.name.trim();
    if (!name) {
      throw new BadRequestException("Department name must not be blank");
    }
    if (this.store.departments.has(name)) {
      throw new ConflictException(`Department "${name}" already exists`);
    }

    const department = createDepartment(name);
    this.store.departments.set(name, department);
    this.logger.log(`Department "${name}" created`);
    return this.toSummary(department);
  }

  /**
   * Returns the named department, creating it when missing. Used by imports,
   * which bring their own department names.
   */
  ensure(name: string): Department {
    const existing = this.store.findDepartment(name);
    if (existing) {
      return existing;
    }
    const department = createDepartment(name);
    this.store.departments.set(name, department);
    this.logger.log(`Department "${name}" created on import`);
    return department;
  }

  list(): DepartmentSummary[] {
    return Array.from(this.store.departments.values(), (department) =>
      this.toSummary(department),
    );
  }

  getOrThrow(name: string): Department {
    const department = this.store.findDepartment(name);
    if (!department) {
      throw new NotFoundException(`Department "${name}" not found`);
    }
    return department;
  }

  setPlan(name: string, month: string, dto: SetPlanDto): DepartmentSummary {
    const monthKey = assertMonthKey(month);
    const department = this.getOrThrow(name);

    setPlan(department, monthKey, dto.value);
    this.logger.log(`Plan for "${name}" ${monthKey} set to ${dto.value}`);
    return this.toSummary(department);
  }

  distributePlan(
    name: string,
    month: string,
  ): { department: string; month: string; employees: number; share: number | null } {
    const monthKey = assertMonthKey(month);
    const department = this.getOrThrow(name);
    const members = this.store.membersOf(department);

    const share = distributePlan(department, members, monthKey);
    if (share === null) {
      this.logger.warn(`Plan for "${name}" ${monthKey} not distributed: no employees`);
    } else {
      this.logger.log(
        `Plan for "${name}" ${monthKey} distributed: ${share} to each of ${members.length}`,
      );
    }

    return {
      department: department.name,
      month: monthKey,
      employees: members.length,
      share,
    };
  }

  assignManager(name: string, dto: AssignManagerDto): DepartmentSummary {
    const department = this.getOrThrow(name);
    const employee = this.store.findEmployee(dto.employeeId);
    if (!employee) {
      throw new NotFoundException("Employee not found");
    }
    if (!department.employeeIds.includes(employee.id)) {
      throw new BadRequestException(
        `Employee ${employee.name} is not a member of "${department.name}"`,
      );
    }

    const previous = department.managerId
      ? this.store.findEmployee(department.managerId)
      : null;
    assignManager(department, employee, previous);
    this.logger.log(`${employee.name} now manages "${department.name}"`);
    return this.toSummary(department);
  }

  private toSummary(department: Department): DepartmentSummary {
    return {
      name: department.name,
      managerId: department.managerId,
      staffCount: department.employeeIds.length,
      plan: { ...department.plan },
    };
  }
}
