import { plainToInstance } from "class-transformer";
import { validateSync, ValidationError } from "class-validator";
import {
  BonusSchemeKind,
  Employee,
  isMonthKey,
  MonthlyFigures,
  PaymentSchemeKind,
} from "../core";
import { NewEmployee } from "../employees/employees.service";
import { EmployeeRecordDto } from "./dto/employee-record.dto";

export interface EmployeeRecord {
  name: string;
  position: string;
  department: string;
  base_salary: number;
  bonus: number;
  payment_scheme: PaymentSchemeKind;
  bonus_scheme: BonusSchemeKind;
  production?: MonthlyFigures;
}

export type RecordParseResult =
  | { ok: true; employee: NewEmployee }
  | { ok: false; errors: string[] };

export function toEmployeeRecord(
  employee: Employee,
  withProduction: boolean,
): EmployeeRecord {
  const bonus = employee.bonus;
  const record: EmployeeRecord = {
    name: employee.name,
    position: employee.position,
    department: employee.departmentName,
    base_salary: employee.baseSalary,
    bonus: typeof bonus === "number" ? bonus : bonus.kind === "FIXED" ? bonus.amount : 0,
    payment_scheme: employee.paymentScheme.kind,
    bonus_scheme: typeof bonus === "number" ? "FIXED" : bonus.kind,
  };
  if (withProduction) {
    record.production = { ...employee.production };
  }
  return record;
}

function flattenErrors(errors: ValidationError[], prefix = ""): string[] {
  return errors.flatMap((error) => {
    const own = Object.values(error.constraints ?? {});
    const nested = flattenErrors(error.children ?? [], `${prefix}${error.property}.`);
    return [...own.map((message) => `${prefix}${message}`), ...nested];
  });
}

function checkProduction(production: MonthlyFigures): string[] {
  const errors: string[] = [];
  for (const [month, value] of Object.entries(production)) {
    if (!isMonthKey(month)) {
      errors.push(`production month "${month}" must be in YYYY-MM format`);
    } else if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
      errors.push(`production for ${month} must be a non-negative number`);
    }
  }
  return errors;
}

/**
 * Validates one loaded record. Records without scheme tags come back as a
 * fixed salary with a fixed bonus of `bonus` (0 when absent).
 */
export function parseEmployeeRecord(raw: unknown): RecordParseResult {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return { ok: false, errors: ["record must be an object"] };
  }

  const dto = plainToInstance(EmployeeRecordDto, raw);
  const errors = flattenErrors(validateSync(dto));
  if (dto.production && errors.length === 0) {
    errors.push(...checkProduction(dto.production));
  }
  if (errors.length > 0) {
    return { ok: false, errors };
  }

  return {
    ok: true,
    employee: {
      name: dto.name,
      position: dto.position ?? "",
      departmentName: dto.department,
      baseSalary: dto.base_salary,
      paymentScheme: dto.payment_scheme ?? "FIXED_SALARY",
      bonusScheme: dto.bonus_scheme ?? "FIXED",
      bonusAmount: dto.bonus ?? 0,
      production: dto.production ?? {},
    },
  };
}

// Empty CSV cells mean "not provided".
export function dropBlankCells(row: Record<string, string>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(row)) {
    const trimmed = value.trim();
    if (trimmed !== "") {
      result[key.trim()] = trimmed;
    }
  }
  return result;
}
