export type Role = "EMPLOYEE" | "MANAGER";

export type MonthKey = string; // YYYY-MM

export type MonthlyFigures = Record<MonthKey, number>;

export const BONUS_SCHEME_KINDS = [
  "FIXED",
  "PERCENT_OF_BASE",
  "PLAN_PERFORMANCE",
] as const;

export type BonusSchemeKind = (typeof BONUS_SCHEME_KINDS)[number];

export type BonusScheme =
  | { kind: "FIXED"; amount: number }
  | { kind: "PERCENT_OF_BASE" }
  | { kind: "PLAN_PERFORMANCE" };

/**
 * Either a bonus rule evaluated per month, or an amount that was resolved
 * elsewhere and is added as-is.
 */
export type BonusSource = BonusScheme | number;

export const PAYMENT_SCHEME_KINDS = [
  "FIXED_SALARY",
  "PERCENT_PRODUCTION",
  "PERCENT_PLAN",
] as const;

export type PaymentSchemeKind = (typeof PAYMENT_SCHEME_KINDS)[number];

export interface PaymentScheme {
  kind: PaymentSchemeKind;
}

export interface Employee {
  id: string;
  name: string;
  position: string;
  role: Role;
  departmentName: string;
  baseSalary: number;
  paymentScheme: PaymentScheme;
  bonus: BonusSource;
  production: MonthlyFigures;
}

export interface Department {
  name: string;
  managerId: string | null;
  employeeIds: string[];
  plan: MonthlyFigures;
}

export interface SalaryLine {
  employeeId: string;
  employeeName: string;
  position: string;
  departmentName: string;
  month: MonthKey;
  plan: number;
  actual: number;
  bonus: number;
  salary: number;
}
