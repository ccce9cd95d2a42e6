import { MonthKey, MonthlyFigures } from "./types";

export const MONTH_KEY_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

export function isMonthKey(value: string): value is MonthKey {
  return MONTH_KEY_PATTERN.test(value);
}

export function figureFor(figures: MonthlyFigures, month: MonthKey): number {
  return Object.prototype.hasOwnProperty.call(figures, month)
    ? figures[month]
    : 0;
}
