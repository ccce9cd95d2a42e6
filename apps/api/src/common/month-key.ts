import { BadRequestException } from "@nestjs/common";
import { isMonthKey, MonthKey } from "../core";

export function assertMonthKey(value: string | undefined): MonthKey {
  if (!value || !isMonthKey(value)) {
    throw new BadRequestException("month must be in YYYY-MM format");
  }
  return value;
}
