import { Controller, Get, Header, Param, Query } from "@nestjs/common";
import { PayrollService } from "./payroll.service";

@Controller("payroll")
export class PayrollController {
  constructor(private readonly payrollService: PayrollService) { }

  @Get("salaries")
  calculateSalaries(@Query("month") month: string) {
    return this.payrollService.calculateSalaries(month);
  }

  @Get("salaries.csv")
  @Header("Content-Type", "text/csv; charset=utf-8")
  exportSalariesCsv(@Query("month") month: string) {
    return this.payrollService.exportSalariesCsv(month);
  }

  @Get("salaries/:employeeId")
  calculateForEmployee(
    @Param("employeeId") employeeId: string,
    @Query("month") month: string,
  ) {
    return this.payrollService.calculateForEmployee(employeeId, month);
  }
}
