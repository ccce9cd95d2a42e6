import { Body, Controller, Get, Param, Post, Put } from "@nestjs/common";
import { CreateEmployeeDto } from "./dto/create-employee.dto";
import { RecordProductionDto } from "./dto/record-production.dto";
import { EmployeesService } from "./employees.service";

@Controller("employees")
export class EmployeesController {
  constructor(private readonly employeesService: EmployeesService) { }

  @Get()
  listEmployees() {
    return this.employeesService.list();
  }

  @Post()
  createEmployee(@Body() dto: CreateEmployeeDto) {
    return this.employeesService.create(dto);
  }

  @Get(":id")
  getEmployee(@Param("id") id: string) {
    return this.employeesService.getOrThrow(id);
  }

  @Put(":id/production/:month")
  recordProduction(
    @Param("id") id: string,
    @Param("month") month: string,
    @Body() dto: RecordProductionDto,
  ) {
    return this.employeesService.recordProduction(id, month, dto);
  }
}
