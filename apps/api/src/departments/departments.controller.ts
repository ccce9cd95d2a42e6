import { Body, Controller, Get, Param, Post, Put } from "@nestjs/common";
import { AssignManagerDto } from "./dto/assign-manager.dto";
import { CreateDepartmentDto } from "./dto/create-department.dto";
import { SetPlanDto } from "./dto/set-plan.dto";
import { DepartmentsService } from "./departments.service";

@Controller("departments")
export class DepartmentsController {
  constructor(private readonly departmentsService: DepartmentsService) { }

  @Get()
  listDepartments() {
    return this.departmentsService.list();
  }

  @Post()
  createDepartment(@Body() dto: CreateDepartmentDto) {
    return this.departmentsService.create(dto);
  }

  @Put(":name/plan/:month")
  setPlan(
    @Param("name") name: string,
    @Param("month") month: string,
    @Body() dto: SetPlanDto,
  ) {
    return this.departmentsService.setPlan(name, month, dto);
  }

  @Post(":name/plan/:month/distribute")
  distributePlan(@Param("name") name: string, @Param("month") month: string) {
    return this.departmentsService.distributePlan(name, month);
  }

  @Put(":name/manager")
  assignManager(@Param("name") name: string, @Body() dto: AssignManagerDto) {
    return this.departmentsService.assignManager(name, dto);
  }
}
