import { Module } from "@nestjs/common";
import { DepartmentsModule } from "../departments/departments.module";
import { EmployeesModule } from "../employees/employees.module";
import { TransferController } from "./transfer.controller";
import { TransferService } from "./transfer.service";

@Module({
  imports: [DepartmentsModule, EmployeesModule],
  controllers: [TransferController],
  providers: [TransferService],
})
export class TransferModule {}
