import { Injectable } from "@nestjs/common";
import { StoreService } from "./store/store.service";

@Injectable()
export class AppService {
  constructor(private readonly store: StoreService) {}

  getHello(): string {
    return `Compensation API ready: ${this.store.departments.size} department(s), ${this.store.employees.size} employee(s)`;
  }
}
