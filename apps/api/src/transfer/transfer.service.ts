import {
  BadRequestException,
  Injectable,
  Logger,
  NotFoundException,
} from "@nestjs/common";
import { readFile, writeFile } from "fs/promises";
import * as Papa from "papaparse";
import { resolveDataPath } from "../common/config/data-dir";
import { DepartmentsService } from "../departments/departments.service";
import { EmployeesService, NewEmployee } from "../employees/employees.service";
import {
  dropBlankCells,
  EmployeeRecord,
  parseEmployeeRecord,
  toEmployeeRecord,
} from "./employee-record";

export interface TransferResult {
  path: string;
  employees: number;
}

function isMissingFile(error: unknown): boolean {
  // fs errors may come from another realm, so check the shape, not the class.
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === "ENOENT"
  );
}

@Injectable()
export class TransferService {
  private readonly logger = new Logger(TransferService.name);

  constructor(
    private readonly departmentsService: DepartmentsService,
    private readonly employeesService: EmployeesService,
  ) { }

  async exportJson(filePath: string): Promise<TransferResult> {
    const path = this.resolvePath(filePath);
    const records = this.collectRecords(true);

    await writeFile(path, JSON.stringify(records, null, 4), "utf-8");
    this.logger.log(`Saved ${records.length} employee(s) to ${path}`);
    return { path, employees: records.length };
  }

  async exportCsv(filePath: string): Promise<TransferResult> {
    const path = this.resolvePath(filePath);
    const records = this.collectRecords(false);
    if (records.length === 0) {
      throw new BadRequestException("There are no employees to save");
    }

    // Columns come from the first record; every record has the same shape.
    await writeFile(path, Papa.unparse(records, { newline: "\n" }), "utf-8");
    this.logger.log(`Saved ${records.length} employee(s) to ${path}`);
    return { path, employees: records.length };
  }

  async importJson(filePath: string): Promise<TransferResult> {
    const path = this.resolvePath(filePath);
    const content = await this.readSource(path);

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new BadRequestException(`Invalid JSON in ${path}: ${reason}`);
    }
    if (!Array.isArray(parsed)) {
      throw new BadRequestException(`${path} must contain an array of employee records`);
    }

    return { path, employees: this.importRecords(parsed, path) };
  }

  async importCsv(filePath: string): Promise<TransferResult> {
    const path = this.resolvePath(filePath);
    const content = await this.readSource(path);

    const results = Papa.parse<Record<string, string>>(content, {
      header: true,
      skipEmptyLines: true,
    });
    if (results.errors.length > 0) {
      const first = results.errors[0];
      throw new BadRequestException(
        `CSV parse error in ${path} at row ${first.row ?? "?"}: ${first.message}`,
      );
    }

    const rows = results.data.map((row) => dropBlankCells(row));
    return { path, employees: this.importRecords(rows, path) };
  }

  /**
   * Validates every record before touching the registry, so a malformed file
   * adds nobody.
   */
  private importRecords(records: unknown[], source: string): number {
    const accepted: NewEmployee[] = [];
    const problems: string[] = [];

    records.forEach((raw, index) => {
      const result = parseEmployeeRecord(raw);
      if (result.ok) {
        accepted.push(result.employee);
      } else {
        problems.push(...result.errors.map((message) => `record ${index + 1}: ${message}`));
      }
    });

    if (problems.length > 0) {
      this.logger.warn(`Rejected ${source}: ${problems.length} problem(s)`);
      throw new BadRequestException(problems);
    }

    for (const employee of accepted) {
      this.departmentsService.ensure(employee.departmentName);
      this.employeesService.insert(employee);
    }

    this.logger.log(`Loaded ${accepted.length} employee(s) from ${source}`);
    return accepted.length;
  }

  private collectRecords(withProduction: boolean): EmployeeRecord[] {
    return this.employeesService
      .list()
      .map((employee) => toEmployeeRecord(employee, withProduction));
  }

  private resolvePath(filePath: string): string {
    try {
      return resolveDataPath(filePath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new BadRequestException(reason);
    }
  }

  private async readSource(path: string): Promise<string> {
    try {
      return await readFile(path, "utf-8");
    } catch (error) {
      if (isMissingFile(error)) {
        throw new NotFoundException(`File not found: ${path}`);
      }
      throw error;
    }
  }
}
