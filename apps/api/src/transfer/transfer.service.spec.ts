import { BadRequestException, NotFoundException } from "@nestjs/common";
import { Test, TestingModule } from "@nestjs/testing";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { DepartmentsService } from "../departments/departments.service";
import { EmployeesService } from "../employees/employees.service";
import { StoreService } from "../store/store.service";
import { TransferService } from "./transfer.service";

describe("TransferService", () => {
  let service: TransferService;
  let departments: DepartmentsService;
  let employees: EmployeesService;
  let store: StoreService;
  let dir: string;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [StoreService, DepartmentsService, EmployeesService, TransferService],
    }).compile();

    service = module.get<TransferService>(TransferService);
    departments = module.get<DepartmentsService>(DepartmentsService);
    employees = module.get<EmployeesService>(EmployeesService);
    store = module.get<StoreService>(StoreService);
    dir = await mkdtemp(join(tmpdir(), "compensation-transfer-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  function seed(): void {
    departments.create({ name: "Sales" });
    departments.create({ name: "Plant" });
    const olena = employees.create({
      name: "Olena",
      position: "Seller",
      departmentName: "Sales",
      baseSalary: 2000,
      paymentScheme: "FIXED_SALARY",
      bonusScheme: "FIXED",
      bonusAmount: 300,
    });
    employees.recordProduction(olena.id, "2024-05", { value: 250 });
    employees.create({
      name: "Taras",
      position: "Assembler",
      departmentName: "Plant",
      baseSalary: 100,
      paymentScheme: "PERCENT_PRODUCTION",
      bonusScheme: "PERCENT_OF_BASE",
    });
  }

  it("writes JSON with four-space indentation", async () => {
    seed();
    const path = join(dir, "staff.json");

    const result = await service.exportJson(path);
    const content = await readFile(path, "utf-8");

    expect(result).toEqual({ path, employees: 2 });
    expect(content.split("\n").slice(0, 3)).toEqual([
      "[",
      "    {",
      '        "name": "Olena",',
    ]);
  });

  it("restores employees, departments and production from JSON", async () => {
    seed();
    const path = join(dir, "staff.json");
    await service.exportJson(path);
    store.clear();

    await service.importJson(path);

    expect(Array.from(store.departments.keys())).toEqual(["Sales", "Plant"]);
    expect(
      employees.list().map((employee) => ({
        name: employee.name,
        position: employee.position,
        departmentName: employee.departmentName,
        baseSalary: employee.baseSalary,
        production: employee.production,
        paymentScheme: employee.paymentScheme,
        bonus: employee.bonus,
      })),
    ).toEqual([
      {
        name: "Olena",
        position: "Seller",
        departmentName: "Sales",
        baseSalary: 2000,
        production: { "2024-05": 250 },
        paymentScheme: { kind: "FIXED_SALARY" },
        bonus: { kind: "FIXED", amount: 300 },
      },
      {
        name: "Taras",
        position: "Assembler",
        departmentName: "Plant",
        baseSalary: 100,
        production: {},
        paymentScheme: { kind: "PERCENT_PRODUCTION" },
        bonus: { kind: "PERCENT_OF_BASE" },
      },
    ]);
    expect(store.findDepartment("Sales")?.employeeIds).toHaveLength(1);
  });

  it("loads plain records as fixed salary with a fixed bonus", async () => {
    const path = join(dir, "plain.json");
    await writeFile(
      path,
      JSON.stringify([{ name: "Iryna", position: "Clerk", department: "Office", base_salary: 900 }]),
    );

    await service.importJson(path);

    const [iryna] = employees.list();
    expect(iryna.paymentScheme).toEqual({ kind: "FIXED_SALARY" });
    expect(iryna.bonus).toEqual({ kind: "FIXED", amount: 0 });
    expect(iryna.production).toEqual({});
    expect(store.findDepartment("Office")?.employeeIds).toEqual([iryna.id]);
  });

  it("round-trips employees through CSV without production", async () => {
    seed();
    const path = join(dir, "staff.csv");
    await service.exportCsv(path);

    const content = await readFile(path, "utf-8");
    expect(content.split("\n")).toEqual([
      "name,position,department,base_salary,bonus,payment_scheme,bonus_scheme",
      "Olena,Seller,Sales,2000,300,FIXED_SALARY,FIXED",
      "Taras,Assembler,Plant,100,0,PERCENT_PRODUCTION,PERCENT_OF_BASE",
    ]);

    store.clear();
    const result = await service.importCsv(path);

    expect(result.employees).toBe(2);
    expect(employees.list().map((employee) => [employee.name, employee.baseSalary])).toEqual([
      ["Olena", 2000],
      ["Taras", 100],
    ]);
    expect(employees.list()[0].production).toEqual({});
  });

  it("reloads a CSV row whose position was left blank", async () => {
    departments.create({ name: "Sales" });
    employees.create({
      name: "Olena",
      departmentName: "Sales",
      baseSalary: 2000,
      paymentScheme: "FIXED_SALARY",
      bonusScheme: "PERCENT_OF_BASE",
    });
    const path = join(dir, "no-position.csv");
    await service.exportCsv(path);

    const content = await readFile(path, "utf-8");
    expect(content.split("\n")[1]).toBe("Olena,,Sales,2000,0,FIXED_SALARY,PERCENT_OF_BASE");

    store.clear();
    await service.importCsv(path);

    const [olena] = employees.list();
    expect(olena.name).toBe("Olena");
    expect(olena.position).toBe("");
    expect(olena.bonus).toEqual({ kind: "PERCENT_OF_BASE" });
  });

  it("refuses to write an empty CSV", async () => {
    await expect(service.exportCsv(join(dir, "empty.csv"))).rejects.toBeInstanceOf(
      BadRequestException,
    );
  });

  it("adds nobody when one CSV row is malformed", async () => {
    const path = join(dir, "broken.csv");
    await writeFile(
      path,
      [
        "name,position,department,base_salary",
        "Olena,Seller,Sales,2000",
        "Taras,Assembler,Plant,a lot",
      ].join("\n"),
    );

    await expect(service.importCsv(path)).rejects.toBeInstanceOf(BadRequestException);
    expect(store.employees.size).toBe(0);
    expect(store.departments.size).toBe(0);
  });

  it("rejects JSON that is not a list of records", async () => {
    const path = join(dir, "object.json");
    await writeFile(path, JSON.stringify({ name: "Olena" }));

    await expect(service.importJson(path)).rejects.toBeInstanceOf(BadRequestException);
  });

  it("reports a missing file as not found", async () => {
    await expect(service.importJson(join(dir, "nope.json"))).rejects.toBeInstanceOf(
      NotFoundException,
    );
  });

  it("resolves relative paths against DATA_DIR", async () => {
    const previous = process.env.DATA_DIR;
    process.env.DATA_DIR = dir;
    try {
      seed();
      const result = await service.exportJson("relative.json");
      expect(result.path).toBe(join(dir, "relative.json"));
    } finally {
      if (previous === undefined) {
        delete process.env.DATA_DIR;
      } else {
        process.env.DATA_DIR = previous;
      }
    }
  });
});
