import {
  addEmployee,
  assignManager,
  createDepartment,
  distributePlan,
  setPlan,
} from "./department";
import { Employee } from "./types";

function buildEmployee(id: string): Employee {
  return {
    id,
    name: `Employee ${id}`,
    position: "Operator",
    role: "EMPLOYEE",
    departmentName: "Sales",
    baseSalary: 1000,
    paymentScheme: { kind: "FIXED_SALARY" },
    bonus: 0,
    production: {},
  };
}

describe("distributePlan", () => {
  it("splits the plan evenly across four employees", () => {
    const department = createDepartment("Sales");
    const members = ["a", "b", "c", "d"].map(buildEmployee);
    members.forEach((employee) => addEmployee(department, employee));
    setPlan(department, "2024-05", 1000);

    const share = distributePlan(department, members, "2024-05");

    expect(share).toBe(250);
    for (const employee of members) {
      expect(employee.production["2024-05"]).toBe(250);
    }
  });

  it("overwrites recorded production and gives the same result twice", () => {
    const department = createDepartment("Sales");
    const members = ["a", "b", "c"].map(buildEmployee);
    members[0].production["2024-05"] = 99;
    setPlan(department, "2024-05", 100);

    distributePlan(department, members, "2024-05");
    distributePlan(department, members, "2024-05");

    expect(members.map((employee) => employee.production["2024-05"])).toEqual([
      100 / 3,
      100 / 3,
      100 / 3,
    ]);
  });

  it("writes zero shares when the month has no plan", () => {
    const department = createDepartment("Sales");
    const members = [buildEmployee("a")];

    distributePlan(department, members, "2024-07");

    expect(members[0].production).toEqual({ "2024-07": 0 });
  });

  it("leaves an empty department untouched", () => {
    const department = createDepartment("Sales");
    setPlan(department, "2024-05", 1000);

    expect(distributePlan(department, [], "2024-05")).toBeNull();
    expect(department.plan).toEqual({ "2024-05": 1000 });
    expect(department.employeeIds).toEqual([]);
  });
});

describe("assignManager", () => {
  it("tags the new manager and demotes the previous one", () => {
    const department = createDepartment("Sales");
    const first = buildEmployee("a");
    const second = buildEmployee("b");
    addEmployee(department, first);
    addEmployee(department, second);

    assignManager(department, first, null);
    assignManager(department, second, first);

    expect(department.managerId).toBe("b");
    expect(first.role).toBe("EMPLOYEE");
    expect(second.role).toBe("MANAGER");
  });
});
