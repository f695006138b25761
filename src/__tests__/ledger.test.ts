import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "../config";
import { AppContext } from "../context";
import { ReferentialIntegrityError } from "../errors";
import { tasksFor, totalHours } from "../reportProvider";
import { createClock, makeTempDir, removeDir, sequentialIds, type TestClock } from "./helpers";

describe("WorkLedger", () => {
  let dir: string;
  let clock: TestClock;
  let ctx: AppContext;

  beforeEach(async () => {
    dir = await makeTempDir();
    clock = createClock();
    ctx = await AppContext.open(loadConfig({}, { dataDir: dir }), {
      clock: clock.now,
      idFactory: sequentialIds(),
    });
  });

  afterEach(async () => {
    ctx.dispose();
    await removeDir(dir);
  });

  async function seed() {
    const acme = await ctx.ledger.createCustomer({ name: "Acme" });
    const eng = await ctx.ledger.createDepartment({ name: "Eng", customer_id: acme.id });
    const task = await ctx.ledger.createTask({
      customer_id: acme.id,
      department_id: eng.id,
      date: "2024-01-01",
      hours: 2.5,
      description: "design",
    });
    return { acme, eng, task };
  }

  it("books hours against a customer and department", async () => {
    const { acme, eng, task } = await seed();

    expect(task).toEqual({
      id: "id-3",
      customer_id: acme.id,
      department_id: eng.id,
      date: "2024-01-01",
      hours: 2.5,
      description: "design",
      created_at: "2024-01-01T09:00:00.000Z",
      updated_at: "2024-01-01T09:00:00.000Z",
    });
    expect(totalHours(tasksFor(ctx.tasks.list(), { customerId: acme.id }))).toBe(2.5);
    expect(totalHours(tasksFor(ctx.tasks.list(), { departmentId: eng.id }))).toBe(2.5);
  });

  it("rejects departments for unknown customers", async () => {
    await expect(
      ctx.ledger.createDepartment({ name: "Eng", customer_id: "ghost" })
    ).rejects.toThrow("Unknown customer: ghost");
    expect(ctx.departments.count()).toBe(0);
  });

  it("rejects tasks whose department belongs to another customer", async () => {
    const { eng } = await seed();
    const globex = await ctx.ledger.createCustomer({ name: "Globex" });

    await expect(
      ctx.ledger.createTask({
        customer_id: globex.id,
        department_id: eng.id,
        date: "2024-01-02",
        hours: 1,
        description: "",
      })
    ).rejects.toThrow(ReferentialIntegrityError);
    await expect(
      ctx.ledger.createTask({
        customer_id: globex.id,
        department_id: "ghost",
        date: "2024-01-02",
        hours: 1,
        description: "",
      })
    ).rejects.toThrow("Unknown department: ghost");
  });

  it("checks references again when a task moves", async () => {
    const { acme, task } = await seed();
    const ops = await ctx.ledger.createDepartment({ name: "Ops", customer_id: acme.id });
    const globex = await ctx.ledger.createCustomer({ name: "Globex" });

    await expect(ctx.ledger.updateTask(task.id, { customer_id: globex.id })).rejects.toThrow(
      ReferentialIntegrityError
    );

    clock.advance(60);
    const moved = await ctx.ledger.updateTask(task.id, { department_id: ops.id, hours: 3 });
    expect(moved).toMatchObject({
      department_id: ops.id,
      hours: 3,
      updated_at: "2024-01-01T09:01:00.000Z",
    });
    expect(await ctx.ledger.updateTask("ghost", { hours: 1 })).toBeUndefined();
  });

  it("refuses to delete a customer that still has departments or tasks", async () => {
    const { acme } = await seed();

    await expect(ctx.ledger.deleteCustomer(acme.id)).rejects.toThrow(
      `Customer ${acme.id} still has 1 department(s) and 1 task(s)`
    );
    expect(ctx.customers.has(acme.id)).toBe(true);
  });

  it("refuses to delete a department that still has tasks", async () => {
    const { eng } = await seed();

    await expect(ctx.ledger.deleteDepartment(eng.id)).rejects.toThrow(
      `Department ${eng.id} still has 1 task(s)`
    );
  });

  it("deletes bottom-up once dependents are gone", async () => {
    const { acme, eng, task } = await seed();

    expect(await ctx.ledger.deleteTask(task.id)).toBe(true);
    expect(await ctx.ledger.deleteDepartment(eng.id)).toBe(true);
    expect(await ctx.ledger.deleteCustomer(acme.id)).toBe(true);
    expect(await ctx.ledger.deleteCustomer(acme.id)).toBe(false);
    expect(await ctx.ledger.deleteDepartment(eng.id)).toBe(false);
    expect(await ctx.ledger.deleteTask(task.id)).toBe(false);
  });

  it("removes a task's time entries along with it", async () => {
    const { task } = await seed();
    await ctx.tracker.start(task.id);
    clock.advance(60);
    await ctx.tracker.stop();
    await ctx.tracker.start(task.id);

    await ctx.ledger.deleteTask(task.id);

    expect(ctx.tracker.listEntries()).toEqual([]);
    expect(ctx.tracker.isRunning()).toBe(false);
  });

  it("moves a department to another customer only while it has no tasks", async () => {
    const { eng } = await seed();
    const globex = await ctx.ledger.createCustomer({ name: "Globex" });
    const empty = await ctx.ledger.createDepartment({ name: "Sales", customer_id: globex.id });
    const initech = await ctx.ledger.createCustomer({ name: "Initech" });

    await expect(
      ctx.ledger.updateDepartment(eng.id, { customer_id: globex.id })
    ).rejects.toThrow(`Department ${eng.id} has 1 task(s) booked under its current customer`);
    await expect(
      ctx.ledger.updateDepartment(empty.id, { customer_id: "ghost" })
    ).rejects.toThrow("Unknown customer: ghost");

    const moved = await ctx.ledger.updateDepartment(empty.id, { customer_id: initech.id });
    expect(moved?.customer_id).toBe(initech.id);
  });

  it("looks customers and departments up by name", async () => {
    const { acme, eng } = await seed();

    expect(ctx.ledger.findCustomerByName("acme")?.id).toBe(acme.id);
    expect(ctx.ledger.findDepartmentByName(acme.id, "ENG")?.id).toBe(eng.id);
  });
});
