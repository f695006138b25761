import { z } from "zod";
import type { HourbookConfig } from "./config";
import type { AppContext } from "./context";
import { NotFoundError, ValidationError } from "./errors";
import type { Logger } from "./logger";
import { migrateLegacyData } from "./migration";
import type { HoursReport } from "./reportProvider";
import {
  customerInputSchema,
  customerPatchInputSchema,
  departmentInputSchema,
  departmentPatchInputSchema,
  describeIssues,
  rangeInputSchema,
  taskInputSchema,
  taskPatchInputSchema,
  timeEntryPatchInputSchema,
} from "./schemas";
import { renderStatusLine } from "./statusLine";
import { formatHours, formatSeconds } from "./timeUtils";
import type { Customer, Department, Task, TimeEntry } from "./types";

export type CommandFlags = Record<string, string | undefined>;

export interface CommandInput {
  positionals: string[];
  flags: CommandFlags;
}

export interface CommandIO {
  out(line: string): void;
  writeFile(file: string, content: string): Promise<void>;
}

export type CommandHandler = (
  ctx: AppContext,
  input: CommandInput,
  io: CommandIO
) => Promise<void>;

export interface StandaloneEnv {
  config: HourbookConfig;
  logger: Logger;
  clock?: () => Date;
}

export type StandaloneHandler = (
  env: StandaloneEnv,
  input: CommandInput,
  io: CommandIO
) => Promise<void>;

export const USAGE = [
  "Usage: hourbook <group> <action> [args] [--flags]",
  "",
  "  customer list | add <name> [--email --phone --address] | edit <id> [...] | remove <id>",
  "  department list [--customer] | add <name> --customer <c> [--description] | edit <id> | remove <id>",
  "  task list [--customer --department --from --to] | add --customer --department --date --hours [--description]",
  "  task show <id> | edit <id> [...] | remove <id>",
  "  timer start <taskId> [--description] | stop | status | entries [--task] | edit <entryId> [--description --start --end] | remove <entryId>",
  "  report customers|departments|descriptions [--from --to] | dashboard | time",
  "  export csv [--out <file>] [--from --to]",
  "  migrate",
  "",
  "  Global: --data-dir <dir>",
].join("\n");

function parseInput<T extends z.ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new ValidationError("Invalid input", describeIssues(parsed.error));
  }
  return parsed.data;
}

function requirePositional(input: CommandInput, index: number, label: string): string {
  const value = input.positionals[index]?.trim();
  if (!value) {
    throw new ValidationError(`${label} is required`);
  }
  return value;
}

// #region Lookups

function resolveCustomer(ctx: AppContext, ref: string): Customer {
  const byId = ctx.customers.get(ref);
  if (byId) {
    return byId;
  }
  const matches = ctx.ledger.findCustomersByName(ref);
  if (matches.length === 0) {
    throw new NotFoundError("Customer", ref);
  }
  if (matches.length > 1) {
    throw new ValidationError(`Customer name ${ref} is ambiguous; pass an id`);
  }
  return matches[0];
}

function resolveDepartment(ctx: AppContext, ref: string, customerId?: string): Department {
  const byId = ctx.departments.get(ref);
  if (byId) {
    return byId;
  }
  const candidates = customerId
    ? [ctx.ledger.findDepartmentByName(customerId, ref)]
    : ctx.departments.list().filter(
        (department) => department.name.trim().toLowerCase() === ref.trim().toLowerCase()
      );
  const matches = candidates.filter((department): department is Department => Boolean(department));
  if (matches.length === 0) {
    throw new NotFoundError("Department", ref);
  }
  if (matches.length > 1) {
    throw new ValidationError(`Department name ${ref} is ambiguous; pass --customer or an id`);
  }
  return matches[0];
}

function requireTask(ctx: AppContext, id: string): Task {
  const task = ctx.tasks.get(id);
  if (!task) {
    throw new NotFoundError("Task", id);
  }
  return task;
}

// #endregion

// #region Formatting

function printCustomer(io: CommandIO, customer: Customer): void {
  io.out(`${customer.name} [${customer.id}]`);
  for (const [label, value] of [
    ["Email", customer.email],
    ["Phone", customer.phone],
    ["Address", customer.address],
  ] as const) {
    if (value) {
      io.out(`   ${label}: ${value}`);
    }
  }
}

function printTask(ctx: AppContext, io: CommandIO, task: Task): void {
  const customer = ctx.customers.get(task.customer_id)?.name ?? "Unknown customer";
  const department = ctx.departments.get(task.department_id)?.name ?? "Unknown department";
  io.out(`${task.date} ${formatHours(task.hours)} ${customer}/${department} [${task.id}]`);
  if (task.description) {
    io.out(`   Description: ${task.description}`);
  }
  const tracked = ctx.tracker.elapsed(task.id);
  if (tracked > 0) {
    io.out(`   Tracked: ${formatSeconds(tracked)}`);
  }
}

function printEntry(ctx: AppContext, io: CommandIO, entry: TimeEntry): void {
  const task = ctx.tasks.get(entry.task_id);
  const label = task ? ctx.reports.describeTask(task) : "Unknown task";
  const state = entry.end_time === null ? "running" : formatSeconds(entry.duration_seconds);
  io.out(`${entry.start_time} ${state} ${label} [${entry.id}]`);
  if (entry.description) {
    io.out(`   Description: ${entry.description}`);
  }
}

function printHoursReport(io: CommandIO, title: string, report: HoursReport): void {
  io.out(`--- ${title} ---`);
  if (report.rows.length === 0) {
    io.out("No tasks found.");
    return;
  }
  for (const row of report.rows) {
    io.out(
      `${row.label}: ${formatHours(row.totalHours)} in ${row.taskCount} task(s) (${row.percentage.toFixed(1)}%)`
    );
  }
  io.out(`TOTAL: ${formatHours(report.totalHours)}`);
}

// #endregion

// #region Handlers

const customerCommands: Record<string, CommandHandler> = {
  async list(ctx, _input, io) {
    const customers = ctx.customers.list().sort((a, b) => a.name.localeCompare(b.name));
    if (customers.length === 0) {
      io.out("No customers found.");
      return;
    }
    for (const customer of customers) {
      printCustomer(io, customer);
    }
  },
  async add(ctx, input, io) {
    const fields = parseInput(customerInputSchema, {
      name: input.positionals[0] ?? input.flags.name,
      email: input.flags.email,
      phone: input.flags.phone,
      address: input.flags.address,
    });
    const customer = await ctx.ledger.createCustomer(fields);
    io.out(`Created customer ${customer.name} [${customer.id}]`);
  },
  async edit(ctx, input, io) {
    const id = resolveCustomer(ctx, requirePositional(input, 0, "Customer")).id;
    const patch = parseInput(customerPatchInputSchema, input.flags);
    const updated = await ctx.ledger.updateCustomer(id, patch);
    if (!updated) {
      throw new NotFoundError("Customer", id);
    }
    io.out(`Updated customer ${updated.name}`);
  },
  async remove(ctx, input, io) {
    const customer = resolveCustomer(ctx, requirePositional(input, 0, "Customer"));
    await ctx.ledger.deleteCustomer(customer.id);
    io.out(`Deleted customer ${customer.name}`);
  },
};

const departmentCommands: Record<string, CommandHandler> = {
  async list(ctx, input, io) {
    const departments = input.flags.customer
      ? ctx.departments.listByCustomer(resolveCustomer(ctx, input.flags.customer).id)
      : ctx.departments.list();
    if (departments.length === 0) {
      io.out("No departments found.");
      return;
    }
    departments.sort((a, b) => a.name.localeCompare(b.name));
    for (const department of departments) {
      const owner = ctx.customers.get(department.customer_id)?.name ?? "Unknown customer";
      io.out(`${department.name} (${owner}) [${department.id}]`);
      if (department.description) {
        io.out(`   Description: ${department.description}`);
      }
    }
  },
  async add(ctx, input, io) {
    const fields = parseInput(departmentInputSchema, {
      name: input.positionals[0] ?? input.flags.name,
      customerId: input.flags.customer,
      description: input.flags.description,
    });
    const customer = resolveCustomer(ctx, fields.customerId);
    const department = await ctx.ledger.createDepartment({
      name: fields.name,
      customer_id: customer.id,
      description: fields.description,
    });
    io.out(`Created department ${department.name} for ${customer.name} [${department.id}]`);
  },
  async edit(ctx, input, io) {
    const id = resolveDepartment(ctx, requirePositional(input, 0, "Department")).id;
    const patch = parseInput(departmentPatchInputSchema, {
      name: input.flags.name,
      customerId: input.flags.customer,
      description: input.flags.description,
    });
    const updated = await ctx.ledger.updateDepartment(id, {
      name: patch.name,
      customer_id: patch.customerId ? resolveCustomer(ctx, patch.customerId).id : undefined,
      description: patch.description,
    });
    if (!updated) {
      throw new NotFoundError("Department", id);
    }
    io.out(`Updated department ${updated.name}`);
  },
  async remove(ctx, input, io) {
    const department = resolveDepartment(ctx, requirePositional(input, 0, "Department"));
    await ctx.ledger.deleteDepartment(department.id);
    io.out(`Deleted department ${department.name}`);
  },
};

const taskCommands: Record<string, CommandHandler> = {
  async list(ctx, input, io) {
    const range = parseInput(rangeInputSchema, { from: input.flags.from, to: input.flags.to });
    const relation = input.flags.department
      ? { departmentId: resolveDepartment(ctx, input.flags.department).id }
      : input.flags.customer
        ? { customerId: resolveCustomer(ctx, input.flags.customer).id }
        : undefined;
    const tasks = ctx.reports.listTasks({ relation, range });
    if (tasks.length === 0) {
      io.out("No tasks found.");
      return;
    }
    for (const task of tasks) {
      printTask(ctx, io, task);
    }
  },
  async show(ctx, input, io) {
    printTask(ctx, io, requireTask(ctx, requirePositional(input, 0, "Task")));
  },
  async add(ctx, input, io) {
    const fields = parseInput(taskInputSchema, {
      customerId: input.flags.customer,
      departmentId: input.flags.department,
      date: input.flags.date,
      hours: input.flags.hours,
      description: input.flags.description,
    });
    const customer = resolveCustomer(ctx, fields.customerId);
    const department = resolveDepartment(ctx, fields.departmentId, customer.id);
    const task = await ctx.ledger.createTask({
      customer_id: customer.id,
      department_id: department.id,
      date: fields.date,
      hours: fields.hours,
      description: fields.description,
    });
    io.out(`Created task for ${customer.name}/${department.name} [${task.id}]`);
  },
  async edit(ctx, input, io) {
    const task = requireTask(ctx, requirePositional(input, 0, "Task"));
    const patch = parseInput(taskPatchInputSchema, {
      customerId: input.flags.customer,
      departmentId: input.flags.department,
      date: input.flags.date,
      hours: input.flags.hours,
      description: input.flags.description,
    });
    const customerId = patch.customerId
      ? resolveCustomer(ctx, patch.customerId).id
      : undefined;
    const departmentId = patch.departmentId
      ? resolveDepartment(ctx, patch.departmentId, customerId ?? task.customer_id).id
      : undefined;
    const updated = await ctx.ledger.updateTask(task.id, {
      customer_id: customerId,
      department_id: departmentId,
      date: patch.date,
      hours: patch.hours,
      description: patch.description,
    });
    if (!updated) {
      throw new NotFoundError("Task", task.id);
    }
    io.out(`Updated task ${updated.id}`);
  },
  async remove(ctx, input, io) {
    const id = requirePositional(input, 0, "Task");
    if (!(await ctx.ledger.deleteTask(id))) {
      throw new NotFoundError("Task", id);
    }
    io.out(`Deleted task ${id}`);
  },
};

const timerCommands: Record<string, CommandHandler> = {
  async start(ctx, input, io) {
    const task = requireTask(ctx, requirePositional(input, 0, "Task"));
    const previous = ctx.tracker.getActive();
    const entry = await ctx.tracker.start(task.id, input.flags.description?.trim() ?? "");
    if (previous) {
      const closed = ctx.tracker.getEntry(previous.id);
      io.out(
        `Stopped previous timer after ${formatSeconds(closed?.duration_seconds ?? 0)}`
      );
    }
    io.out(`Timer started for ${ctx.reports.describeTask(task)} at ${entry.start_time}`);
  },
  async stop(ctx, _input, io) {
    const completed = await ctx.tracker.stop();
    if (!completed) {
      io.out("No active timer to stop.");
      return;
    }
    io.out(`Timer stopped after ${formatSeconds(completed.duration_seconds)}`);
  },
  async status(ctx, _input, io) {
    io.out(
      renderStatusLine(
        ctx.tracker,
        (task) => ctx.reports.describeTask(task),
        (taskId) => ctx.tasks.get(taskId)
      )
    );
  },
  async entries(ctx, input, io) {
    const entries = input.flags.task
      ? ctx.tracker.entriesFor(requireTask(ctx, input.flags.task).id)
      : ctx.reports.entries();
    if (entries.length === 0) {
      io.out("No time entries found.");
      return;
    }
    let total = 0;
    for (const entry of entries) {
      printEntry(ctx, io, entry);
      total += entry.duration_seconds;
    }
    io.out(`TOTAL: ${formatSeconds(total)}`);
  },
  async edit(ctx, input, io) {
    const id = requirePositional(input, 0, "Time entry");
    const patch = parseInput(timeEntryPatchInputSchema, input.flags);
    const updated = await ctx.tracker.updateEntry(id, {
      description: patch.description,
      start_time: patch.start ? new Date(patch.start).toISOString() : undefined,
      end_time: patch.end ? new Date(patch.end).toISOString() : undefined,
    });
    if (!updated) {
      throw new NotFoundError("Time entry", id);
    }
    io.out(`Updated time entry ${updated.id} (${formatSeconds(updated.duration_seconds)})`);
  },
  async remove(ctx, input, io) {
    const id = requirePositional(input, 0, "Time entry");
    if (!(await ctx.tracker.deleteEntry(id))) {
      throw new NotFoundError("Time entry", id);
    }
    io.out(`Deleted time entry ${id}`);
  },
};

const reportCommands: Record<string, CommandHandler> = {
  async customers(ctx, input, io) {
    const range = parseInput(rangeInputSchema, { from: input.flags.from, to: input.flags.to });
    printHoursReport(io, "HOURS BY CUSTOMER", ctx.reports.byCustomer(range));
  },
  async departments(ctx, input, io) {
    const range = parseInput(rangeInputSchema, { from: input.flags.from, to: input.flags.to });
    printHoursReport(io, "HOURS BY DEPARTMENT", ctx.reports.byDepartment(range));
  },
  async descriptions(ctx, input, io) {
    const range = parseInput(rangeInputSchema, { from: input.flags.from, to: input.flags.to });
    printHoursReport(io, "HOURS BY DESCRIPTION", ctx.reports.byDescription(range));
  },
  async dashboard(ctx, _input, io) {
    const summary = ctx.reports.dashboard();
    io.out("--- DASHBOARD ---");
    io.out(`Tasks: ${summary.totalTasks}`);
    io.out(`Hours: ${formatHours(summary.totalHours)}`);
    io.out(`Customers: ${summary.totalCustomers}`);
    io.out(`Departments: ${summary.totalDepartments}`);
    if (summary.recentTasks.length > 0) {
      io.out("Recent tasks:");
      for (const task of summary.recentTasks) {
        printTask(ctx, io, task);
      }
    }
  },
  async time(ctx, _input, io) {
    const report = ctx.reports.trackedTime();
    io.out("--- TRACKED TIME BY TASK ---");
    if (report.rows.length === 0) {
      io.out("No time entries found.");
      return;
    }
    for (const row of report.rows) {
      io.out(`${row.label}: ${formatSeconds(row.seconds)} (${row.percentage.toFixed(1)}%)`);
    }
    io.out(`TOTAL: ${formatSeconds(report.totalSeconds)}`);
  },
};

const exportCommands: Record<string, CommandHandler> = {
  async csv(ctx, input, io) {
    const range = parseInput(rangeInputSchema, { from: input.flags.from, to: input.flags.to });
    const content = ctx.reports.exportCsv(range);
    if (!input.flags.out) {
      io.out(content);
      return;
    }
    await io.writeFile(input.flags.out, `${content}\n`);
    io.out(`Exported report to ${input.flags.out}`);
  },
};

const migrateCommand: StandaloneHandler = async (env, _input, io) => {
  const summary = await migrateLegacyData(env.config.dataDir, {
    logger: env.logger,
    clock: env.clock,
  });
  io.out(`Customers created: ${summary.customersCreated}`);
  io.out(`Departments created: ${summary.departmentsCreated}`);
  io.out(`Tasks converted: ${summary.tasksConverted}`);
  if (summary.backupDir) {
    io.out(`Backup location: ${summary.backupDir}`);
  }
  if (summary.invalidReferences.length > 0) {
    io.out(`Found ${summary.invalidReferences.length} invalid reference(s):`);
    for (const problem of summary.invalidReferences) {
      io.out(`   ${problem}`);
    }
  }
};

// #endregion

type CommandEntry =
  | { kind: "group"; actions: Record<string, CommandHandler> }
  | { kind: "standalone"; handler: StandaloneHandler };

export const COMMANDS: ReadonlyMap<string, CommandEntry> = new Map<string, CommandEntry>([
  ["customer", { kind: "group", actions: customerCommands }],
  ["department", { kind: "group", actions: departmentCommands }],
  ["task", { kind: "group", actions: taskCommands }],
  ["timer", { kind: "group", actions: timerCommands }],
  ["report", { kind: "group", actions: reportCommands }],
  ["export", { kind: "group", actions: exportCommands }],
  // Runs without opening the stores: it exists to read files they reject.
  ["migrate", { kind: "standalone", handler: migrateCommand }],
]);

export type ResolvedCommand =
  | { kind: "context"; handler: CommandHandler; input: CommandInput }
  | { kind: "standalone"; handler: StandaloneHandler; input: CommandInput };

/** Finds the handler for `<group> <action>`; the returned input drops both words. */
export function resolveCommand(input: CommandInput): ResolvedCommand | undefined {
  const [group, action, ...rest] = input.positionals;
  const entry = group ? COMMANDS.get(group) : undefined;
  if (!entry) {
    return undefined;
  }
  if (entry.kind === "standalone") {
    return {
      kind: "standalone",
      handler: entry.handler,
      input: { flags: input.flags, positionals: input.positionals.slice(1) },
    };
  }
  if (!action || !Object.hasOwn(entry.actions, action)) {
    return undefined;
  }
  return {
    kind: "context",
    handler: entry.actions[action],
    input: { flags: input.flags, positionals: rest },
  };
}
