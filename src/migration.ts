import { promises as fs } from "fs";
import * as path from "path";
import { z } from "zod";
import { storePaths } from "./config";
import { CustomerStore } from "./customerStore";
import { DepartmentStore } from "./departmentStore";
import { StoreLoadError } from "./errors";
import { pathExists, readJsonFile, writeJsonFile } from "./jsonFile";
import { type Logger, silentLogger } from "./logger";
import type { LoadResult } from "./storage";
import { TaskStore } from "./taskStore";
import { compactTimestamp, formatLocalDay, isValidDay } from "./timeUtils";
import type { StoreFile } from "./types";

const DEFAULT_CUSTOMER = "Unknown Customer";
const DEFAULT_DEPARTMENT = "General";
const DEFAULT_HOURS = 1;

// Tasks from the first data layout: free-text customer/project, planned hours.
const projectTaskSchema = z.object({
  title: z.string().optional(),
  description: z.string().optional(),
  customer: z.string().optional(),
  project: z.string().optional(),
  status: z.enum(["active", "completed", "paused"]).optional(),
  estimated_hours: z.number().nonnegative().optional(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

// Tasks keyed by customer and department names instead of ids.
const namedTaskSchema = z.object({
  customer: z.string().optional(),
  department: z.string().optional(),
  date: z.string().optional(),
  hours: z.number().nonnegative().optional(),
  description: z.string().optional(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

type ProjectTask = z.infer<typeof projectTaskSchema>;
type NamedTask = z.infer<typeof namedTaskSchema>;

export interface MigrationOptions {
  logger?: Logger;
  clock?: () => Date;
  idFactory?: () => string;
  /** Skip the backup copy of the data files. */
  skipBackup?: boolean;
}

export interface MigrationSummary {
  backupDir: string | null;
  customersCreated: number;
  departmentsCreated: number;
  tasksUpgraded: number;
  tasksConverted: number;
  tasksUnchanged: number;
  invalidReferences: string[];
}

type RawTaskKind = "normalized" | "project" | "named" | "unknown";

function classify(raw: unknown): RawTaskKind {
  if (!raw || typeof raw !== "object") {
    return "unknown";
  }
  if ("customer_id" in raw && "department_id" in raw) {
    return "normalized";
  }
  if ("department" in raw) {
    return "named";
  }
  if ("title" in raw || "project" in raw || "estimated_hours" in raw || "status" in raw) {
    return "project";
  }
  if ("customer" in raw) {
    return "named";
  }
  return "unknown";
}

/**
 * Rewrites tasks.json from either legacy layout into the id-based layout,
 * creating customers and departments by name. Tasks already in the id-based
 * layout are left alone.
 */
export async function migrateLegacyData(
  dataDir: string,
  options: MigrationOptions = {}
): Promise<MigrationSummary> {
  const logger = options.logger ?? silentLogger;
  const clock = options.clock ?? (() => new Date());
  const paths = storePaths(dataDir);
  const summary: MigrationSummary = {
    backupDir: null,
    customersCreated: 0,
    departmentsCreated: 0,
    tasksUpgraded: 0,
    tasksConverted: 0,
    tasksUnchanged: 0,
    invalidReferences: [],
  };

  const read = await readJsonFile(paths.tasks);
  if (read.status === "missing") {
    logger.info("no tasks file found, nothing to migrate");
    return summary;
  }
  if (read.status === "invalid") {
    throw new StoreLoadError(paths.tasks, read.reason, read.cause);
  }
  const rawTasks = read.value;
  if (!rawTasks || typeof rawTasks !== "object" || Array.isArray(rawTasks)) {
    throw new StoreLoadError(paths.tasks, "expected an object keyed by id");
  }

  if (!options.skipBackup) {
    summary.backupDir = await backupDataFiles(dataDir, clock(), logger);
  }

  const storeOptions = { logger, clock, idFactory: options.idFactory };
  const customers = new CustomerStore({ file: paths.customers, ...storeOptions });
  const departments = new DepartmentStore({ file: paths.departments, ...storeOptions });
  requireReadable(await customers.load());
  requireReadable(await departments.load());

  const resolveCustomer = async (name: string): Promise<string> => {
    const existing = customers.findByName(name);
    if (existing) {
      return existing.id;
    }
    const created = await customers.create({ name });
    summary.customersCreated++;
    logger.info(`created customer: ${name}`);
    return created.id;
  };

  const resolveDepartment = async (customerId: string, name: string): Promise<string> => {
    const existing = departments.findByName(customerId, name);
    if (existing) {
      return existing.id;
    }
    const created = await departments.create({ name, customer_id: customerId });
    summary.departmentsCreated++;
    logger.info(`created department: ${name}`);
    return created.id;
  };

  const nowIso = clock().toISOString();
  const converted: StoreFile<unknown> = {};

  for (const [taskId, raw] of Object.entries(rawTasks)) {
    const kind = classify(raw);
    if (kind === "normalized" || kind === "unknown") {
      if (kind === "unknown") {
        logger.warn(`task ${taskId} has an unrecognised layout; kept as is`);
      }
      converted[taskId] = raw;
      summary.tasksUnchanged++;
      continue;
    }

    let named: NamedTask;
    if (kind === "project") {
      const parsed = projectTaskSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn(`task ${taskId} could not be read; kept as is`);
        converted[taskId] = raw;
        summary.tasksUnchanged++;
        continue;
      }
      named = upgradeProjectTask(parsed.data, clock());
      summary.tasksUpgraded++;
    } else {
      const parsed = namedTaskSchema.safeParse(raw);
      if (!parsed.success) {
        logger.warn(`task ${taskId} could not be read; kept as is`);
        converted[taskId] = raw;
        summary.tasksUnchanged++;
        continue;
      }
      named = parsed.data;
    }

    const customerName = named.customer?.trim() || DEFAULT_CUSTOMER;
    const departmentName = named.department?.trim() || DEFAULT_DEPARTMENT;
    const customerId = await resolveCustomer(customerName);
    const departmentId = await resolveDepartment(customerId, departmentName);
    const createdAt = named.created_at || nowIso;

    converted[taskId] = {
      id: taskId,
      customer_id: customerId,
      department_id: departmentId,
      date: named.date ?? formatLocalDay(clock()),
      hours: named.hours ?? 0,
      description: named.description ?? "",
      created_at: createdAt,
      updated_at: named.updated_at || createdAt,
    };
    summary.tasksConverted++;
    logger.info(`converted task ${taskId} for ${customerName}/${departmentName}`);
  }

  await writeJsonFile(paths.tasks, converted);
  summary.invalidReferences = await verifyReferences(dataDir, logger);

  logger.info(
    `migration finished: ${summary.customersCreated} customer(s), ${summary.departmentsCreated} department(s) created, ${summary.tasksConverted} task(s) converted`
  );
  return summary;
}

function upgradeProjectTask(task: ProjectTask, now: Date): NamedTask {
  const title = task.title ?? "";
  const createdDay = task.created_at?.slice(0, 10);
  return {
    customer: task.customer,
    department: task.project,
    date: createdDay && isValidDay(createdDay) ? createdDay : formatLocalDay(now),
    hours: task.estimated_hours ?? DEFAULT_HOURS,
    description: task.description ? `${title} - ${task.description}` : title,
    created_at: task.created_at,
    updated_at: task.updated_at,
  };
}

/** Lists every task whose customer or department does not exist. */
export async function verifyReferences(dataDir: string, logger: Logger = silentLogger): Promise<string[]> {
  const paths = storePaths(dataDir);
  const customers = new CustomerStore({ file: paths.customers, logger });
  const departments = new DepartmentStore({ file: paths.departments, logger });
  const tasks = new TaskStore({ file: paths.tasks, logger });
  const problems: string[] = [];

  for (const [name, result] of [
    ["customers", await customers.load()],
    ["departments", await departments.load()],
    ["tasks", await tasks.load()],
  ] as const) {
    if (result.status === "corrupt") {
      problems.push(`${name}: ${result.error.message}`);
    }
  }

  for (const task of tasks.list()) {
    if (!customers.has(task.customer_id)) {
      problems.push(`task ${task.id} references missing customer ${task.customer_id}`);
    }
    if (!departments.has(task.department_id)) {
      problems.push(`task ${task.id} references missing department ${task.department_id}`);
    }
  }

  for (const problem of problems) {
    logger.warn(problem);
  }
  return problems;
}

async function backupDataFiles(dataDir: string, now: Date, logger: Logger): Promise<string> {
  const backupDir = path.join(dataDir, `backup_${compactTimestamp(now)}`);
  await fs.mkdir(backupDir, { recursive: true });
  for (const file of Object.values(storePaths(dataDir))) {
    if (await pathExists(file)) {
      await fs.copyFile(file, path.join(backupDir, path.basename(file)));
      logger.info(`backed up ${file}`);
    }
  }
  return backupDir;
}

function requireReadable(result: LoadResult): void {
  if (result.status === "corrupt") {
    throw result.error;
  }
}
