import type { CustomerStore } from "./customerStore";
import type { DepartmentStore } from "./departmentStore";
import type { TaskStore } from "./taskStore";
import type { Tracker } from "./tracker";
import type { Customer, DateRange, Department, Task, TimeEntry } from "./types";

export type TaskRelation = { customerId: string } | { departmentId: string };

export interface HoursReportRow {
  key: string;
  label: string;
  totalHours: number;
  taskCount: number;
  percentage: number;
}

export interface HoursReport {
  rows: HoursReportRow[];
  totalHours: number;
  range: DateRange;
}

export interface TrackedTimeRow {
  task: Task;
  label: string;
  seconds: number;
  percentage: number;
}

export interface TrackedTimeReport {
  rows: TrackedTimeRow[];
  totalSeconds: number;
}

export interface DashboardSummary {
  totalTasks: number;
  totalHours: number;
  totalCustomers: number;
  totalDepartments: number;
  recentTasks: Task[];
}

export interface ReportSource {
  customers: CustomerStore;
  departments: DepartmentStore;
  tasks: TaskStore;
  tracker: Tracker;
}

const UNKNOWN_CUSTOMER = "Unknown customer";
const UNKNOWN_DEPARTMENT = "Unknown department";
const NO_DESCRIPTION = "(no description)";
const RECENT_TASK_LIMIT = 10;

// #region Query helpers

export function tasksFor(tasks: Task[], relation: TaskRelation): Task[] {
  if ("customerId" in relation) {
    return tasks.filter((task) => task.customer_id === relation.customerId);
  }
  return tasks.filter((task) => task.department_id === relation.departmentId);
}

export function filterByRange(tasks: Task[], range: DateRange = {}): Task[] {
  return tasks.filter((task) => {
    if (range.from && task.date < range.from) {
      return false;
    }
    if (range.to && task.date > range.to) {
      return false;
    }
    return true;
  });
}

export function groupBy<T, K>(items: T[], keyFn: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const key = keyFn(item);
    const bucket = groups.get(key);
    if (bucket) {
      bucket.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

export function totalHours(tasks: Task[]): number {
  return tasks.reduce((sum, task) => sum + task.hours, 0);
}

/** Share of the grand total per group, in percent; 0 everywhere when the total is 0. */
export function percentageBreakdown<K>(totals: Map<K, number>): Map<K, number> {
  let grandTotal = 0;
  for (const value of totals.values()) {
    grandTotal += value;
  }
  const result = new Map<K, number>();
  for (const [key, value] of totals) {
    result.set(key, grandTotal > 0 ? (value / grandTotal) * 100 : 0);
  }
  return result;
}

export function sortByDateDesc(tasks: Task[]): Task[] {
  return [...tasks].sort(
    (a, b) => b.date.localeCompare(a.date) || b.created_at.localeCompare(a.created_at)
  );
}

export function sortByCreatedDesc(tasks: Task[]): Task[] {
  return [...tasks].sort((a, b) => b.created_at.localeCompare(a.created_at));
}

export function sortEntriesByStartDesc(entries: TimeEntry[]): TimeEntry[] {
  return [...entries].sort((a, b) => b.start_time.localeCompare(a.start_time));
}

// #endregion

export class ReportProvider {
  private readonly source: ReportSource;

  constructor(source: ReportSource) {
    this.source = source;
  }

  listTasks(options?: { relation?: TaskRelation; range?: DateRange }): Task[] {
    let tasks = this.source.tasks.list();
    if (options?.relation) {
      tasks = tasksFor(tasks, options.relation);
    }
    return sortByDateDesc(filterByRange(tasks, options?.range));
  }

  byCustomer(range: DateRange = {}): HoursReport {
    const customers = this.indexById(this.source.customers.list());
    return this.buildHoursReport(range, (task) => task.customer_id, (key) =>
      customers.get(key)?.name ?? UNKNOWN_CUSTOMER
    );
  }

  byDepartment(range: DateRange = {}): HoursReport {
    const customers = this.indexById(this.source.customers.list());
    const departments = this.indexById(this.source.departments.list());
    return this.buildHoursReport(range, (task) => task.department_id, (key) => {
      const department = departments.get(key);
      if (!department) {
        return UNKNOWN_DEPARTMENT;
      }
      const owner = customers.get(department.customer_id)?.name ?? UNKNOWN_CUSTOMER;
      return `${department.name} (${owner})`;
    });
  }

  byDescription(range: DateRange = {}): HoursReport {
    return this.buildHoursReport(
      range,
      (task) => task.description.trim() || NO_DESCRIPTION,
      (key) => key
    );
  }

  dashboard(): DashboardSummary {
    const tasks = this.source.tasks.list();
    return {
      totalTasks: tasks.length,
      totalHours: totalHours(tasks),
      totalCustomers: this.source.customers.count(),
      totalDepartments: this.source.departments.count(),
      recentTasks: sortByCreatedDesc(tasks).slice(0, RECENT_TASK_LIMIT),
    };
  }

  trackedTime(): TrackedTimeReport {
    const tracker = this.source.tracker;
    const seconds = new Map<string, number>();
    const byId = new Map<string, Task>();
    for (const task of this.source.tasks.list()) {
      const tracked = tracker.elapsed(task.id);
      if (tracked > 0) {
        seconds.set(task.id, tracked);
        byId.set(task.id, task);
      }
    }
    const shares = percentageBreakdown(seconds);
    const rows: TrackedTimeRow[] = [];
    let totalSeconds = 0;
    for (const [taskId, tracked] of seconds) {
      const task = byId.get(taskId);
      if (!task) {
        continue;
      }
      totalSeconds += tracked;
      rows.push({
        task,
        label: this.describeTask(task),
        seconds: tracked,
        percentage: shares.get(taskId) ?? 0,
      });
    }
    rows.sort((a, b) => b.seconds - a.seconds || a.label.localeCompare(b.label));
    return { rows, totalSeconds };
  }

  entries(): TimeEntry[] {
    return sortEntriesByStartDesc(this.source.tracker.listEntries());
  }

  describeTask(task: Task): string {
    const customer = this.source.customers.get(task.customer_id)?.name ?? UNKNOWN_CUSTOMER;
    const department =
      this.source.departments.get(task.department_id)?.name ?? UNKNOWN_DEPARTMENT;
    const description = task.description.trim();
    const base = `${customer}/${department} ${task.date}`;
    return description ? `${base} ${description}` : base;
  }

  exportCsv(range: DateRange = {}): string {
    const rows: string[] = ["Customer,Department,Date,Hours,Description"];
    const customers = this.indexById(this.source.customers.list());
    const departments = this.indexById(this.source.departments.list());

    for (const task of this.listTasks({ range })) {
      rows.push(
        [
          escapeCsv(customers.get(task.customer_id)?.name ?? UNKNOWN_CUSTOMER),
          escapeCsv(departments.get(task.department_id)?.name ?? UNKNOWN_DEPARTMENT),
          task.date,
          String(task.hours),
          escapeCsv(task.description),
        ].join(",")
      );
    }
    return rows.join("\n");
  }

  private buildHoursReport(
    range: DateRange,
    keyFn: (task: Task) => string,
    labelFn: (key: string) => string
  ): HoursReport {
    const groups = groupBy(filterByRange(this.source.tasks.list(), range), keyFn);
    const totals = new Map<string, number>();
    for (const [key, tasks] of groups) {
      const hours = totalHours(tasks);
      if (hours > 0) {
        totals.set(key, hours);
      }
    }
    const shares = percentageBreakdown(totals);

    const rows: HoursReportRow[] = [];
    for (const [key, hours] of totals) {
      rows.push({
        key,
        label: labelFn(key),
        totalHours: hours,
        taskCount: groups.get(key)?.length ?? 0,
        percentage: shares.get(key) ?? 0,
      });
    }
    rows.sort((a, b) => b.totalHours - a.totalHours || a.label.localeCompare(b.label));

    let total = 0;
    for (const row of rows) {
      total += row.totalHours;
    }
    return { rows, totalHours: total, range };
  }

  private indexById<T extends Customer | Department>(records: T[]): Map<string, T> {
    return new Map(records.map((record) => [record.id, record]));
  }
}

export function escapeCsv(value: string): string {
  if (/[",\n\r]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}
