import { NotFoundError } from "./errors";
import { type Logger, silentLogger } from "./logger";
import type { TaskStore } from "./taskStore";
import type { TimeEntryStore } from "./timeEntryStore";
import { secondsBetween } from "./timeUtils";
import type { TimeEntry, TimeEntryPatch } from "./types";

export interface TrackerOptions {
  entries: TimeEntryStore;
  tasks: TaskStore;
  logger?: Logger;
  clock?: () => Date;
}

/**
 * Timed work sessions against tasks. At most one entry is open at a time;
 * starting a new one closes the running entry first.
 */
export class Tracker {
  private readonly entries: TimeEntryStore;
  private readonly tasks: TaskStore;
  private readonly logger: Logger;
  private readonly clock: () => Date;
  private activeEntry: TimeEntry | null = null;
  private initialized = false;

  constructor(options: TrackerOptions) {
    this.entries = options.entries;
    this.tasks = options.tasks;
    this.logger = options.logger ?? silentLogger;
    this.clock = options.clock ?? (() => new Date());
  }

  /** Picks up the open entry left behind by an earlier run. */
  init(): void {
    if (this.initialized) {
      return;
    }
    this.restoreActiveEntry();
    this.initialized = true;
  }

  getActive(): TimeEntry | undefined {
    return this.activeEntry ? { ...this.activeEntry } : undefined;
  }

  isRunning(): boolean {
    return this.activeEntry !== null;
  }

  async start(
    taskId: string,
    description = "",
    options?: { startTime?: Date }
  ): Promise<TimeEntry> {
    const task = this.tasks.get(taskId);
    if (!task) {
      throw new NotFoundError("Task", taskId);
    }
    const startTime = options?.startTime ?? this.clock();

    // If there's an active session, stop it at the moment the new one begins
    if (this.activeEntry) {
      await this.stop(startTime);
    }

    const entry = await this.entries.open(task.id, description, startTime);
    this.activeEntry = entry;
    this.logger.info(`started timer for task ${task.id}`);
    return { ...entry };
  }

  async stop(at?: Date): Promise<TimeEntry | undefined> {
    const session = this.activeEntry;
    if (!session) {
      return undefined;
    }
    this.activeEntry = null;

    const completed = await this.entries.close(session.id, at ?? this.clock());
    if (!completed) {
      this.logger.warn(`running entry ${session.id} disappeared from the store`);
      return undefined;
    }
    this.logger.info(
      `stopped timer for task ${completed.task_id} after ${completed.duration_seconds}s`
    );
    return completed;
  }

  /** Seconds tracked for the task, including the running entry up to now. */
  elapsed(taskId: string): number {
    let total = 0;
    for (const entry of this.entries.listByTask(taskId)) {
      total += entry.duration_seconds;
    }
    if (this.activeEntry && this.activeEntry.task_id === taskId) {
      total += secondsBetween(this.activeEntry.start_time, this.clock());
    }
    return total;
  }

  /** Seconds the running entry has been open, or 0 when idle. */
  runningSeconds(): number {
    if (!this.activeEntry) {
      return 0;
    }
    return secondsBetween(this.activeEntry.start_time, this.clock());
  }

  entriesFor(taskId: string): TimeEntry[] {
    return this.entries.listByTask(taskId);
  }

  listEntries(): TimeEntry[] {
    return this.entries.list();
  }

  getEntry(id: string): TimeEntry | undefined {
    return this.entries.get(id);
  }

  async updateEntry(id: string, patch: TimeEntryPatch): Promise<TimeEntry | undefined> {
    const updated = await this.entries.update(id, patch);
    if (!updated) {
      return undefined;
    }
    if (this.activeEntry?.id === id) {
      this.activeEntry = updated.end_time === null ? updated : null;
    }
    return updated;
  }

  async deleteEntry(id: string): Promise<boolean> {
    if (this.activeEntry?.id === id) {
      this.activeEntry = null;
    }
    return this.entries.delete(id);
  }

  async deleteEntriesForTask(taskId: string): Promise<number> {
    if (this.activeEntry?.task_id === taskId) {
      this.activeEntry = null;
    }
    return this.entries.deleteWhere((entry) => entry.task_id === taskId);
  }

  private restoreActiveEntry(): void {
    const open = this.entries.listOpen();
    if (open.length === 0) {
      this.activeEntry = null;
      return;
    }

    // If we detect multiple open entries, prefer the most recent start.
    let active = open[0];
    for (const candidate of open.slice(1)) {
      if (Date.parse(candidate.start_time) > Date.parse(active.start_time)) {
        active = candidate;
      }
    }
    if (open.length > 1) {
      this.logger.warn(
        `${open.length} open time entries detected. Using most recent: ${active.id} (task ${active.task_id})`
      );
    }
    this.activeEntry = active;
  }
}
