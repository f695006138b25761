import { storePaths, type HourbookConfig } from "./config";
import { CustomerStore } from "./customerStore";
import { DepartmentStore } from "./departmentStore";
import { WorkLedger } from "./ledger";
import { type Logger, silentLogger } from "./logger";
import { ReportProvider } from "./reportProvider";
import type { LoadResult } from "./storage";
import { TaskStore } from "./taskStore";
import { TimeEntryStore } from "./timeEntryStore";
import { Tracker } from "./tracker";

export interface AppContextOptions {
  logger?: Logger;
  clock?: () => Date;
  idFactory?: () => string;
}

export type StoreName = "customers" | "departments" | "tasks" | "timeEntries";

export type LoadReport = Record<StoreName, LoadResult>;

/**
 * Everything a command needs, built once per process and passed down
 * explicitly: stores, the ledger, the timer and the report provider.
 */
export class AppContext {
  readonly config: HourbookConfig;
  readonly logger: Logger;
  readonly customers: CustomerStore;
  readonly departments: DepartmentStore;
  readonly tasks: TaskStore;
  readonly timeEntries: TimeEntryStore;
  readonly tracker: Tracker;
  readonly ledger: WorkLedger;
  readonly reports: ReportProvider;
  private initialized = false;
  private disposed = false;

  constructor(config: HourbookConfig, options: AppContextOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? silentLogger;
    const paths = storePaths(config.dataDir);
    const shared = {
      logger: this.logger,
      clock: options.clock,
      idFactory: options.idFactory,
    };

    this.customers = new CustomerStore({ file: paths.customers, ...shared });
    this.departments = new DepartmentStore({ file: paths.departments, ...shared });
    this.tasks = new TaskStore({ file: paths.tasks, ...shared });
    this.timeEntries = new TimeEntryStore({ file: paths.timeEntries, ...shared });
    this.tracker = new Tracker({
      entries: this.timeEntries,
      tasks: this.tasks,
      logger: this.logger,
      clock: options.clock,
    });
    this.ledger = new WorkLedger({
      customers: this.customers,
      departments: this.departments,
      tasks: this.tasks,
      tracker: this.tracker,
    });
    this.reports = new ReportProvider({
      customers: this.customers,
      departments: this.departments,
      tasks: this.tasks,
      tracker: this.tracker,
    });
  }

  static async open(config: HourbookConfig, options?: AppContextOptions): Promise<AppContext> {
    const context = new AppContext(config, options);
    await context.init();
    return context;
  }

  /**
   * Loads every store. With `strictLoad` an unreadable file aborts start-up;
   * otherwise that store starts empty and a warning is logged.
   */
  async init(): Promise<LoadReport> {
    if (this.disposed) {
      throw new Error("AppContext has been disposed");
    }
    const report: LoadReport = {
      customers: await this.customers.load(),
      departments: await this.departments.load(),
      tasks: await this.tasks.load(),
      timeEntries: await this.timeEntries.load(),
    };

    if (this.config.strictLoad) {
      for (const result of Object.values(report)) {
        if (result.status === "corrupt") {
          throw result.error;
        }
      }
    }

    this.tracker.init();
    this.initialized = true;
    this.logger.debug(`data directory ${this.config.dataDir} ready`);
    return report;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /** Stores persist on every write, so a running timer survives disposal. */
  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.initialized = false;
    const active = this.tracker.getActive();
    if (active) {
      this.logger.info(`timer for task ${active.task_id} keeps running`);
    }
  }
}
