export * from "./types";
export * from "./errors";
export { createLogger, silentLogger } from "./logger";
export type { Logger, LogLevel, LogSink } from "./logger";
export { loadConfig, storePaths } from "./config";
export type { HourbookConfig } from "./config";
export { RecordStore, TimestampedStore } from "./storage";
export type { LoadResult, RecordStoreOptions } from "./storage";
export { CustomerStore } from "./customerStore";
export { DepartmentStore } from "./departmentStore";
export { TaskStore } from "./taskStore";
export { TimeEntryStore } from "./timeEntryStore";
export { Tracker } from "./tracker";
export { WorkLedger } from "./ledger";
export {
  ReportProvider,
  escapeCsv,
  filterByRange,
  groupBy,
  percentageBreakdown,
  sortByCreatedDesc,
  sortByDateDesc,
  sortEntriesByStartDesc,
  tasksFor,
  totalHours,
} from "./reportProvider";
export type {
  DashboardSummary,
  HoursReport,
  HoursReportRow,
  TaskRelation,
  TrackedTimeReport,
  TrackedTimeRow,
} from "./reportProvider";
export { AppContext } from "./context";
export type { AppContextOptions, LoadReport } from "./context";
export { migrateLegacyData, verifyReferences } from "./migration";
export type { MigrationOptions, MigrationSummary } from "./migration";
export { runCli } from "./cli";
