import * as path from "path";
import { z } from "zod";
import { ValidationError } from "./errors";
import type { LogLevel } from "./logger";
import { describeIssues } from "./schemas";

export const DATA_DIR_NAME = "data";
export const CUSTOMERS_FILE_NAME = "customers.json";
export const DEPARTMENTS_FILE_NAME = "departments.json";
export const TASKS_FILE_NAME = "tasks.json";
export const TIME_ENTRIES_FILE_NAME = "time_entries.json";

export interface HourbookConfig {
  dataDir: string;
  strictLoad: boolean;
  logLevel: LogLevel;
}

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const envSchema = z.object({
  HOURBOOK_DATA_DIR: z.string().trim().min(1).optional(),
  HOURBOOK_STRICT_LOAD: booleanFlag.optional(),
  HOURBOOK_LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).optional(),
});

export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<HourbookConfig> = {}
): HourbookConfig {
  const parsed = envSchema.safeParse({
    HOURBOOK_DATA_DIR: env.HOURBOOK_DATA_DIR || undefined,
    HOURBOOK_STRICT_LOAD: env.HOURBOOK_STRICT_LOAD?.toLowerCase() || undefined,
    HOURBOOK_LOG_LEVEL: env.HOURBOOK_LOG_LEVEL?.toLowerCase() || undefined,
  });
  if (!parsed.success) {
    throw new ValidationError("Invalid configuration", describeIssues(parsed.error));
  }
  const settings = parsed.data;
  return {
    dataDir: path.resolve(overrides.dataDir ?? settings.HOURBOOK_DATA_DIR ?? DATA_DIR_NAME),
    strictLoad: overrides.strictLoad ?? settings.HOURBOOK_STRICT_LOAD ?? false,
    logLevel: overrides.logLevel ?? settings.HOURBOOK_LOG_LEVEL ?? "info",
  };
}

export function storePaths(dataDir: string): {
  customers: string;
  departments: string;
  tasks: string;
  timeEntries: string;
} {
  return {
    customers: path.join(dataDir, CUSTOMERS_FILE_NAME),
    departments: path.join(dataDir, DEPARTMENTS_FILE_NAME),
    tasks: path.join(dataDir, TASKS_FILE_NAME),
    timeEntries: path.join(dataDir, TIME_ENTRIES_FILE_NAME),
  };
}
