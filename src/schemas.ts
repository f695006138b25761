import { z } from "zod";
import type { Customer, Department, Task, TimeEntry } from "./types";
import { isValidDay, isValidTimestamp } from "./timeUtils";

// #region Persisted records

const timestampSchema = z
  .string()
  .refine(isValidTimestamp, "Must be an ISO timestamp");

export const customerRecordSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    email: z.string().default(""),
    phone: z.string().default(""),
    address: z.string().default(""),
    created_at: z.string(),
    updated_at: z.string().nullish(),
  })
  .transform(
    (record): Customer => ({
      ...record,
      updated_at: record.updated_at ?? record.created_at,
    })
  );

export const departmentRecordSchema = z
  .object({
    id: z.string().min(1),
    name: z.string(),
    customer_id: z.string().min(1),
    description: z.string().default(""),
    created_at: z.string(),
    updated_at: z.string().nullish(),
  })
  .transform(
    (record): Department => ({
      ...record,
      updated_at: record.updated_at ?? record.created_at,
    })
  );

export const taskRecordSchema = z
  .object({
    id: z.string().min(1),
    customer_id: z.string().min(1),
    department_id: z.string().min(1),
    date: z.string(),
    hours: z.number().nonnegative(),
    description: z.string().default(""),
    created_at: z.string(),
    updated_at: z.string().nullish(),
  })
  .transform(
    (record): Task => ({
      ...record,
      updated_at: record.updated_at ?? record.created_at,
    })
  );

export const timeEntryRecordSchema = z.object({
  id: z.string().min(1),
  task_id: z.string().min(1),
  start_time: timestampSchema,
  end_time: timestampSchema.nullable().default(null),
  description: z.string().default(""),
  duration_seconds: z.number().int().nonnegative().default(0),
}) satisfies z.ZodType<TimeEntry, z.ZodTypeDef, unknown>;

// #endregion

// #region Command input

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const requiredText = (label: string) =>
  z
    .string({ required_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`)
    .max(255, `${label} must be less than 255 characters`);

const optionalText = z.string().trim().optional().default("");

const daySchema = z
  .string()
  .trim()
  .refine(isValidDay, "Use YYYY-MM-DD format");

const hoursSchema = z.coerce
  .number({ invalid_type_error: "Hours must be a number" })
  .finite("Hours must be a number")
  .positive("Hours must be greater than 0");

export const customerInputSchema = z.object({
  name: requiredText("Customer name"),
  email: z
    .preprocess(blankToUndefined, z.string().trim().email("Invalid email").optional())
    .transform((value) => value ?? ""),
  phone: optionalText,
  address: optionalText,
});

export const customerPatchInputSchema = z.object({
  name: z.preprocess(blankToUndefined, requiredText("Customer name").optional()),
  email: z.preprocess(blankToUndefined, z.string().trim().email("Invalid email").optional()),
  phone: z.preprocess(blankToUndefined, z.string().trim().optional()),
  address: z.preprocess(blankToUndefined, z.string().trim().optional()),
});

export const departmentInputSchema = z.object({
  name: requiredText("Department name"),
  customerId: requiredText("Customer"),
  description: optionalText,
});

export const departmentPatchInputSchema = z.object({
  name: z.preprocess(blankToUndefined, requiredText("Department name").optional()),
  customerId: z.preprocess(blankToUndefined, z.string().trim().optional()),
  description: z.preprocess(blankToUndefined, z.string().trim().optional()),
});

export const taskInputSchema = z.object({
  customerId: requiredText("Customer"),
  departmentId: requiredText("Department"),
  date: daySchema,
  hours: hoursSchema,
  description: optionalText,
});

export const taskPatchInputSchema = z.object({
  customerId: z.preprocess(blankToUndefined, z.string().trim().optional()),
  departmentId: z.preprocess(blankToUndefined, z.string().trim().optional()),
  date: z.preprocess(blankToUndefined, daySchema.optional()),
  hours: z.preprocess(blankToUndefined, hoursSchema.optional()),
  description: z.preprocess(blankToUndefined, z.string().trim().optional()),
});

export const timeEntryPatchInputSchema = z.object({
  description: z.preprocess(blankToUndefined, z.string().trim().optional()),
  start: z.preprocess(blankToUndefined, timestampSchema.optional()),
  end: z.preprocess(blankToUndefined, timestampSchema.optional()),
});

export const rangeInputSchema = z
  .object({
    from: z.preprocess(blankToUndefined, daySchema.optional()),
    to: z.preprocess(blankToUndefined, daySchema.optional()),
  })
  .refine(
    (range) => !range.from || !range.to || range.from <= range.to,
    "Start date must be on or before the end date"
  );

// #endregion

export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
  );
}
