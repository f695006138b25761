import { describe, expect, it } from "vitest";
import type { ZodError } from "zod";
import {
  customerInputSchema,
  customerPatchInputSchema,
  describeIssues,
  rangeInputSchema,
  taskInputSchema,
  taskPatchInputSchema,
  timeEntryRecordSchema,
} from "../schemas";
import { formatClock, formatHours, formatSeconds, isValidDay, secondsBetween } from "../timeUtils";

function issuesOf(result: { error?: ZodError }): string[] {
  return result.error ? describeIssues(result.error) : [];
}

describe("input schemas", () => {
  it("trims customer input and defaults optional fields", () => {
    expect(customerInputSchema.parse({ name: "  Acme  ", email: "" })).toEqual({
      name: "Acme",
      email: "",
      phone: "",
      address: "",
    });
  });

  it("requires a customer name and a valid email", () => {
    const result = customerInputSchema.safeParse({ name: "   ", email: "nope" });

    expect(issuesOf(result)).toEqual(["name: Customer name is required", "email: Invalid email"]);
  });

  it("treats blank patch fields as unchanged", () => {
    expect(customerPatchInputSchema.parse({ name: "", email: " ", phone: "555-0100" })).toEqual({
      name: undefined,
      email: undefined,
      phone: "555-0100",
      address: undefined,
    });
  });

  it("coerces hours and validates task dates", () => {
    expect(
      taskInputSchema.parse({
        customerId: "Acme",
        departmentId: "Eng",
        date: "2024-02-29",
        hours: "2.5",
      })
    ).toEqual({
      customerId: "Acme",
      departmentId: "Eng",
      date: "2024-02-29",
      hours: 2.5,
      description: "",
    });

    const result = taskInputSchema.safeParse({
      customerId: "Acme",
      departmentId: "Eng",
      date: "2023-02-29",
      hours: "0",
    });
    expect(issuesOf(result)).toEqual([
      "date: Use YYYY-MM-DD format",
      "hours: Hours must be greater than 0",
    ]);
  });

  it("rejects hours that are not numbers", () => {
    const result = taskPatchInputSchema.safeParse({ hours: "lots" });

    expect(issuesOf(result)).toEqual(["hours: Hours must be a number"]);
  });

  it("requires the range start to come before its end", () => {
    expect(rangeInputSchema.parse({ from: "2024-01-01", to: "" })).toEqual({
      from: "2024-01-01",
      to: undefined,
    });
    expect(issuesOf(rangeInputSchema.safeParse({ from: "2024-02-01", to: "2024-01-01" }))).toEqual([
      "Start date must be on or before the end date",
    ]);
  });
});

describe("timeEntryRecordSchema", () => {
  it("defaults fields older entries did not store", () => {
    expect(
      timeEntryRecordSchema.parse({
        id: "e1",
        task_id: "t1",
        start_time: "2024-01-01T09:00:00.000Z",
      })
    ).toEqual({
      id: "e1",
      task_id: "t1",
      start_time: "2024-01-01T09:00:00.000Z",
      end_time: null,
      description: "",
      duration_seconds: 0,
    });
  });
});

describe("time formatting", () => {
  it("formats durations and hours", () => {
    expect(formatSeconds(90)).toBe("0h 1m 30s");
    expect(formatSeconds(3 * 3600 + 5)).toBe("3h 0m 5s");
    expect(formatClock(3725)).toBe("01:02:05");
    expect(formatHours(2.5)).toBe("2.50h");
  });

  it("never reports negative spans", () => {
    expect(secondsBetween("2024-01-01T10:00:00Z", "2024-01-01T09:00:00Z")).toBe(0);
    expect(secondsBetween("2024-01-01T09:00:00Z", new Date("2024-01-01T09:00:59.999Z"))).toBe(59);
  });

  it("checks calendar days", () => {
    expect(isValidDay("2024-02-29")).toBe(true);
    expect(isValidDay("2024-13-01")).toBe(false);
    expect(isValidDay("2024-1-01")).toBe(false);
  });
});
