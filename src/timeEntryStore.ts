import { ValidationError } from "./errors";
import { RecordStore } from "./storage";
import { timeEntryRecordSchema } from "./schemas";
import { isValidTimestamp, secondsBetween } from "./timeUtils";
import type { TimeEntry, TimeEntryPatch } from "./types";

export class TimeEntryStore extends RecordStore<TimeEntry, TimeEntryPatch> {
  protected readonly entityName = "time entry";
  protected readonly schema = timeEntryRecordSchema;

  async open(taskId: string, description: string, start: Date): Promise<TimeEntry> {
    return this.insert((id) => ({
      id,
      task_id: taskId,
      start_time: start.toISOString(),
      end_time: null,
      description,
      duration_seconds: 0,
    }));
  }

  async close(id: string, end: Date): Promise<TimeEntry | undefined> {
    const entry = this.get(id);
    if (!entry) {
      return undefined;
    }
    const startMs = Date.parse(entry.start_time);
    const effectiveEnd = end.getTime() < startMs ? new Date(startMs) : end;
    return this.replace({
      ...entry,
      end_time: effectiveEnd.toISOString(),
      duration_seconds: secondsBetween(entry.start_time, effectiveEnd),
    });
  }

  listByTask(taskId: string): TimeEntry[] {
    return this.list().filter((entry) => entry.task_id === taskId);
  }

  listOpen(): TimeEntry[] {
    return this.list().filter((entry) => entry.end_time === null);
  }

  protected validate(record: TimeEntry): void {
    if (!isValidTimestamp(record.start_time)) {
      throw new ValidationError(`Invalid start time: ${record.start_time}`);
    }
    if (record.end_time !== null && !isValidTimestamp(record.end_time)) {
      throw new ValidationError(`Invalid end time: ${record.end_time}`);
    }
    if (record.end_time !== null && Date.parse(record.end_time) < Date.parse(record.start_time)) {
      throw new ValidationError("End time cannot be before start time");
    }
  }

  protected applyPatch(record: TimeEntry, patch: TimeEntryPatch): TimeEntry {
    if (patch.description !== undefined) {
      record.description = patch.description;
    }
    if (patch.start_time !== undefined) {
      record.start_time = patch.start_time;
    }
    if (patch.end_time !== undefined) {
      record.end_time = patch.end_time;
    }
    const boundsChanged = patch.start_time !== undefined || patch.end_time !== undefined;
    if (boundsChanged && record.end_time !== null) {
      record.duration_seconds = secondsBetween(record.start_time, record.end_time);
    }
    return record;
  }
}
