import { ValidationError } from "./errors";
import { TimestampedStore } from "./storage";
import { taskRecordSchema } from "./schemas";
import type { NewTask, Task, TaskPatch } from "./types";

export class TaskStore extends TimestampedStore<Task, TaskPatch> {
  protected readonly entityName = "task";
  protected readonly schema = taskRecordSchema;

  async create(fields: NewTask): Promise<Task> {
    return this.insert((id, now) => ({
      id,
      customer_id: fields.customer_id,
      department_id: fields.department_id,
      date: fields.date,
      hours: fields.hours,
      description: fields.description,
      created_at: now,
      updated_at: now,
    }));
  }

  listByCustomer(customerId: string): Task[] {
    return this.list().filter((task) => task.customer_id === customerId);
  }

  listByDepartment(departmentId: string): Task[] {
    return this.list().filter((task) => task.department_id === departmentId);
  }

  protected validate(record: Task): void {
    if (!Number.isFinite(record.hours) || record.hours < 0) {
      throw new ValidationError(`Hours must be a non-negative number, got ${record.hours}`);
    }
  }

  protected applyPatch(record: Task, patch: TaskPatch): Task {
    if (patch.customer_id !== undefined) {
      record.customer_id = patch.customer_id;
    }
    if (patch.department_id !== undefined) {
      record.department_id = patch.department_id;
    }
    if (patch.date !== undefined) {
      record.date = patch.date;
    }
    if (patch.hours !== undefined) {
      record.hours = patch.hours;
    }
    if (patch.description !== undefined) {
      record.description = patch.description;
    }
    return record;
  }
}
