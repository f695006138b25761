import { TimestampedStore } from "./storage";
import { departmentRecordSchema } from "./schemas";
import type { Department, DepartmentPatch, NewDepartment } from "./types";

export class DepartmentStore extends TimestampedStore<Department, DepartmentPatch> {
  protected readonly entityName = "department";
  protected readonly schema = departmentRecordSchema;

  async create(fields: NewDepartment): Promise<Department> {
    return this.insert((id, now) => ({
      id,
      name: fields.name,
      customer_id: fields.customer_id,
      description: fields.description ?? "",
      created_at: now,
      updated_at: now,
    }));
  }

  listByCustomer(customerId: string): Department[] {
    return this.list().filter((department) => department.customer_id === customerId);
  }

  findByName(customerId: string, name: string): Department | undefined {
    const wanted = name.trim().toLowerCase();
    return this.listByCustomer(customerId).find(
      (department) => department.name.trim().toLowerCase() === wanted
    );
  }

  protected applyPatch(record: Department, patch: DepartmentPatch): Department {
    if (patch.name !== undefined) {
      record.name = patch.name;
    }
    if (patch.customer_id !== undefined) {
      record.customer_id = patch.customer_id;
    }
    if (patch.description !== undefined) {
      record.description = patch.description;
    }
    return record;
  }
}
