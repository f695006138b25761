import { TimestampedStore } from "./storage";
import { customerRecordSchema } from "./schemas";
import type { Customer, CustomerPatch, NewCustomer } from "./types";

export class CustomerStore extends TimestampedStore<Customer, CustomerPatch> {
  protected readonly entityName = "customer";
  protected readonly schema = customerRecordSchema;

  async create(fields: NewCustomer): Promise<Customer> {
    return this.insert((id, now) => ({
      id,
      name: fields.name,
      email: fields.email ?? "",
      phone: fields.phone ?? "",
      address: fields.address ?? "",
      created_at: now,
      updated_at: now,
    }));
  }

  /** First customer with this name, ignoring case and surrounding spaces. */
  findByName(name: string): Customer | undefined {
    return this.listByName(name)[0];
  }

  listByName(name: string): Customer[] {
    const wanted = name.trim().toLowerCase();
    return this.list().filter((customer) => customer.name.trim().toLowerCase() === wanted);
  }

  protected applyPatch(record: Customer, patch: CustomerPatch): Customer {
    if (patch.name !== undefined) {
      record.name = patch.name;
    }
    if (patch.email !== undefined) {
      record.email = patch.email;
    }
    if (patch.phone !== undefined) {
      record.phone = patch.phone;
    }
    if (patch.address !== undefined) {
      record.address = patch.address;
    }
    return record;
  }
}
