import { ReferentialIntegrityError } from "./errors";
import type { CustomerStore } from "./customerStore";
import type { DepartmentStore } from "./departmentStore";
import type { TaskStore } from "./taskStore";
import type { Tracker } from "./tracker";
import type {
  Customer,
  CustomerPatch,
  Department,
  DepartmentPatch,
  NewCustomer,
  NewDepartment,
  NewTask,
  Task,
  TaskPatch,
} from "./types";

export interface LedgerStores {
  customers: CustomerStore;
  departments: DepartmentStore;
  tasks: TaskStore;
  tracker: Tracker;
}

/**
 * Customer → department → task bookkeeping with foreign keys checked on
 * every write. Customers and departments with dependents cannot be deleted;
 * deleting a task also deletes its time entries.
 */
export class WorkLedger {
  private readonly customers: CustomerStore;
  private readonly departments: DepartmentStore;
  private readonly tasks: TaskStore;
  private readonly tracker: Tracker;

  constructor(stores: LedgerStores) {
    this.customers = stores.customers;
    this.departments = stores.departments;
    this.tasks = stores.tasks;
    this.tracker = stores.tracker;
  }

  // #region Customers

  async createCustomer(fields: NewCustomer): Promise<Customer> {
    return this.customers.create(fields);
  }

  async updateCustomer(id: string, patch: CustomerPatch): Promise<Customer | undefined> {
    return this.customers.update(id, patch);
  }

  async deleteCustomer(id: string): Promise<boolean> {
    if (!this.customers.has(id)) {
      return false;
    }
    const departments = this.departments.listByCustomer(id).length;
    const tasks = this.tasks.listByCustomer(id).length;
    if (departments > 0 || tasks > 0) {
      throw new ReferentialIntegrityError(
        `Customer ${id} still has ${departments} department(s) and ${tasks} task(s)`
      );
    }
    return this.customers.delete(id);
  }

  findCustomerByName(name: string): Customer | undefined {
    return this.customers.findByName(name);
  }

  findCustomersByName(name: string): Customer[] {
    return this.customers.listByName(name);
  }

  // #endregion

  // #region Departments

  async createDepartment(fields: NewDepartment): Promise<Department> {
    this.requireCustomer(fields.customer_id);
    return this.departments.create(fields);
  }

  async updateDepartment(
    id: string,
    patch: DepartmentPatch
  ): Promise<Department | undefined> {
    const existing = this.departments.get(id);
    if (!existing) {
      return undefined;
    }
    if (patch.customer_id !== undefined && patch.customer_id !== existing.customer_id) {
      this.requireCustomer(patch.customer_id);
      const tasks = this.tasks.listByDepartment(id).length;
      if (tasks > 0) {
        throw new ReferentialIntegrityError(
          `Department ${id} has ${tasks} task(s) booked under its current customer`
        );
      }
    }
    return this.departments.update(id, patch);
  }

  async deleteDepartment(id: string): Promise<boolean> {
    if (!this.departments.has(id)) {
      return false;
    }
    const tasks = this.tasks.listByDepartment(id).length;
    if (tasks > 0) {
      throw new ReferentialIntegrityError(`Department ${id} still has ${tasks} task(s)`);
    }
    return this.departments.delete(id);
  }

  findDepartmentByName(customerId: string, name: string): Department | undefined {
    return this.departments.findByName(customerId, name);
  }

  // #endregion

  // #region Tasks

  async createTask(fields: NewTask): Promise<Task> {
    this.requirePair(fields.customer_id, fields.department_id);
    return this.tasks.create(fields);
  }

  async updateTask(id: string, patch: TaskPatch): Promise<Task | undefined> {
    const existing = this.tasks.get(id);
    if (!existing) {
      return undefined;
    }
    if (patch.customer_id !== undefined || patch.department_id !== undefined) {
      this.requirePair(
        patch.customer_id ?? existing.customer_id,
        patch.department_id ?? existing.department_id
      );
    }
    return this.tasks.update(id, patch);
  }

  async deleteTask(id: string): Promise<boolean> {
    if (!this.tasks.has(id)) {
      return false;
    }
    await this.tracker.deleteEntriesForTask(id);
    return this.tasks.delete(id);
  }

  // #endregion

  private requireCustomer(customerId: string): Customer {
    const customer = this.customers.get(customerId);
    if (!customer) {
      throw new ReferentialIntegrityError(`Unknown customer: ${customerId}`);
    }
    return customer;
  }

  private requirePair(customerId: string, departmentId: string): void {
    this.requireCustomer(customerId);
    const department = this.departments.get(departmentId);
    if (!department) {
      throw new ReferentialIntegrityError(`Unknown department: ${departmentId}`);
    }
    if (department.customer_id !== customerId) {
      throw new ReferentialIntegrityError(
        `Department ${department.name} does not belong to customer ${customerId}`
      );
    }
  }
}
