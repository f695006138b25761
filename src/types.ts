export interface Customer {
  id: string;
  name: string;
  email: string;
  phone: string;
  address: string;
  created_at: string; // ISO string
  updated_at: string; // ISO string
}

export interface Department {
  id: string;
  name: string;
  customer_id: string;
  description: string;
  created_at: string;
  updated_at: string;
}

export interface Task {
  id: string;
  customer_id: string;
  department_id: string;
  date: string; // YYYY-MM-DD
  hours: number;
  description: string;
  created_at: string;
  updated_at: string;
}

export interface TimeEntry {
  id: string;
  task_id: string;
  start_time: string; // ISO string
  end_time: string | null;
  description: string;
  duration_seconds: number;
}

// Patches list the fields each entity lets callers change.
export interface CustomerPatch {
  name?: string;
  email?: string;
  phone?: string;
  address?: string;
}

export interface DepartmentPatch {
  name?: string;
  customer_id?: string;
  description?: string;
}

export interface TaskPatch {
  customer_id?: string;
  department_id?: string;
  date?: string;
  hours?: number;
  description?: string;
}

export interface TimeEntryPatch {
  description?: string;
  start_time?: string;
  end_time?: string;
}

export type NewCustomer = Pick<Customer, "name"> &
  Partial<Pick<Customer, "email" | "phone" | "address">>;

export type NewDepartment = Pick<Department, "name" | "customer_id"> &
  Partial<Pick<Department, "description">>;

export type NewTask = Omit<Task, "id" | "created_at" | "updated_at">;

export interface StoreFile<TRecord> {
  [id: string]: TRecord;
}

export interface DateRange {
  from?: string; // YYYY-MM-DD, inclusive
  to?: string; // YYYY-MM-DD, inclusive
}
