// ============================================================================
// Node Store
// ============================================================================

export interface Organization {
  id: string;
  name: string;
}

export interface Employee {
  id: string;
  organizationId: string;
  name: string;
  title: string;
  /** null marks a root (the CEO of its organization) */
  managerId: string | null;
}

export interface CreateOrganizationRecord {
  name: string;
}

export interface CreateEmployeeRecord {
  organizationId: string;
  name: string;
  title: string;
  managerId: string | null;
}

/** organizationId is deliberately absent: employees never change organization. */
export interface UpdateEmployeeRecord {
  name?: string;
  title?: string;
  managerId?: string | null;
}

export interface Page {
  skip: number;
  limit: number;
}

/**
 * Reads and writes available inside one unit of work. Every listing is
 * ordered by id so callers get a stable sequence.
 */
export interface NodeStoreTx {
  getOrganization(id: string): Promise<Organization | null>;
  listOrganizations(page: Page): Promise<Organization[]>;
  insertOrganization(record: CreateOrganizationRecord): Promise<Organization>;
  /** Removes the organization and all of its employees. */
  deleteOrganization(id: string): Promise<boolean>;

  getEmployee(id: string): Promise<Employee | null>;
  listEmployeesByOrg(organizationId: string, page?: Page): Promise<Employee[]>;
  listEmployeesByManager(managerId: string): Promise<Employee[]>;
  insertEmployee(record: CreateEmployeeRecord): Promise<Employee>;
  updateEmployee(id: string, fields: UpdateEmployeeRecord): Promise<Employee | null>;
  deleteEmployee(id: string): Promise<boolean>;
}

export interface NodeStore {
  /**
   * Runs `work` atomically. If it throws, nothing it wrote is kept and the
   * error propagates to the caller.
   */
  transaction<T>(work: (tx: NodeStoreTx) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
