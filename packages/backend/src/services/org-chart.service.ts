import type { FastifyBaseLogger } from 'fastify';
import {
  directReportsOf,
  managerChainOf,
  reparentDirectReports,
  validateManagerAssignment,
  type HierarchyResult,
} from '../engine/hierarchy/index.js';
import { HierarchyError, NotFoundError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type {
  CreateEmployeeInput,
  CreateOrganizationInput,
  UpdateEmployeeInput,
} from '../schemas/org-chart.schema.js';
import type {
  Employee,
  NodeStore,
  NodeStoreTx,
  Organization,
  Page,
} from '../store/node-store.js';

// ============================================================================
// Types
// ============================================================================

export interface OrganizationWithEmployees extends Organization {
  employees: Employee[];
}

export const CEO_TITLE = 'CEO';

// ============================================================================
// Lookups shared by every operation
// ============================================================================

async function requireOrganization(tx: NodeStoreTx, organizationId: string): Promise<Organization> {
  const org = await tx.getOrganization(organizationId);
  if (!org) throw new NotFoundError('Organization', organizationId);
  return org;
}

/** An employee of another organization is reported as missing from this one. */
async function requireEmployeeInOrg(
  tx: NodeStoreTx,
  organizationId: string,
  employeeId: string,
): Promise<Employee> {
  const employee = await tx.getEmployee(employeeId);
  if (!employee || employee.organizationId !== organizationId) {
    throw new NotFoundError('Employee', employeeId, `organization '${organizationId}'`);
  }
  return employee;
}

// ============================================================================
// Service
// ============================================================================

/**
 * Org chart operations. Every mutation is exactly one store transaction in
 * which the hierarchy engine's checks run before the write; a rejected check
 * throws HierarchyError, which rolls the transaction back.
 */
export class OrgChartService {
  constructor(
    private store: NodeStore,
    private log: FastifyBaseLogger = logger,
  ) {}

  private enforce(result: HierarchyResult, action: string): void {
    if (result.ok) return;
    this.log.warn(
      { kind: result.violation.kind, ...result.violation.context },
      `Rejected ${action}: ${result.violation.message}`,
    );
    throw new HierarchyError(result.violation);
  }

  // --------------------------------------------------------------------------
  // Organizations
  // --------------------------------------------------------------------------

  async createOrganization(input: CreateOrganizationInput): Promise<OrganizationWithEmployees> {
    const org = await this.store.transaction((tx) => tx.insertOrganization({ name: input.name }));
    this.log.info({ organizationId: org.id }, 'Organization created');
    return { ...org, employees: [] };
  }

  async listOrganizations(page: Page): Promise<OrganizationWithEmployees[]> {
    return this.store.transaction(async (tx) => {
      const orgs = await tx.listOrganizations(page);
      const result: OrganizationWithEmployees[] = [];
      for (const org of orgs) {
        result.push({ ...org, employees: await tx.listEmployeesByOrg(org.id) });
      }
      return result;
    });
  }

  async getOrganization(organizationId: string): Promise<OrganizationWithEmployees> {
    return this.store.transaction(async (tx) => {
      const org = await requireOrganization(tx, organizationId);
      return { ...org, employees: await tx.listEmployeesByOrg(org.id) };
    });
  }

  /** Deletes the organization together with all of its employees. */
  async deleteOrganization(organizationId: string): Promise<void> {
    await this.store.transaction(async (tx) => {
      await requireOrganization(tx, organizationId);
      await tx.deleteOrganization(organizationId);
    });
    this.log.info({ organizationId }, 'Organization deleted');
  }

  // --------------------------------------------------------------------------
  // Employees
  // --------------------------------------------------------------------------

  async createEmployee(organizationId: string, input: CreateEmployeeInput): Promise<Employee> {
    const managerId = input.managerId ?? null;

    const employee = await this.store.transaction(async (tx) => {
      await requireOrganization(tx, organizationId);
      // employeeId is null: a node that does not exist yet cannot close a cycle.
      this.enforce(
        await validateManagerAssignment(tx, organizationId, null, managerId),
        'manager assignment',
      );
      return tx.insertEmployee({
        organizationId,
        name: input.name,
        title: input.title,
        managerId,
      });
    });

    this.log.info({ organizationId, employeeId: employee.id, managerId }, 'Employee created');
    return employee;
  }

  async listEmployees(organizationId: string, page: Page): Promise<Employee[]> {
    return this.store.transaction(async (tx) => {
      await requireOrganization(tx, organizationId);
      return tx.listEmployeesByOrg(organizationId, page);
    });
  }

  async getEmployee(organizationId: string, employeeId: string): Promise<Employee> {
    return this.store.transaction(async (tx) => {
      await requireOrganization(tx, organizationId);
      return requireEmployeeInOrg(tx, organizationId, employeeId);
    });
  }

  async updateEmployee(
    organizationId: string,
    employeeId: string,
    input: UpdateEmployeeInput,
  ): Promise<Employee> {
    const updated = await this.store.transaction(async (tx) => {
      await requireOrganization(tx, organizationId);
      const current = await requireEmployeeInOrg(tx, organizationId, employeeId);

      if (input.managerId !== undefined) {
        this.enforce(
          await validateManagerAssignment(tx, organizationId, employeeId, input.managerId),
          'manager assignment',
        );
      }

      const result = await tx.updateEmployee(employeeId, {
        name: input.name,
        title: input.title,
        managerId: input.managerId,
      });
      return result ?? current;
    });

    this.log.info({ organizationId, employeeId, managerId: updated.managerId }, 'Employee updated');
    return updated;
  }

  /**
   * Removes an employee after handing its direct reports to its own manager.
   * Either both happen or neither does.
   */
  async deleteEmployee(organizationId: string, employeeId: string): Promise<void> {
    const reparented = await this.store.transaction(async (tx) => {
      await requireOrganization(tx, organizationId);
      const employee = await requireEmployeeInOrg(tx, organizationId, employeeId);
      const reports = await tx.listEmployeesByManager(employeeId);

      this.enforce(await reparentDirectReports(tx, employee), 'deletion');
      await tx.deleteEmployee(employeeId);
      return reports.length;
    });

    this.log.info({ organizationId, employeeId, reparented }, 'Employee deleted');
  }

  /**
   * Makes the employee a root with title CEO. Already-root employees are
   * returned unchanged. Clearing a manager can never create a cycle.
   */
  async promoteToCeo(organizationId: string, employeeId: string): Promise<Employee> {
    const { employee, changed } = await this.store.transaction(async (tx) => {
      await requireOrganization(tx, organizationId);
      const current = await requireEmployeeInOrg(tx, organizationId, employeeId);
      if (current.managerId === null) return { employee: current, changed: false };

      const promoted = await tx.updateEmployee(employeeId, { managerId: null, title: CEO_TITLE });
      return { employee: promoted ?? current, changed: true };
    });

    if (changed) this.log.info({ organizationId, employeeId }, 'Employee promoted to CEO');
    return employee;
  }

  // --------------------------------------------------------------------------
  // Hierarchy queries
  // --------------------------------------------------------------------------

  async getDirectReports(organizationId: string, employeeId: string): Promise<Employee[]> {
    return this.store.transaction(async (tx) => {
      await requireOrganization(tx, organizationId);
      await requireEmployeeInOrg(tx, organizationId, employeeId);
      return directReportsOf(tx, organizationId, employeeId);
    });
  }

  async getManagerChain(organizationId: string, employeeId: string): Promise<Employee[]> {
    return this.store.transaction(async (tx) => {
      await requireOrganization(tx, organizationId);
      await requireEmployeeInOrg(tx, organizationId, employeeId);
      return managerChainOf(tx, employeeId);
    });
  }
}
