import type { Pool, PoolClient } from 'pg';
import { TransientStoreError } from '../lib/errors.js';
import { logger } from '../lib/logger.js';
import type {
  CreateEmployeeRecord,
  CreateOrganizationRecord,
  Employee,
  NodeStore,
  NodeStoreTx,
  Organization,
  Page,
  UpdateEmployeeRecord,
} from './node-store.js';

// ============================================================================
// Row mapping
// ============================================================================

interface OrganizationRow {
  id: string;
  name: string;
}

interface EmployeeRow {
  id: string;
  organization_id: string;
  name: string;
  title: string;
  manager_id: string | null;
}

const EMPLOYEE_COLUMNS = 'id, organization_id, name, title, manager_id';

function toEmployee(row: EmployeeRow): Employee {
  return {
    id: row.id,
    organizationId: row.organization_id,
    name: row.name,
    title: row.title,
    managerId: row.manager_id,
  };
}

/** SQLSTATEs for serialization failure and deadlock: the whole unit may be retried. */
const RETRYABLE_CODES = new Set(['40001', '40P01']);

function isRetryable(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    typeof err.code === 'string' &&
    RETRYABLE_CODES.has(err.code)
  );
}

// ============================================================================
// Transaction-scoped operations
// ============================================================================

class PgNodeStoreTx implements NodeStoreTx {
  constructor(private client: PoolClient) {}

  async getOrganization(id: string): Promise<Organization | null> {
    const { rows } = await this.client.query<OrganizationRow>(
      'SELECT id, name FROM organizations WHERE id = $1',
      [id],
    );
    return rows[0] ?? null;
  }

  async listOrganizations(page: Page): Promise<Organization[]> {
    const { rows } = await this.client.query<OrganizationRow>(
      'SELECT id, name FROM organizations ORDER BY id OFFSET $1 LIMIT $2',
      [page.skip, page.limit],
    );
    return rows;
  }

  async insertOrganization(record: CreateOrganizationRecord): Promise<Organization> {
    const { rows } = await this.client.query<OrganizationRow>(
      'INSERT INTO organizations (name) VALUES ($1) RETURNING id, name',
      [record.name],
    );
    return rows[0];
  }

  async deleteOrganization(id: string): Promise<boolean> {
    const result = await this.client.query('DELETE FROM organizations WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async getEmployee(id: string): Promise<Employee | null> {
    const { rows } = await this.client.query<EmployeeRow>(
      `SELECT ${EMPLOYEE_COLUMNS} FROM employees WHERE id = $1`,
      [id],
    );
    return rows.length > 0 ? toEmployee(rows[0]) : null;
  }

  async listEmployeesByOrg(organizationId: string, page?: Page): Promise<Employee[]> {
    const { rows } = page
      ? await this.client.query<EmployeeRow>(
          `SELECT ${EMPLOYEE_COLUMNS} FROM employees WHERE organization_id = $1 ORDER BY id OFFSET $2 LIMIT $3`,
          [organizationId, page.skip, page.limit],
        )
      : await this.client.query<EmployeeRow>(
          `SELECT ${EMPLOYEE_COLUMNS} FROM employees WHERE organization_id = $1 ORDER BY id`,
          [organizationId],
        );
    return rows.map(toEmployee);
  }

  async listEmployeesByManager(managerId: string): Promise<Employee[]> {
    const { rows } = await this.client.query<EmployeeRow>(
      `SELECT ${EMPLOYEE_COLUMNS} FROM employees WHERE manager_id = $1 ORDER BY id`,
      [managerId],
    );
    return rows.map(toEmployee);
  }

  async insertEmployee(record: CreateEmployeeRecord): Promise<Employee> {
    const { rows } = await this.client.query<EmployeeRow>(
      `INSERT INTO employees (organization_id, name, title, manager_id)
       VALUES ($1, $2, $3, $4)
       RETURNING ${EMPLOYEE_COLUMNS}`,
      [record.organizationId, record.name, record.title, record.managerId],
    );
    return toEmployee(rows[0]);
  }

  async updateEmployee(id: string, fields: UpdateEmployeeRecord): Promise<Employee | null> {
    const assignments: string[] = [];
    const values: unknown[] = [];

    if (fields.name !== undefined) {
      values.push(fields.name);
      assignments.push(`name = $${values.length}`);
    }
    if (fields.title !== undefined) {
      values.push(fields.title);
      assignments.push(`title = $${values.length}`);
    }
    if (fields.managerId !== undefined) {
      values.push(fields.managerId);
      assignments.push(`manager_id = $${values.length}`);
    }

    if (assignments.length === 0) return this.getEmployee(id);

    values.push(id);
    const { rows } = await this.client.query<EmployeeRow>(
      `UPDATE employees SET ${assignments.join(', ')} WHERE id = $${values.length} RETURNING ${EMPLOYEE_COLUMNS}`,
      values,
    );
    return rows.length > 0 ? toEmployee(rows[0]) : null;
  }

  async deleteEmployee(id: string): Promise<boolean> {
    const result = await this.client.query('DELETE FROM employees WHERE id = $1', [id]);
    return (result.rowCount ?? 0) > 0;
  }
}

// ============================================================================
// Store
// ============================================================================

/**
 * PostgreSQL-backed node store. Each unit of work runs at SERIALIZABLE so two
 * manager changes that are valid alone but cyclic together cannot both
 * commit; the loser is retried from the start.
 */
export class PgNodeStore implements NodeStore {
  constructor(
    private pool: Pool,
    private maxRetries = 3,
  ) {}

  async transaction<T>(work: (tx: NodeStoreTx) => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      let client: PoolClient;
      try {
        client = await this.pool.connect();
      } catch (err) {
        throw new TransientStoreError('Database is unavailable', attempt, { cause: err });
      }

      let releaseError: Error | undefined;
      try {
        await client.query('BEGIN ISOLATION LEVEL SERIALIZABLE');
        const result = await work(new PgNodeStoreTx(client));
        await client.query('COMMIT');
        return result;
      } catch (err) {
        try {
          await client.query('ROLLBACK');
        } catch (rollbackErr) {
          // A connection that cannot roll back is discarded, not reused.
          releaseError = rollbackErr instanceof Error ? rollbackErr : new Error(String(rollbackErr));
          logger.error({ err: rollbackErr }, 'Rollback failed');
        }

        if (!isRetryable(err)) throw err;

        if (attempt > this.maxRetries) {
          throw new TransientStoreError(
            `Transaction conflict persisted after ${attempt} attempt(s)`,
            attempt,
            { cause: err },
          );
        }
        logger.warn({ attempt, maxRetries: this.maxRetries }, 'Serialization conflict, retrying transaction');
      } finally {
        client.release(releaseError);
      }
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
