import type { Employee, NodeStoreTx } from '../../store/node-store.js';

export async function directReportsOf(
  tx: NodeStoreTx,
  organizationId: string,
  employeeId: string,
): Promise<Employee[]> {
  const reports = await tx.listEmployeesByManager(employeeId);
  return reports
    .filter((report) => report.organizationId === organizationId)
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

/**
 * Managers of `employeeId`, nearest first, ending at the root. Stops at a
 * dangling reference or at the first repeated id.
 */
export async function managerChainOf(
  tx: NodeStoreTx,
  employeeId: string,
): Promise<Employee[]> {
  const chain: Employee[] = [];
  const visited = new Set<string>([employeeId]);

  const start = await tx.getEmployee(employeeId);
  let current = start?.managerId ?? null;

  while (current !== null && !visited.has(current)) {
    visited.add(current);
    const manager = await tx.getEmployee(current);
    if (!manager) break;
    chain.push(manager);
    current = manager.managerId;
  }

  return chain;
}
