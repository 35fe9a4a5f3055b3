import type { Employee, NodeStoreTx } from '../../store/node-store.js';
import { wouldCreateCycle } from './cycle-detector.js';
import { HIERARCHY_OK, rejected, type HierarchyResult } from './types.js';

/**
 * Hands the direct reports of an employee about to be deleted to that
 * employee's own manager (or makes them roots if it had none).
 *
 * Every report is checked before anything is written, so a rejection leaves
 * all reports untouched. Call inside the transaction that removes the employee.
 */
export async function reparentDirectReports(
  tx: NodeStoreTx,
  employee: Employee,
): Promise<HierarchyResult> {
  const newManagerId = employee.managerId;
  const reports = await tx.listEmployeesByManager(employee.id);

  if (newManagerId !== null) {
    for (const report of reports) {
      // The id comparison is a fast path: the detector reports the same case.
      if (report.id === newManagerId || (await wouldCreateCycle(tx, report.id, newManagerId))) {
        return rejected(
          'ReparentingCycle',
          `Reparenting employee '${report.id}' to '${newManagerId}' would create a cycle`,
          { employeeId: employee.id, reportId: report.id, newManagerId },
        );
      }
    }
  }

  for (const report of reports) {
    await tx.updateEmployee(report.id, { managerId: newManagerId });
  }

  return HIERARCHY_OK;
}
