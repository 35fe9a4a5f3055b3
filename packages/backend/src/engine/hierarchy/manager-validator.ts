import type { NodeStoreTx } from '../../store/node-store.js';
import { wouldCreateCycle } from './cycle-detector.js';
import { HIERARCHY_OK, rejected, type HierarchyResult } from './types.js';

/**
 * Admission check for a manager assignment, run before the write in the same
 * unit of work. Pass `employeeId = null` when the employee is being created.
 *
 * On creation the cycle check is skipped. The new node has no id yet, so no
 * existing employee can have it as an ancestor; the manager's existence and
 * organization are the only things that can be wrong.
 */
export async function validateManagerAssignment(
  tx: NodeStoreTx,
  organizationId: string,
  employeeId: string | null,
  managerId: string | null,
): Promise<HierarchyResult> {
  if (managerId === null) return HIERARCHY_OK;

  if (employeeId !== null && managerId === employeeId) {
    return rejected('SelfManagement', 'Employee cannot manage themselves', {
      employeeId,
    });
  }

  const manager = await tx.getEmployee(managerId);
  if (!manager) {
    return rejected('ManagerNotFound', `Manager with id '${managerId}' not found`, {
      managerId,
    });
  }

  if (manager.organizationId !== organizationId) {
    return rejected(
      'CrossOrganizationManager',
      `Manager with id '${managerId}' does not belong to organization '${organizationId}'`,
      { managerId, organizationId, managerOrganizationId: manager.organizationId },
    );
  }

  if (employeeId !== null && (await wouldCreateCycle(tx, employeeId, managerId))) {
    return rejected('CycleDetected', 'Assigning this manager would create a reporting cycle', {
      employeeId,
      managerId,
    });
  }

  return HIERARCHY_OK;
}
