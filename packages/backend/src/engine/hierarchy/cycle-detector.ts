import type { NodeStoreTx } from '../../store/node-store.js';

/**
 * Would making `proposedManagerId` the manager of `employeeId` close a loop?
 *
 * Walks the manager chain upward from the proposed manager, one indexed lookup
 * per step. The visited set starts with `employeeId`, so reaching it again (or
 * any loop already present higher up) is a cycle. A dangling reference ends
 * the walk: this only guards the proposed edge, it does not audit existing data.
 */
export async function wouldCreateCycle(
  tx: NodeStoreTx,
  employeeId: string,
  proposedManagerId: string,
): Promise<boolean> {
  const visited = new Set<string>([employeeId]);
  let current: string | null = proposedManagerId;

  while (current !== null) {
    if (visited.has(current)) return true;
    visited.add(current);

    const node = await tx.getEmployee(current);
    if (!node) return false;
    current = node.managerId;
  }

  return false;
}
