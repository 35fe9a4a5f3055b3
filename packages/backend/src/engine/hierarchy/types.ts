// ============================================================================
// Hierarchy Engine Types
// ============================================================================

export type HierarchyViolationKind =
  | 'SelfManagement'
  | 'ManagerNotFound'
  | 'CrossOrganizationManager'
  | 'CycleDetected'
  | 'ReparentingCycle';

export interface HierarchyViolation {
  kind: HierarchyViolationKind;
  message: string;
  /** Ids involved in the rejected change */
  context: Record<string, string | null>;
}

export type HierarchyResult =
  | { ok: true }
  | { ok: false; violation: HierarchyViolation };

export const HIERARCHY_OK: HierarchyResult = { ok: true };

export function rejected(
  kind: HierarchyViolationKind,
  message: string,
  context: Record<string, string | null> = {},
): HierarchyResult {
  return { ok: false, violation: { kind, message, context } };
}
