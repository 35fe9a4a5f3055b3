export { wouldCreateCycle } from './cycle-detector.js';
export { validateManagerAssignment } from './manager-validator.js';
export { reparentDirectReports } from './reparenting.js';
export { directReportsOf, managerChainOf } from './hierarchy-query.js';
export type { HierarchyResult, HierarchyViolation, HierarchyViolationKind } from './types.js';
