import { z } from 'zod';

// ============================================================================
// Path Params
// ============================================================================

export const OrgParamsSchema = z.object({
  orgId: z.uuid('Invalid organization ID'),
});

export const EmployeeParamsSchema = OrgParamsSchema.extend({
  employeeId: z.uuid('Invalid employee ID'),
});

// ============================================================================
// Organization Schemas
// ============================================================================

export const CreateOrganizationSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(255),
});

export type CreateOrganizationInput = z.infer<typeof CreateOrganizationSchema>;

export const OrganizationListQuerySchema = z.object({
  skip: z.coerce.number().int().nonnegative().optional().default(0),
  limit: z.coerce.number().int().positive().max(100).optional().default(100),
});

// ============================================================================
// Employee Schemas
// ============================================================================

export const CreateEmployeeSchema = z.object({
  name: z.string().trim().min(1, 'Name is required').max(255),
  title: z.string().trim().min(1, 'Title is required').max(255),
  managerId: z.uuid('Invalid manager ID').optional().nullable(),
});

export type CreateEmployeeInput = z.infer<typeof CreateEmployeeSchema>;

// managerId: null clears the manager; leaving it out keeps the current one.
export const UpdateEmployeeSchema = z.object({
  name: z.string().trim().min(1).max(255).optional(),
  title: z.string().trim().min(1).max(255).optional(),
  managerId: z.uuid('Invalid manager ID').optional().nullable(),
});

export type UpdateEmployeeInput = z.infer<typeof UpdateEmployeeSchema>;

export const EmployeeListQuerySchema = z.object({
  skip: z.coerce.number().int().nonnegative().optional().default(0),
  limit: z.coerce.number().int().positive().max(1000).optional().default(1000),
});
