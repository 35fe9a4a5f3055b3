import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  OrgParamsSchema,
  EmployeeParamsSchema,
  CreateOrganizationSchema,
  OrganizationListQuerySchema,
  CreateEmployeeSchema,
  UpdateEmployeeSchema,
  EmployeeListQuerySchema,
} from '../schemas/org-chart.schema.js';
import { OrgChartService } from '../services/org-chart.service.js';
import type { NodeStore } from '../store/node-store.js';

export interface OrgChartRoutesOptions {
  store: NodeStore;
}

// ============================================================================
// Org Chart Routes
// ============================================================================

export async function orgChartRoutes(fastify: FastifyInstance, opts: OrgChartRoutesOptions) {
  const serviceFor = (request: FastifyRequest) => new OrgChartService(opts.store, request.log);

  // =========================================================================
  // Organizations
  // =========================================================================

  // POST /api/orgcharts: Create organization
  fastify.post(
    '/api/orgcharts',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const data = CreateOrganizationSchema.parse(request.body);
      const org = await serviceFor(request).createOrganization(data);
      return reply.status(201).send(org);
    },
  );

  // GET /api/orgcharts: List organizations with their employees
  fastify.get(
    '/api/orgcharts',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const page = OrganizationListQuerySchema.parse(request.query);
      const orgs = await serviceFor(request).listOrganizations(page);
      return reply.status(200).send(orgs);
    },
  );

  // GET /api/orgcharts/:orgId: Single organization with its employees
  fastify.get(
    '/api/orgcharts/:orgId',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { orgId } = OrgParamsSchema.parse(request.params);
      const org = await serviceFor(request).getOrganization(orgId);
      return reply.status(200).send(org);
    },
  );

  // DELETE /api/orgcharts/:orgId: Delete organization and all its employees
  fastify.delete(
    '/api/orgcharts/:orgId',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { orgId } = OrgParamsSchema.parse(request.params);
      await serviceFor(request).deleteOrganization(orgId);
      return reply.status(204).send();
    },
  );

  // =========================================================================
  // Employees
  // =========================================================================

  // POST /api/orgcharts/:orgId/employees: Add employee
  fastify.post(
    '/api/orgcharts/:orgId/employees',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { orgId } = OrgParamsSchema.parse(request.params);
      const data = CreateEmployeeSchema.parse(request.body);
      const employee = await serviceFor(request).createEmployee(orgId, data);
      return reply.status(201).send(employee);
    },
  );

  // GET /api/orgcharts/:orgId/employees: List employees
  fastify.get(
    '/api/orgcharts/:orgId/employees',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { orgId } = OrgParamsSchema.parse(request.params);
      const page = EmployeeListQuerySchema.parse(request.query);
      const employees = await serviceFor(request).listEmployees(orgId, page);
      return reply.status(200).send(employees);
    },
  );

  // GET /api/orgcharts/:orgId/employees/:employeeId: Get employee
  fastify.get(
    '/api/orgcharts/:orgId/employees/:employeeId',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { orgId, employeeId } = EmployeeParamsSchema.parse(request.params);
      const employee = await serviceFor(request).getEmployee(orgId, employeeId);
      return reply.status(200).send(employee);
    },
  );

  // PUT /api/orgcharts/:orgId/employees/:employeeId: Partial update
  fastify.put(
    '/api/orgcharts/:orgId/employees/:employeeId',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { orgId, employeeId } = EmployeeParamsSchema.parse(request.params);
      const data = UpdateEmployeeSchema.parse(request.body ?? {});
      const employee = await serviceFor(request).updateEmployee(orgId, employeeId, data);
      return reply.status(200).send(employee);
    },
  );

  // DELETE /api/orgcharts/:orgId/employees/:employeeId: Delete, reparenting reports
  fastify.delete(
    '/api/orgcharts/:orgId/employees/:employeeId',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { orgId, employeeId } = EmployeeParamsSchema.parse(request.params);
      await serviceFor(request).deleteEmployee(orgId, employeeId);
      return reply.status(204).send();
    },
  );

  // POST /api/orgcharts/:orgId/employees/:employeeId/promote-ceo
  fastify.post(
    '/api/orgcharts/:orgId/employees/:employeeId/promote-ceo',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { orgId, employeeId } = EmployeeParamsSchema.parse(request.params);
      const employee = await serviceFor(request).promoteToCeo(orgId, employeeId);
      return reply.status(200).send(employee);
    },
  );

  // =========================================================================
  // Hierarchy
  // =========================================================================

  // GET /api/orgcharts/:orgId/employees/:employeeId/direct-reports
  fastify.get(
    '/api/orgcharts/:orgId/employees/:employeeId/direct-reports',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { orgId, employeeId } = EmployeeParamsSchema.parse(request.params);
      const directReports = await serviceFor(request).getDirectReports(orgId, employeeId);
      return reply.status(200).send({ directReports });
    },
  );

  // GET /api/orgcharts/:orgId/employees/:employeeId/manager-chain
  fastify.get(
    '/api/orgcharts/:orgId/employees/:employeeId/manager-chain',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const { orgId, employeeId } = EmployeeParamsSchema.parse(request.params);
      const managerChain = await serviceFor(request).getManagerChain(orgId, employeeId);
      return reply.status(200).send({ managerChain });
    },
  );
}
