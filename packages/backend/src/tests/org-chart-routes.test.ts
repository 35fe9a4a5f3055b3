import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { Employee } from '../store/node-store.js';
import type { OrganizationWithEmployees } from '../services/org-chart.service.js';
import { MemoryNodeStore } from './memory-node-store.js';
import { buildTestApp, parseJsonResponse, testUuid } from './setup.js';

interface ErrorBody {
  error: string;
  message: string;
  statusCode: number;
  details?: unknown;
}

describe('Org Chart Routes', () => {
  let store: MemoryNodeStore;
  let app: FastifyInstance;

  beforeEach(async () => {
    store = new MemoryNodeStore();
    app = await buildTestApp(store);
  });

  afterEach(async () => {
    await app.close();
  });

  async function createOrg(name: string) {
    const res = await app.inject({ method: 'POST', url: '/api/orgcharts', payload: { name } });
    return parseJsonResponse<OrganizationWithEmployees>(res);
  }

  async function createEmployee(orgId: string, payload: Record<string, unknown>) {
    const res = await app.inject({
      method: 'POST',
      url: `/api/orgcharts/${orgId}/employees`,
      payload,
    });
    return parseJsonResponse<Employee>(res);
  }

  it('POST /api/orgcharts creates an organization', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/orgcharts', payload: { name: 'Acme' } });

    expect(res.statusCode).toBe(201);
    expect(JSON.parse(res.body)).toEqual({ id: testUuid('1'), name: 'Acme', employees: [] });
  });

  it('POST /api/orgcharts with an empty name returns 400', async () => {
    const res = await app.inject({ method: 'POST', url: '/api/orgcharts', payload: { name: '   ' } });

    expect(res.statusCode).toBe(400);
    const body = parseJsonResponse<ErrorBody>(res);
    expect(body.error).toBe('Validation Error');
    expect(body.details).toEqual([{ path: 'name', message: 'Name is required' }]);
  });

  it('GET /api/orgcharts/:orgId with a malformed id returns 400', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/orgcharts/not-a-uuid' });

    expect(res.statusCode).toBe(400);
    expect(parseJsonResponse<ErrorBody>(res).details).toEqual([
      { path: 'orgId', message: 'Invalid organization ID' },
    ]);
  });

  it('GET /api/orgcharts/:orgId for an unknown organization returns 404', async () => {
    const res = await app.inject({ method: 'GET', url: `/api/orgcharts/${testUuid('404')}` });

    expect(res.statusCode).toBe(404);
    expect(parseJsonResponse<ErrorBody>(res)).toEqual({
      error: 'Not Found',
      message: `Organization with id '${testUuid('404')}' not found`,
      statusCode: 404,
    });
  });

  it('walks the Acme scenario end to end', async () => {
    const acme = await createOrg('Acme');
    const alice = await createEmployee(acme.id, { name: 'Alice', title: 'CEO' });
    expect(alice.managerId).toBeNull();

    const bob = await createEmployee(acme.id, { name: 'Bob', title: 'VP', managerId: alice.id });
    const carol = await createEmployee(acme.id, { name: 'Carol', title: 'Engineer', managerId: bob.id });

    const cyclic = await app.inject({
      method: 'PUT',
      url: `/api/orgcharts/${acme.id}/employees/${alice.id}`,
      payload: { managerId: carol.id },
    });
    expect(cyclic.statusCode).toBe(400);
    expect(parseJsonResponse<ErrorBody>(cyclic)).toEqual({
      error: 'Hierarchy Violation',
      message: 'Assigning this manager would create a reporting cycle',
      statusCode: 400,
      details: { kind: 'CycleDetected', employeeId: alice.id, managerId: carol.id },
    });

    const deleted = await app.inject({
      method: 'DELETE',
      url: `/api/orgcharts/${acme.id}/employees/${bob.id}`,
    });
    expect(deleted.statusCode).toBe(204);
    expect(deleted.body).toBe('');

    const reports = await app.inject({
      method: 'GET',
      url: `/api/orgcharts/${acme.id}/employees/${alice.id}/direct-reports`,
    });
    expect(reports.statusCode).toBe(200);
    expect(JSON.parse(reports.body)).toEqual({
      directReports: [{ ...carol, managerId: alice.id }],
    });
  });

  it('PUT rejects self-management with the violation kind', async () => {
    const acme = await createOrg('Acme');
    const alice = await createEmployee(acme.id, { name: 'Alice', title: 'CEO' });

    const res = await app.inject({
      method: 'PUT',
      url: `/api/orgcharts/${acme.id}/employees/${alice.id}`,
      payload: { managerId: alice.id },
    });

    expect(res.statusCode).toBe(400);
    expect(parseJsonResponse<ErrorBody>(res).details).toEqual({
      kind: 'SelfManagement',
      employeeId: alice.id,
    });
  });

  it('POST employee with a manager from another organization returns 400', async () => {
    const acme = await createOrg('Acme');
    const globex = await createOrg('Globex');
    const hank = await createEmployee(globex.id, { name: 'Hank', title: 'CEO' });

    const res = await app.inject({
      method: 'POST',
      url: `/api/orgcharts/${acme.id}/employees`,
      payload: { name: 'Bob', title: 'VP', managerId: hank.id },
    });

    expect(res.statusCode).toBe(400);
    expect(parseJsonResponse<ErrorBody>(res).details).toMatchObject({ kind: 'CrossOrganizationManager' });
  });

  it('GET employee through the wrong organization returns 404', async () => {
    const acme = await createOrg('Acme');
    const globex = await createOrg('Globex');
    const hank = await createEmployee(globex.id, { name: 'Hank', title: 'CEO' });

    const res = await app.inject({ method: 'GET', url: `/api/orgcharts/${acme.id}/employees/${hank.id}` });

    expect(res.statusCode).toBe(404);
  });

  it('GET /api/orgcharts lists organizations with employees', async () => {
    const acme = await createOrg('Acme');
    const alice = await createEmployee(acme.id, { name: 'Alice', title: 'CEO' });

    const res = await app.inject({ method: 'GET', url: '/api/orgcharts?limit=10' });

    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body)).toEqual([{ id: acme.id, name: 'Acme', employees: [alice] }]);
  });

  it('GET /api/orgcharts rejects a limit above 100', async () => {
    const res = await app.inject({ method: 'GET', url: '/api/orgcharts?limit=101' });

    expect(res.statusCode).toBe(400);
  });

  it('POST promote-ceo makes the employee a root', async () => {
    const acme = await createOrg('Acme');
    const alice = await createEmployee(acme.id, { name: 'Alice', title: 'CEO' });
    const bob = await createEmployee(acme.id, { name: 'Bob', title: 'VP', managerId: alice.id });

    const res = await app.inject({
      method: 'POST',
      url: `/api/orgcharts/${acme.id}/employees/${bob.id}/promote-ceo`,
    });

    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body)).toEqual({ ...bob, title: 'CEO', managerId: null });
  });

  it('GET manager-chain returns managers nearest first', async () => {
    const acme = await createOrg('Acme');
    const alice = await createEmployee(acme.id, { name: 'Alice', title: 'CEO' });
    const bob = await createEmployee(acme.id, { name: 'Bob', title: 'VP', managerId: alice.id });
    const carol = await createEmployee(acme.id, { name: 'Carol', title: 'Engineer', managerId: bob.id });

    const res = await app.inject({
      method: 'GET',
      url: `/api/orgcharts/${acme.id}/employees/${carol.id}/manager-chain`,
    });

    expect(res.statusCode).toBe(200);
    expect(JSON.parse(res.body)).toEqual({ managerChain: [bob, alice] });
  });

  it('DELETE /api/orgcharts/:orgId removes the organization and its employees', async () => {
    const acme = await createOrg('Acme');
    await createEmployee(acme.id, { name: 'Alice', title: 'CEO' });

    const res = await app.inject({ method: 'DELETE', url: `/api/orgcharts/${acme.id}` });

    expect(res.statusCode).toBe(204);
    expect(store.organizations()).toEqual([]);
    expect(store.employees()).toEqual([]);
  });

  it('returns 503 with Retry-After when the store is unavailable', async () => {
    store.failNextTransaction();

    const res = await app.inject({ method: 'POST', url: '/api/orgcharts', payload: { name: 'Acme' } });

    expect(res.statusCode).toBe(503);
    expect(res.headers['retry-after']).toBe('1');
    expect(parseJsonResponse<ErrorBody>(res)).toEqual({
      error: 'Service Unavailable',
      message: 'Database is unavailable. Retry the request.',
      statusCode: 503,
    });
  });
});
