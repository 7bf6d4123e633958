import { describe, it, expect, vi, beforeEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  VcdRestClient,
  VcdRestClientFactory,
  inferKindFromHref,
  normalizeHost,
  toAdminHref
} from '../vcd-client';
import {
  NotFoundError,
  OperationNotSupportedError,
  RemoteOperationError,
  TaskStatus,
  TaskTimeoutError
} from '../../types';
import type { Logger } from '../../logging';

const { request, create } = vi.hoisted(() => {
  const request = vi.fn();
  return { request, create: vi.fn(() => ({ request })) };
});

vi.mock('axios', () => ({
  default: {
    create,
    isAxiosError: (value: unknown) => typeof value === 'object' && value !== null && 'isAxiosError' in value
  }
}));

const ORG = 'https://vcd.test/api/org/42';
const VDC = 'https://vcd.test/api/vdc/7';

function respond(data: unknown, headers: Record<string, string> = {}, status = 200) {
  return { status, headers, data };
}

function httpError(status: number, data: unknown): Error {
  return Object.assign(new Error(`Request failed with status code ${status}`), {
    isAxiosError: true,
    response: { status, data, headers: {} }
  });
}

function newClient(options: { logger?: Logger; logRequests?: boolean; logHeaders?: boolean; logBodies?: boolean } = {}) {
  return new VcdRestClient(
    { org: 'System', username: 'administrator', password: 'test-secret' },
    { host: 'vcd.test', apiVersion: '31.0', verifySsl: false, ...options }
  );
}

async function loggedInClient(options: Parameters<typeof newClient>[0] = {}): Promise<VcdRestClient> {
  const client = newClient(options);
  request.mockResolvedValueOnce(respond('', { 'x-vcloud-authorization': 'token-1' }));
  await client.login();
  request.mockClear();
  return client;
}

describe('VcdRestClient', () => {
  beforeEach(() => {
    request.mockReset();
    create.mockClear();
  });

  describe('construction', () => {
    it('should target the host with the requested API version', () => {
      newClient();

      expect(create).toHaveBeenCalledWith(
        expect.objectContaining({
          baseURL: 'https://vcd.test',
          headers: { Accept: 'application/*+json;version=31.0' }
        })
      );
    });
  });

  describe('login', () => {
    it('should authenticate with basic credentials and keep the session token', async () => {
      const client = newClient();
      request.mockResolvedValueOnce(respond('', { 'x-vcloud-authorization': 'token-1' }));

      await client.login();

      expect(request).toHaveBeenCalledWith({
        method: 'POST',
        url: '/api/sessions',
        headers: { Authorization: `Basic ${Buffer.from('administrator@System:test-secret').toString('base64')}` }
      });
      expect(client.isLoggedIn).toBe(true);
    });

    it('should fail when no token comes back', async () => {
      const client = newClient();
      request.mockResolvedValueOnce(respond(''));

      await expect(client.login()).rejects.toThrow('Login of administrator@System returned no session token');
      expect(client.isLoggedIn).toBe(false);
    });

    it('should refuse authenticated calls before login', async () => {
      await expect(newClient().listResources('org')).rejects.toThrow(
        'Session for administrator@System is not logged in'
      );
      expect(request).not.toHaveBeenCalled();
    });
  });

  describe('logout', () => {
    it('should end the session', async () => {
      const client = await loggedInClient();
      request.mockResolvedValueOnce(respond(''));

      await client.logout();

      expect(request).toHaveBeenCalledWith({
        method: 'DELETE',
        url: '/api/session',
        headers: { 'x-vcloud-authorization': 'token-1' }
      });
      expect(client.isLoggedIn).toBe(false);
    });

    it('should do nothing when not logged in', async () => {
      await newClient().logout();
      expect(request).not.toHaveBeenCalled();
    });

    it('should forget the token even when the server rejects the logout', async () => {
      const client = await loggedInClient();
      request.mockRejectedValueOnce(httpError(500, { message: 'down' }));

      await expect(client.logout()).rejects.toBeInstanceOf(RemoteOperationError);
      expect(client.isLoggedIn).toBe(false);
    });
  });

  describe('listResources', () => {
    it('should follow query pagination', async () => {
      const client = await loggedInClient();
      request
        .mockResolvedValueOnce(
          respond({
            total: 3,
            record: [
              { name: 'pvdc-a', href: 'https://vcd.test/api/admin/providervdc/1', isEnabled: true },
              { name: 'pvdc-b', href: 'https://vcd.test/api/admin/providervdc/2', isEnabled: true }
            ]
          })
        )
        .mockResolvedValueOnce(
          respond({ total: 3, record: { name: 'pvdc-c', href: 'https://vcd.test/api/admin/providervdc/3' } })
        );

      const pvdcs = await client.listResources('pvdc');

      expect(pvdcs.map(pvdc => pvdc.name)).toEqual(['pvdc-a', 'pvdc-b', 'pvdc-c']);
      expect(pvdcs[0]).toEqual({
        kind: 'pvdc',
        name: 'pvdc-a',
        href: 'https://vcd.test/api/admin/providervdc/1',
        attributes: { isEnabled: true }
      });
      expect(request).toHaveBeenCalledTimes(2);
      expect(request.mock.calls[1][0]).toMatchObject({
        url: '/api/query',
        params: { type: 'providerVdc', format: 'records', page: 2, pageSize: 128 }
      });
    });

    it('should filter networks by VDC', async () => {
      const client = await loggedInClient();
      request.mockResolvedValueOnce(respond({ total: 0, record: [] }));

      await expect(client.listResources('network', VDC)).resolves.toEqual([]);
      expect(request.mock.calls[0][0]).toMatchObject({
        params: { type: 'orgVdcNetwork', filter: `vdc==${VDC}` }
      });
    });

    it('should list VDCs from the links of the org', async () => {
      const client = await loggedInClient();
      request.mockResolvedValueOnce(
        respond({
          name: 'test_org',
          link: [
            { rel: 'down', type: 'application/vnd.vmware.vcloud.vdc+json', name: 'test_vdc', href: VDC },
            { rel: 'down', type: 'application/vnd.vmware.vcloud.catalog+json', name: 'test_catalog', href: 'https://vcd.test/api/catalog/3' }
          ]
        })
      );

      const vdcs = await client.listResources('vdc', ORG);

      expect(vdcs).toEqual([
        { kind: 'vdc', name: 'test_vdc', href: VDC, attributes: { rel: 'down', type: 'application/vnd.vmware.vcloud.vdc+json' } }
      ]);
      expect(request.mock.calls[0][0]).toMatchObject({ method: 'GET', url: ORG });
    });

    it('should read users from the admin view of the org', async () => {
      const client = await loggedInClient();
      request.mockResolvedValueOnce(
        respond({ users: { userReference: [{ name: 'org_admin', href: 'https://vcd.test/api/admin/user/5' }] } })
      );

      const users = await client.listResources('user', ORG);

      expect(users.map(user => user.name)).toEqual(['org_admin']);
      expect(request.mock.calls[0][0]).toMatchObject({ url: 'https://vcd.test/api/admin/org/42' });
    });

    it('should require a parent for scoped kinds', async () => {
      const client = await loggedInClient();

      await expect(client.listResources('catalogItem')).rejects.toBeInstanceOf(OperationNotSupportedError);
    });
  });

  describe('error translation', () => {
    it('should turn 404 into NotFoundError', async () => {
      const client = await loggedInClient();
      request.mockRejectedValueOnce(httpError(404, { message: 'No such VDC', majorErrorCode: 404 }));

      const error = await client.getResource(VDC).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(NotFoundError);
      if (error instanceof NotFoundError) {
        expect(error.status).toBe(404);
        expect(error.message).toBe(`GET ${VDC} failed with 404: No such VDC`);
      }
    });

    it('should recognise the not-found minor error code', async () => {
      const client = await loggedInClient();
      request.mockRejectedValueOnce(
        httpError(403, { message: 'Either you need some or all of the following rights', minorErrorCode: 'RESOURCE_NOT_FOUND' })
      );

      await expect(client.getResource(VDC)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should keep the status and codes of other failures', async () => {
      const client = await loggedInClient();
      request.mockRejectedValueOnce(
        httpError(400, { message: 'Bad request', majorErrorCode: 400, minorErrorCode: 'BAD_REQUEST' })
      );

      const error = await client.getResource(VDC).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RemoteOperationError);
      expect(error).not.toBeInstanceOf(NotFoundError);
      expect(error).toMatchObject({ status: 400, majorErrorCode: 400, minorErrorCode: 'BAD_REQUEST' });
    });

    it('should wrap transport failures', async () => {
      const client = await loggedInClient();
      request.mockRejectedValueOnce('socket hang up');

      await expect(client.getResource(VDC)).rejects.toThrow(`GET ${VDC} failed: socket hang up`);
    });
  });

  describe('createResource', () => {
    it('should create an org and return its task', async () => {
      const client = await loggedInClient();
      request.mockResolvedValueOnce(
        respond({
          name: 'test_org',
          href: 'https://vcd.test/api/admin/org/42',
          tasks: { task: [{ href: 'https://vcd.test/api/task/9' }] }
        })
      );

      const outcome = await client.createResource(null, { kind: 'org', name: 'test_org', fullName: 'test_org', isEnabled: true });

      expect(outcome).toEqual({
        descriptor: { kind: 'org', name: 'test_org', href: 'https://vcd.test/api/admin/org/42', attributes: {} },
        task: { href: 'https://vcd.test/api/task/9' }
      });
      expect(request.mock.calls[0][0]).toMatchObject({
        method: 'POST',
        url: '/api/admin/orgs',
        headers: { 'Content-Type': 'application/vnd.vmware.admin.organization+json' },
        data: { name: 'test_org', fullName: 'test_org', isEnabled: true }
      });
    });

    it('should create users through the admin view of the org', async () => {
      const client = await loggedInClient();
      request.mockResolvedValueOnce(respond({ name: 'vapp_user', href: 'https://vcd.test/api/admin/user/6' }));

      const outcome = await client.createResource(ORG, {
        kind: 'user',
        name: 'vapp_user',
        password: 'test-secret',
        roleHref: 'https://vcd.test/api/admin/role/2',
        isEnabled: true
      });

      expect(outcome.task).toBeUndefined();
      expect(request.mock.calls[0][0]).toMatchObject({
        url: 'https://vcd.test/api/admin/org/42/users',
        data: { name: 'vapp_user', role: { href: 'https://vcd.test/api/admin/role/2' } }
      });
    });

    it('should instantiate vApps with the EULAs accepted', async () => {
      const client = await loggedInClient();
      request.mockResolvedValueOnce(
        respond({ name: 'test_vapp', href: 'https://vcd.test/api/vApp/vapp-1', tasks: { task: { href: 'https://vcd.test/api/task/3' } } })
      );

      const outcome = await client.createResource(VDC, {
        kind: 'vapp',
        name: 'test_vapp',
        templateHref: 'https://vcd.test/api/vAppTemplate/vappTemplate-1',
        acceptAllEulas: true
      });

      expect(outcome.task).toEqual({ href: 'https://vcd.test/api/task/3' });
      expect(request.mock.calls[0][0]).toMatchObject({
        url: `${VDC}/action/instantiateVAppTemplate`,
        data: { allEULAsAccepted: true, source: { href: 'https://vcd.test/api/vAppTemplate/vappTemplate-1' } }
      });
    });
  });

  describe('deleteResource', () => {
    it('should delete through the admin view and return the task', async () => {
      const client = await loggedInClient();
      request.mockResolvedValueOnce(respond({ href: 'https://vcd.test/api/task/11', status: 'running' }, {}, 202));

      const task = await client.deleteResource(VDC, { force: true, recursive: true });

      expect(task).toEqual({ href: 'https://vcd.test/api/task/11' });
      expect(request.mock.calls[0][0]).toMatchObject({
        method: 'DELETE',
        url: 'https://vcd.test/api/admin/vdc/7',
        params: { force: true, recursive: true }
      });
    });

    it('should fall back to the location header', async () => {
      const client = await loggedInClient();
      request.mockResolvedValueOnce(respond('', { location: 'https://vcd.test/api/task/12' }, 202));

      await expect(client.deleteResource('https://vcd.test/api/vApp/vapp-1')).resolves.toEqual({
        href: 'https://vcd.test/api/task/12'
      });
    });
  });

  describe('setVdcEnabled', () => {
    it('should disable an enabled VDC', async () => {
      const client = await loggedInClient();
      request.mockResolvedValueOnce(respond({ name: 'test_vdc', isEnabled: true })).mockResolvedValueOnce(respond(''));

      await client.setVdcEnabled(VDC, false);

      expect(request.mock.calls[1][0]).toMatchObject({
        method: 'POST',
        url: 'https://vcd.test/api/admin/vdc/7/action/disable'
      });
    });

    it('should report a VDC that is already disabled', async () => {
      const client = await loggedInClient();
      request.mockResolvedValueOnce(respond({ name: 'test_vdc', isEnabled: false }));

      await expect(client.setVdcEnabled(VDC, false)).rejects.toThrow(
        new OperationNotSupportedError('VDC test_vdc is already disabled')
      );
      expect(request).toHaveBeenCalledTimes(1);
    });
  });

  describe('catalog sharing', () => {
    it('should read and update the control access of the catalog', async () => {
      const client = await loggedInClient();
      const catalog = 'https://vcd.test/api/catalog/3';
      request.mockResolvedValueOnce(respond({ isSharedToEveryone: false })).mockResolvedValueOnce(respond(''));

      await expect(client.isCatalogShared(catalog)).resolves.toBe(false);
      await client.shareCatalog(catalog);

      expect(request.mock.calls[0][0]).toMatchObject({ url: 'https://vcd.test/api/admin/catalog/3/controlAccess' });
      expect(request.mock.calls[1][0]).toMatchObject({
        method: 'POST',
        url: 'https://vcd.test/api/admin/catalog/3/action/controlAccess',
        data: { isSharedToEveryone: true, everyoneAccessLevel: 'ReadOnly' }
      });
    });
  });

  describe('getTask', () => {
    it('should map the task payload', async () => {
      const client = await loggedInClient();
      request.mockResolvedValueOnce(
        respond({ status: 'error', operationName: 'vdcCreateVdc', error: { message: 'No capacity' } })
      );

      await expect(client.getTask({ href: 'https://vcd.test/api/task/9' })).resolves.toEqual({
        href: 'https://vcd.test/api/task/9',
        status: TaskStatus.ERROR,
        operation: 'vdcCreateVdc',
        details: undefined,
        errorMessage: 'No capacity'
      });
    });

    it('should reject statuses it does not know', async () => {
      const client = await loggedInClient();
      request.mockResolvedValueOnce(respond({ status: 'paused' }));

      await expect(client.getTask({ href: 'https://vcd.test/api/task/9' })).rejects.toThrow(
        'Task https://vcd.test/api/task/9 reported unknown status paused'
      );
    });
  });

  describe('template upload', () => {
    it('should time out when the descriptor is never processed', async () => {
      const dir = await mkdtemp(join(tmpdir(), 'vcd-testbed-upload-'));
      try {
        const ovfPath = join(dir, 'tiny.ovf');
        await writeFile(ovfPath, '<Envelope/>');
        const client = new VcdRestClient(
          { org: 'test_org', username: 'catalog_author', password: 'test-secret' },
          { host: 'vcd.test', apiVersion: '31.0', verifySsl: false, taskMonitor: { pollIntervalMs: 1, timeoutMs: 5 } }
        );
        request.mockResolvedValueOnce(respond('', { 'x-vcloud-authorization': 'token-1' }));
        await client.login();
        const templateHref = 'https://vcd.test/api/vAppTemplate/vappTemplate-1';
        request
          .mockResolvedValueOnce(
            respond({ name: 'tiny.ovf', href: 'https://vcd.test/api/catalogItem/1', entity: { href: templateHref } })
          )
          .mockResolvedValueOnce(
            respond({
              files: {
                file: [{ name: 'descriptor.ovf', link: [{ rel: 'upload:default', href: 'https://vcd.test/transfer/1/descriptor.ovf' }] }]
              }
            })
          )
          .mockResolvedValueOnce(respond(''))
          .mockResolvedValue(respond({ ovfDescriptorUploaded: false }));

        const error = await client
          .createResource('https://vcd.test/api/catalog/3', { kind: 'template', name: 'tiny.ovf', ovfPath })
          .catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(TaskTimeoutError);
        expect(error).toMatchObject({ task: { href: templateHref }, timeoutMs: 5 });
        expect(request.mock.calls[3][0]).toMatchObject({
          method: 'PUT',
          url: 'https://vcd.test/transfer/1/descriptor.ovf',
          headers: { 'Content-Type': 'application/octet-stream', 'Content-Length': '11' }
        });
      } finally {
        await rm(dir, { recursive: true, force: true });
      }
    });
  });

  describe('request logging', () => {
    it('should redact credentials', async () => {
      const lines: string[] = [];
      const logger: Logger = {
        name: 'test',
        debug: line => lines.push(line),
        info: line => lines.push(line),
        warn: line => lines.push(line),
        error: line => lines.push(line),
        child: () => logger
      };
      const client = await loggedInClient({ logger, logRequests: true, logHeaders: true, logBodies: true });
      lines.length = 0;
      request.mockResolvedValueOnce(respond({ name: 'vapp_user', href: 'https://vcd.test/api/admin/user/6' }));

      await client.createResource(ORG, {
        kind: 'user',
        name: 'vapp_user',
        password: 'test-secret',
        roleHref: 'https://vcd.test/api/admin/role/2',
        isEnabled: true
      });

      expect(lines[0]).toBe('Request: POST https://vcd.test/api/admin/org/42/users');
      expect(lines[1]).toBe(
        'Request headers: {"x-vcloud-authorization":"[REDACTED]","Content-Type":"application/vnd.vmware.admin.user+json"}'
      );
      expect(lines[2]).toContain('"password":"[REDACTED]"');
      expect(lines.join('\n')).not.toContain('test-secret');
    });
  });
});

describe('VcdRestClientFactory', () => {
  it('should create sessions that are not logged in', () => {
    const session = new VcdRestClientFactory({ host: 'vcd.test', apiVersion: '31.0', verifySsl: true }).createSession({
      org: 'test_org',
      username: 'org_admin',
      password: 'test-secret'
    });

    expect(session.isLoggedIn).toBe(false);
    expect(session.credentials).toEqual({ org: 'test_org', username: 'org_admin' });
  });
});

describe('href helpers', () => {
  it('should infer the kind of a resource from its href', () => {
    expect(inferKindFromHref('https://vcd.test/api/admin/org/1')).toBe('org');
    expect(inferKindFromHref('https://vcd.test/api/vdc/1')).toBe('vdc');
    expect(inferKindFromHref('https://vcd.test/api/vApp/vapp-1')).toBe('vapp');
    expect(inferKindFromHref('https://vcd.test/api/catalogItem/1')).toBe('catalogItem');
    expect(() => inferKindFromHref('https://vcd.test/api/unknown/1')).toThrow(OperationNotSupportedError);
  });

  it('should map org, VDC and catalog hrefs to their admin view', () => {
    expect(toAdminHref('https://vcd.test/api/org/1')).toBe('https://vcd.test/api/admin/org/1');
    expect(toAdminHref('https://vcd.test/api/catalog/2')).toBe('https://vcd.test/api/admin/catalog/2');
    expect(toAdminHref('https://vcd.test/api/admin/vdc/3')).toBe('https://vcd.test/api/admin/vdc/3');
    expect(toAdminHref('https://vcd.test/api/vApp/vapp-1')).toBe('https://vcd.test/api/vApp/vapp-1');
  });

  it('should normalise hosts to an https base URL', () => {
    expect(normalizeHost('vcd.test')).toBe('https://vcd.test');
    expect(normalizeHost(' http://vcd.test:8080/ ')).toBe('http://vcd.test:8080');
  });
});
