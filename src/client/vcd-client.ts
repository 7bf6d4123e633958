import axios, { type AxiosInstance, type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { createReadStream } from 'fs';
import { stat } from 'fs/promises';
import { Agent } from 'https';
import { basename, dirname, join } from 'path';
import {
  NotFoundError,
  OperationNotSupportedError,
  RemoteOperationError,
  TaskStatus,
  TaskTimeoutError,
  type ResourceAttributeValue,
  type ResourceDescriptor,
  type ResourceHandle,
  type ResourceKind,
  type TaskDescriptor,
  type TaskHandle
} from '../types';
import { createNullLogger, type Logger } from '../logging';
import { arrayAt, booleanAt, isJsonObject, numberAt, objectAt, pathAt, stringAt, type JsonObject } from './json';
import { DEFAULT_TASK_MONITOR_OPTIONS, TaskMonitor, type TaskMonitorOptions } from './task-monitor';
import type {
  AttachVcenterRequest,
  CreateOutcome,
  CreateRequest,
  DeleteOptions,
  UploadTemplateRequest,
  VcdClientFactory,
  VcdCredentials,
  VcdSession
} from './types';

export interface VcdClientOptions {
  host: string;
  apiVersion: string;
  verifySsl: boolean;
  requestTimeoutMs?: number;
  logger?: Logger;
  logRequests?: boolean;
  logHeaders?: boolean;
  logBodies?: boolean;
  taskMonitor?: TaskMonitorOptions;
}

type VcdRequest = Omit<AxiosRequestConfig, 'headers'> & { headers?: Record<string, string> };

const QUERY_PAGE_SIZE = 128;
const AUTH_HEADER = 'x-vcloud-authorization';

const MEDIA_TYPE = {
  adminOrg: 'application/vnd.vmware.admin.organization+json',
  user: 'application/vnd.vmware.admin.user+json',
  createVdcParams: 'application/vnd.vmware.admin.createVdcParams+json',
  orgVdcNetwork: 'application/vnd.vmware.vcloud.orgVdcNetwork+json',
  adminCatalog: 'application/vnd.vmware.admin.catalog+json',
  uploadTemplateParams: 'application/vnd.vmware.vcloud.uploadVAppTemplateParams+json',
  instantiateParams: 'application/vnd.vmware.vcloud.instantiateVAppTemplateParams+json',
  controlAccess: 'application/vnd.vmware.vcloud.controlAccess+json',
  registerVimServer: 'application/vnd.vmware.admin.registerVimServerParams+json'
} as const;

/** Link types in an org resource that point at its children. */
const CHILD_LINK_TYPE: Partial<Record<ResourceKind, RegExp>> = {
  vdc: /vnd\.vmware\.vcloud\.vdc\+/,
  catalog: /vnd\.vmware\.vcloud\.catalog\+/
};

const QUERY_TYPE: Partial<Record<ResourceKind, string>> = {
  pvdc: 'providerVdc',
  netpool: 'networkPool',
  network: 'orgVdcNetwork'
};

const HREF_KIND_PATTERNS: Array<[RegExp, ResourceKind]> = [
  [/\/api\/(admin\/)?org\//, 'org'],
  [/\/api\/(admin\/)?vdc\//, 'vdc'],
  [/\/api\/(admin\/)?catalog\//, 'catalog'],
  [/\/api\/catalogItem\//, 'catalogItem'],
  [/\/api\/vApp\/vapp-/, 'vapp'],
  [/\/api\/admin\/user\//, 'user'],
  [/\/api\/admin\/role\//, 'role'],
  [/\/api\/(admin\/)?network\//, 'network'],
  [/\/api\/admin\/(extension\/)?providervdc\//, 'pvdc'],
  [/\/api\/admin\/pvdcStorageProfile\//, 'storageProfile'],
  [/\/api\/admin\/extension\/networkPool\//, 'netpool'],
  [/\/api\/admin\/extension\/vimServer\//, 'vcenter']
];

export function inferKindFromHref(href: string): ResourceKind {
  const match = HREF_KIND_PATTERNS.find(([pattern]) => pattern.test(href));
  if (!match) {
    throw new OperationNotSupportedError(`Cannot tell what kind of resource ${href} is`);
  }
  return match[1];
}

/** The admin view of an org, VDC or catalog href; other hrefs are returned as is. */
export function toAdminHref(href: string): string {
  return href.replace(/\/api\/(org|vdc|catalog)\//, '/api/admin/$1/');
}

export function normalizeHost(host: string): string {
  let url = host.trim();
  if (!url.startsWith('http://') && !url.startsWith('https://')) {
    url = `https://${url}`;
  }
  return url.replace(/\/$/, '');
}

function parseTaskStatus(value: string | undefined, href: string): TaskStatus {
  const status = Object.values(TaskStatus).find(candidate => candidate === value);
  if (!status) {
    throw new RemoteOperationError(`Task ${href} reported unknown status ${value ?? '<none>'}`);
  }
  return status;
}

function firstTask(resource: unknown): TaskHandle | undefined {
  const [task] = arrayAt(pathAt(resource, 'tasks'), 'task');
  const href = stringAt(task, 'href');
  return href ? { href } : undefined;
}

/**
 * vCloud Director REST client for one actor, speaking the JSON flavour of the
 * legacy `/api` surface.
 */
export class VcdRestClient implements VcdSession {
  readonly credentials: Readonly<Pick<VcdCredentials, 'org' | 'username'>>;
  private readonly password: string;
  private readonly http: AxiosInstance;
  private readonly logger: Logger;
  private readonly taskMonitor: TaskMonitor;
  private token: string | null = null;

  constructor(credentials: VcdCredentials, private readonly options: VcdClientOptions) {
    this.credentials = { org: credentials.org, username: credentials.username };
    this.password = credentials.password;
    this.logger = options.logger ?? createNullLogger();
    this.http = axios.create({
      baseURL: normalizeHost(options.host),
      timeout: options.requestTimeoutMs ?? 60000,
      httpsAgent: new Agent({ rejectUnauthorized: options.verifySsl }),
      headers: {
        Accept: `application/*+json;version=${options.apiVersion}`
      }
    });
    this.taskMonitor = new TaskMonitor(this, {
      ...(options.taskMonitor ?? DEFAULT_TASK_MONITOR_OPTIONS),
      logger: this.logger
    });
  }

  get isLoggedIn(): boolean {
    return this.token !== null;
  }

  async login(): Promise<void> {
    const { org, username } = this.credentials;
    const basic = Buffer.from(`${username}@${org}:${this.password}`).toString('base64');

    const response = await this.send({
      method: 'POST',
      url: '/api/sessions',
      headers: { Authorization: `Basic ${basic}` }
    }, false);

    const token = response.headers[AUTH_HEADER];
    if (typeof token !== 'string' || token.length === 0) {
      throw new RemoteOperationError(`Login of ${username}@${org} returned no session token`, {
        status: response.status
      });
    }
    this.token = token;
    this.logger.debug(`Logged in as ${username}@${org}`);
  }

  async logout(): Promise<void> {
    if (this.token === null) {
      return;
    }
    try {
      await this.send({ method: 'DELETE', url: '/api/session' });
      this.logger.debug(`Logged out ${this.credentials.username}@${this.credentials.org}`);
    } finally {
      this.token = null;
    }
  }

  async listResources(kind: ResourceKind, scope?: ResourceHandle): Promise<ResourceDescriptor[]> {
    switch (kind) {
      case 'pvdc':
      case 'netpool':
        return this.query(kind);
      case 'network':
        return this.query(kind, `vdc==${this.requireScope(kind, scope)}`);
      case 'org': {
        const orgList = await this.getJson('/api/org');
        return arrayAt(orgList, 'org').map(ref => this.toDescriptor('org', ref));
      }
      case 'vdc':
      case 'catalog': {
        const org = await this.getJson(this.requireScope(kind, scope));
        const pattern = CHILD_LINK_TYPE[kind];
        return arrayAt(org, 'link')
          .filter(link => pattern !== undefined && pattern.test(stringAt(link, 'type') ?? ''))
          .map(link => this.toDescriptor(kind, link));
      }
      case 'user': {
        const adminOrg = await this.getJson(toAdminHref(this.requireScope(kind, scope)));
        return arrayAt(objectAt(adminOrg, 'users'), 'userReference').map(ref => this.toDescriptor(kind, ref));
      }
      case 'role': {
        const adminOrg = await this.getJson(toAdminHref(this.requireScope(kind, scope)));
        return arrayAt(objectAt(adminOrg, 'roleReferences'), 'roleReference').map(ref => this.toDescriptor(kind, ref));
      }
      case 'storageProfile': {
        const pvdc = await this.getJson(this.requireScope(kind, scope));
        return arrayAt(objectAt(pvdc, 'storageProfiles'), 'providerVdcStorageProfile').map(ref =>
          this.toDescriptor(kind, ref)
        );
      }
      case 'catalogItem': {
        const catalog = await this.getJson(this.requireScope(kind, scope));
        return arrayAt(objectAt(catalog, 'catalogItems'), 'catalogItem').map(ref => this.toDescriptor(kind, ref));
      }
      case 'vapp': {
        const vdc = await this.getJson(this.requireScope(kind, scope));
        return arrayAt(objectAt(vdc, 'resourceEntities'), 'resourceEntity')
          .filter(entity => /vnd\.vmware\.vcloud\.vApp\+/.test(stringAt(entity, 'type') ?? ''))
          .map(entity => this.toDescriptor(kind, entity));
      }
      case 'vcenter': {
        const refs = await this.getJson('/api/admin/extension/vimServerReferences');
        return arrayAt(refs, 'vimServerReference').map(ref => this.toDescriptor(kind, ref));
      }
    }
  }

  async getResource(href: ResourceHandle, kind?: ResourceKind): Promise<ResourceDescriptor> {
    const resourceKind = kind ?? inferKindFromHref(href);
    const body = await this.getJson(href);
    return this.toDescriptor(resourceKind, body, href);
  }

  async createResource(scope: ResourceHandle | null, request: CreateRequest): Promise<CreateOutcome> {
    switch (request.kind) {
      case 'org':
        return this.postEntity('org', '/api/admin/orgs', MEDIA_TYPE.adminOrg, {
          name: request.name,
          fullName: request.fullName,
          isEnabled: request.isEnabled,
          settings: {}
        });
      case 'user':
        return this.postEntity('user', `${toAdminHref(this.requireScope('user', scope))}/users`, MEDIA_TYPE.user, {
          name: request.name,
          password: request.password,
          isEnabled: request.isEnabled,
          role: { href: request.roleHref }
        });
      case 'vdc':
        return this.postEntity('vdc', `${toAdminHref(this.requireScope('vdc', scope))}/vdcsparams`, MEDIA_TYPE.createVdcParams, {
          name: request.name,
          allocationModel: 'AllocationVApp',
          computeCapacity: {
            cpu: { units: 'MHz', allocated: 0, limit: 0 },
            memory: { units: 'MB', allocated: 0, limit: 0 }
          },
          nicQuota: 0,
          networkQuota: request.networkQuota,
          vdcStorageProfile: request.storageProfiles.map(profile => ({
            enabled: profile.enabled,
            units: profile.units,
            limit: profile.limit,
            default: profile.default,
            providerVdcStorageProfile: { href: profile.href, name: profile.name }
          })),
          providerVdcReference: { href: request.providerVdcHref },
          networkPoolReference: { href: request.networkPoolHref },
          usesFastProvisioning: request.usesFastProvisioning,
          isThinProvision: request.isThinProvision
        });
      case 'network':
        return this.postEntity('network', `${toAdminHref(this.requireScope('network', scope))}/networks`, MEDIA_TYPE.orgVdcNetwork, {
          name: request.name,
          isShared: false,
          configuration: {
            fenceMode: 'isolated',
            ipScopes: {
              ipScope: [{ isInherited: false, gateway: request.gatewayIp, netmask: request.netmask, isEnabled: true }]
            }
          }
        });
      case 'catalog':
        return this.postEntity('catalog', `${toAdminHref(this.requireScope('catalog', scope))}/catalogs`, MEDIA_TYPE.adminCatalog, {
          name: request.name,
          description: request.description
        });
      case 'template':
        return this.uploadTemplate(this.requireScope('catalogItem', scope), request);
      case 'vapp':
        return this.postEntity('vapp', `${this.requireScope('vapp', scope)}/action/instantiateVAppTemplate`, MEDIA_TYPE.instantiateParams, {
          name: request.name,
          deploy: false,
          powerOn: false,
          allEULAsAccepted: request.acceptAllEulas,
          source: { href: request.templateHref }
        });
    }
  }

  /** Orgs, VDCs and catalogs are deleted through their admin view. */
  async deleteResource(href: ResourceHandle, options: DeleteOptions = {}): Promise<TaskHandle> {
    const response = await this.send({
      method: 'DELETE',
      url: toAdminHref(href),
      params: { force: options.force ?? false, recursive: options.recursive ?? false }
    });
    const taskHref = stringAt(response.data, 'href') ?? response.headers['location'];
    if (typeof taskHref !== 'string') {
      throw new RemoteOperationError(`Delete of ${href} returned no task`, { status: response.status });
    }
    return { href: taskHref };
  }

  async setVdcEnabled(vdcHref: ResourceHandle, enabled: boolean): Promise<void> {
    const adminHref = toAdminHref(vdcHref);
    const vdc = await this.getJson(adminHref);
    if (booleanAt(vdc, 'isEnabled') === enabled) {
      throw new OperationNotSupportedError(
        `VDC ${stringAt(vdc, 'name') ?? vdcHref} is already ${enabled ? 'enabled' : 'disabled'}`
      );
    }
    await this.send({ method: 'POST', url: `${adminHref}/action/${enabled ? 'enable' : 'disable'}` });
  }

  async isCatalogShared(catalogHref: ResourceHandle): Promise<boolean> {
    const access = await this.getJson(`${toAdminHref(catalogHref)}/controlAccess`);
    return booleanAt(access, 'isSharedToEveryone') ?? false;
  }

  async shareCatalog(catalogHref: ResourceHandle): Promise<void> {
    await this.send({
      method: 'POST',
      url: `${toAdminHref(catalogHref)}/action/controlAccess`,
      headers: { 'Content-Type': MEDIA_TYPE.controlAccess },
      data: { isSharedToEveryone: true, everyoneAccessLevel: 'ReadOnly' }
    });
  }

  async attachVcenter(request: AttachVcenterRequest): Promise<TaskHandle | null> {
    const response = await this.send({
      method: 'POST',
      url: '/api/admin/extension/action/registervimserver',
      headers: { 'Content-Type': MEDIA_TYPE.registerVimServer },
      data: {
        vimServer: {
          name: request.vcServerName,
          url: `https://${request.vcServerHost}:443`,
          username: request.vcAdminUser,
          password: request.vcAdminPassword,
          isEnabled: request.isEnabled
        },
        shieldManager: {
          name: request.nsxServerName,
          url: `https://${request.nsxHost}`,
          username: request.nsxAdminUser,
          password: request.nsxAdminPassword
        }
      }
    });
    return firstTask(objectAt(response.data, 'vimServer')) ?? null;
  }

  async getTask(task: TaskHandle): Promise<TaskDescriptor> {
    const body = await this.getJson(task.href);
    return {
      href: task.href,
      status: parseTaskStatus(stringAt(body, 'status'), task.href),
      operation: stringAt(body, 'operationName') ?? stringAt(body, 'operation') ?? '',
      details: stringAt(body, 'details'),
      errorMessage: stringAt(objectAt(body, 'error'), 'message')
    };
  }

  getTaskMonitor(): TaskMonitor {
    return this.taskMonitor;
  }

  private async uploadTemplate(catalogHref: ResourceHandle, request: UploadTemplateRequest): Promise<CreateOutcome> {
    const catalogItem = await this.sendJson({
      method: 'POST',
      url: `${catalogHref}/action/upload`,
      headers: { 'Content-Type': MEDIA_TYPE.uploadTemplateParams },
      data: { name: request.name, description: '', manifestRequired: false }
    });
    const templateHref = stringAt(objectAt(catalogItem, 'entity'), 'href');
    if (!templateHref) {
      throw new RemoteOperationError(`Upload of ${request.name} returned no template reference`);
    }

    let template = await this.getJson(templateHref);
    await this.uploadFile(template, 'descriptor.ovf', request.ovfPath);

    // The referenced disk files only become uploadable once the descriptor is processed
    const monitorOptions = this.options.taskMonitor ?? DEFAULT_TASK_MONITOR_OPTIONS;
    const deadline = Date.now() + monitorOptions.timeoutMs;
    template = await this.getJson(templateHref);
    while (booleanAt(template, 'ovfDescriptorUploaded') !== true) {
      if (Date.now() > deadline) {
        throw new TaskTimeoutError({ href: templateHref }, monitorOptions.timeoutMs);
      }
      await new Promise(resolve => setTimeout(resolve, monitorOptions.pollIntervalMs));
      template = await this.getJson(templateHref);
    }

    const directory = dirname(request.ovfPath);
    for (const file of arrayAt(objectAt(template, 'files'), 'file')) {
      const name = stringAt(file, 'name');
      if (!name || name === 'descriptor.ovf') continue;
      if ((numberAt(file, 'bytesTransferred') ?? 0) >= (numberAt(file, 'size') ?? 0)) continue;
      await this.uploadFile(template, name, join(directory, basename(name)));
    }

    template = await this.getJson(templateHref);
    return {
      descriptor: this.toDescriptor('catalogItem', catalogItem),
      task: firstTask(template)
    };
  }

  private async uploadFile(template: JsonObject, fileName: string, localPath: string): Promise<void> {
    const file = arrayAt(objectAt(template, 'files'), 'file').find(entry => stringAt(entry, 'name') === fileName);
    const uploadLink = arrayAt(file, 'link').find(link => stringAt(link, 'rel') === 'upload:default');
    const href = stringAt(uploadLink, 'href');
    if (!href) {
      throw new RemoteOperationError(`Template has no upload link for ${fileName}`);
    }

    const { size } = await stat(localPath);
    this.logger.debug(`Uploading ${localPath} (${size} bytes) as ${fileName}`);
    await this.send({
      method: 'PUT',
      url: href,
      headers: { 'Content-Type': 'application/octet-stream', 'Content-Length': String(size) },
      data: createReadStream(localPath),
      maxBodyLength: Infinity
    });
  }

  private async postEntity(kind: ResourceKind, url: string, contentType: string, data: JsonObject): Promise<CreateOutcome> {
    const body = await this.sendJson({ method: 'POST', url, headers: { 'Content-Type': contentType }, data });
    return { descriptor: this.toDescriptor(kind, body), task: firstTask(body) };
  }

  private async query(kind: ResourceKind, filter?: string): Promise<ResourceDescriptor[]> {
    const type = QUERY_TYPE[kind];
    if (!type) {
      throw new OperationNotSupportedError(`Resources of kind ${kind} cannot be queried`);
    }

    const results: ResourceDescriptor[] = [];
    for (let page = 1; ; page++) {
      const body = await this.getJson('/api/query', {
        type,
        format: 'records',
        page,
        pageSize: QUERY_PAGE_SIZE,
        ...(filter ? { filter } : {})
      });
      const records = arrayAt(body, 'record');
      results.push(...records.map(record => this.toDescriptor(kind, record)));

      const total = numberAt(body, 'total') ?? results.length;
      if (records.length === 0 || results.length >= total) {
        return results;
      }
    }
  }

  private toDescriptor(kind: ResourceKind, body: JsonObject, fallbackHref?: string): ResourceDescriptor {
    const href = stringAt(body, 'href') ?? fallbackHref;
    const name = stringAt(body, 'name');
    if (!href || name === undefined) {
      throw new RemoteOperationError(`Malformed ${kind} reference in response`);
    }

    const attributes: Record<string, ResourceAttributeValue> = {};
    for (const [key, value] of Object.entries(body)) {
      if (key === 'href' || key === 'name') continue;
      if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean' || value === null) {
        attributes[key] = value;
      }
    }
    const entityHref = stringAt(objectAt(body, 'entity'), 'href');
    if (entityHref) {
      attributes.entityHref = entityHref;
    }

    return { kind, name, href, attributes };
  }

  private requireScope(kind: ResourceKind, scope: ResourceHandle | null | undefined): ResourceHandle {
    if (!scope) {
      throw new OperationNotSupportedError(`A parent resource is required to work with ${kind} resources`);
    }
    return scope;
  }

  private async getJson(url: string, params?: Record<string, string | number>): Promise<JsonObject> {
    return this.sendJson({ method: 'GET', url, params });
  }

  private async sendJson(config: VcdRequest): Promise<JsonObject> {
    const response = await this.send(config);
    if (!isJsonObject(response.data)) {
      throw new RemoteOperationError(`Expected a JSON object from ${config.method ?? 'GET'} ${config.url ?? ''}`, {
        status: response.status
      });
    }
    return response.data;
  }

  private async send(config: VcdRequest, authenticated = true): Promise<AxiosResponse<unknown>> {
    const headers: Record<string, string> = {};
    if (authenticated) {
      if (this.token === null) {
        throw new RemoteOperationError(
          `Session for ${this.credentials.username}@${this.credentials.org} is not logged in`
        );
      }
      headers[AUTH_HEADER] = this.token;
    }
    const request: VcdRequest = { ...config, headers: { ...headers, ...config.headers } };
    this.logRequest(request);

    try {
      const response = await this.http.request<unknown>(request);
      this.logResponse(request, response);
      return response;
    } catch (error) {
      throw this.translateError(request, error);
    }
  }

  private translateError(request: VcdRequest, error: unknown): Error {
    const target = `${request.method ?? 'GET'} ${request.url ?? ''}`;
    if (!axios.isAxiosError(error)) {
      return new RemoteOperationError(`${target} failed: ${String(error)}`, { cause: error });
    }

    const status = error.response?.status;
    const body: unknown = error.response?.data;
    const minorErrorCode = stringAt(body, 'minorErrorCode');
    const details = {
      status,
      majorErrorCode: numberAt(body, 'majorErrorCode'),
      minorErrorCode,
      cause: error
    };
    const message = `${target} failed${status ? ` with ${status}` : ''}: ${stringAt(body, 'message') ?? error.message}`;
    this.logger.debug(message);

    if (status === 404 || minorErrorCode === 'RESOURCE_NOT_FOUND') {
      return new NotFoundError(message, {}, details);
    }
    return new RemoteOperationError(message, details);
  }

  private logRequest(request: VcdRequest): void {
    if (!this.options.logRequests) return;
    this.logger.debug(`Request: ${request.method ?? 'GET'} ${request.url ?? ''}`);
    if (this.options.logHeaders) {
      const headers = { ...request.headers };
      for (const key of Object.keys(headers)) {
        if (key.toLowerCase() === AUTH_HEADER || key.toLowerCase() === 'authorization') {
          headers[key] = '[REDACTED]';
        }
      }
      this.logger.debug(`Request headers: ${JSON.stringify(headers)}`);
    }
    if (this.options.logBodies && request.data !== undefined && isJsonObject(request.data)) {
      this.logger.debug(`Request body: ${JSON.stringify(request.data, (key, value: unknown) => (key === 'password' ? '[REDACTED]' : value))}`);
    }
  }

  private logResponse(request: VcdRequest, response: AxiosResponse<unknown>): void {
    if (!this.options.logRequests) return;
    this.logger.debug(`Response: ${response.status} for ${request.method ?? 'GET'} ${request.url ?? ''}`);
    if (this.options.logBodies && response.data !== undefined && response.data !== '') {
      this.logger.debug(`Response body: ${JSON.stringify(response.data)}`);
    }
  }
}

export class VcdRestClientFactory implements VcdClientFactory {
  constructor(private readonly options: VcdClientOptions) {}

  createSession(credentials: VcdCredentials): VcdSession {
    return new VcdRestClient(credentials, this.options);
  }
}
