// Remote API client contract
import type {
  ResourceDescriptor,
  ResourceHandle,
  ResourceKind,
  TaskDescriptor,
  TaskHandle
} from '../types';
import type { TaskMonitor } from './task-monitor';

export interface VcdCredentials {
  org: string;
  username: string;
  password: string;
}

export interface StorageProfileSpec {
  name: string;
  /** Provider VDC storage profile backing this one. */
  href: ResourceHandle;
  enabled: boolean;
  units: 'MB' | 'GB';
  limit: number;
  default: boolean;
}

export interface CreateOrgRequest {
  kind: 'org';
  name: string;
  fullName: string;
  isEnabled: boolean;
}

export interface CreateUserRequest {
  kind: 'user';
  name: string;
  password: string;
  roleHref: ResourceHandle;
  isEnabled: boolean;
}

export interface CreateVdcRequest {
  kind: 'vdc';
  name: string;
  providerVdcHref: ResourceHandle;
  networkPoolHref: ResourceHandle;
  networkQuota: number;
  storageProfiles: StorageProfileSpec[];
  usesFastProvisioning: boolean;
  isThinProvision: boolean;
}

export interface CreateNetworkRequest {
  kind: 'network';
  name: string;
  gatewayIp: string;
  netmask: string;
}

export interface CreateCatalogRequest {
  kind: 'catalog';
  name: string;
  description: string;
}

export interface UploadTemplateRequest {
  kind: 'template';
  name: string;
  /** Path of the .ovf descriptor; the files it references sit beside it. */
  ovfPath: string;
}

export interface InstantiateVAppRequest {
  kind: 'vapp';
  name: string;
  templateHref: ResourceHandle;
  acceptAllEulas: boolean;
}

export type CreateRequest =
  | CreateOrgRequest
  | CreateUserRequest
  | CreateVdcRequest
  | CreateNetworkRequest
  | CreateCatalogRequest
  | UploadTemplateRequest
  | InstantiateVAppRequest;

/**
 * Result of a creation call. Most creations in vCloud Director are
 * asynchronous, in which case `task` must reach success before the resource
 * can be used.
 */
export interface CreateOutcome {
  descriptor: ResourceDescriptor;
  task?: TaskHandle;
}

export interface DeleteOptions {
  force?: boolean;
  recursive?: boolean;
}

export interface AttachVcenterRequest {
  vcServerName: string;
  vcServerHost: string;
  vcAdminUser: string;
  vcAdminPassword: string;
  nsxServerName: string;
  nsxHost: string;
  nsxAdminUser: string;
  nsxAdminPassword: string;
  isEnabled: boolean;
}

/**
 * An authenticated conversation with vCloud Director on behalf of one actor.
 * Sessions are not shared between actors and must be logged out by whoever
 * logged them in.
 */
export interface VcdSession {
  readonly credentials: Readonly<Pick<VcdCredentials, 'org' | 'username'>>;
  readonly isLoggedIn: boolean;

  login(): Promise<void>;
  /** Safe to call on a session that is not logged in. */
  logout(): Promise<void>;

  /**
   * List resources of a kind. `scope` is the parent href for kinds that live
   * inside another object (users and roles in an org, networks in a VDC,
   * catalog items in a catalog, ...) and is ignored for system-wide kinds.
   */
  listResources(kind: ResourceKind, scope?: ResourceHandle): Promise<ResourceDescriptor[]>;
  getResource(href: ResourceHandle, kind?: ResourceKind): Promise<ResourceDescriptor>;
  createResource(scope: ResourceHandle | null, request: CreateRequest): Promise<CreateOutcome>;
  deleteResource(href: ResourceHandle, options?: DeleteOptions): Promise<TaskHandle>;

  /** @throws OperationNotSupportedError when the VDC is already in the requested state */
  setVdcEnabled(vdcHref: ResourceHandle, enabled: boolean): Promise<void>;
  isCatalogShared(catalogHref: ResourceHandle): Promise<boolean>;
  shareCatalog(catalogHref: ResourceHandle): Promise<void>;

  attachVcenter(request: AttachVcenterRequest): Promise<TaskHandle | null>;

  getTask(task: TaskHandle): Promise<TaskDescriptor>;
  getTaskMonitor(): TaskMonitor;
}

export interface VcdClientFactory {
  createSession(credentials: VcdCredentials): VcdSession;
}
