// Core type definitions for the vCloud Director test environment

export * from './errors';

/** Locator of a remote object; in practice the object's href. */
export type ResourceHandle = string;

export type ResourceKind =
  | 'pvdc'
  | 'storageProfile'
  | 'netpool'
  | 'org'
  | 'role'
  | 'user'
  | 'vdc'
  | 'network'
  | 'catalog'
  | 'catalogItem'
  | 'vapp'
  | 'vcenter';

export type ResourceAttributeValue = string | number | boolean | null;

export interface ResourceDescriptor {
  kind: ResourceKind;
  name: string;
  href: ResourceHandle;
  attributes: Record<string, ResourceAttributeValue>;
}

export enum TaskStatus {
  QUEUED = 'queued',
  PRE_RUNNING = 'preRunning',
  RUNNING = 'running',
  SUCCESS = 'success',
  ERROR = 'error',
  CANCELED = 'canceled',
  ABORTED = 'aborted'
}

export const TERMINAL_TASK_STATUSES: ReadonlySet<TaskStatus> = new Set([
  TaskStatus.SUCCESS,
  TaskStatus.ERROR,
  TaskStatus.CANCELED,
  TaskStatus.ABORTED
]);

export interface TaskHandle {
  href: string;
}

export interface TaskDescriptor extends TaskHandle {
  status: TaskStatus;
  operation: string;
  details?: string;
  errorMessage?: string;
}

export type ProvisionStatus = 'created' | 'reused';

export interface ProvisionedResource {
  kind: ResourceKind;
  name: string;
  href: ResourceHandle;
  status: ProvisionStatus;
}

export interface ProvisioningMetadata {
  runId: string;
  timestamp: Date;
  duration?: number;
}

export interface ProvisioningReport {
  resources: ProvisionedResource[];
  metadata: ProvisioningMetadata;
}

export interface TeardownReport {
  skipped: boolean;
  deleted: Array<{ kind: ResourceKind; name: string }>;
  alreadyAbsent: Array<{ kind: ResourceKind; name: string }>;
}

export interface GlobalSettings {
  developer_mode: boolean;
}

export interface ConnectionSettings {
  verify: boolean;
  disable_ssl_warnings: boolean;
}

export interface VcdSettings {
  host: string;
  api_version: string;
  sys_org_name: string;
  sys_admin_username: string;
  sys_admin_pass: string;
  default_org_user_password: string;
  default_pvdc_name: string;
  default_netpool_name: string;
  default_org_name: string;
  default_ovdc_name: string;
  default_storage_profile_name: string;
  default_network_quota: number;
  default_ovdc_network_name: string;
  default_ovdc_network_gateway_ip: string;
  default_ovdc_network_gateway_netmask: string;
  default_catalog_name: string;
  default_template_file_name: string;
  template_dir: string;
  default_vapp_name: string;
  default_vm_name: string;
}

export interface VcenterSettings {
  vcenter_host_name: string;
  vcenter_host_ip: string;
  vcenter_admin_username: string;
  vcenter_admin_password: string;
}

export interface NsxSettings {
  nsx_hostname: string;
  nsx_host_ip: string;
  nsx_admin_username: string;
  nsx_admin_password: string;
}

export interface LoggingSettings {
  default_log_filename: string | null;
  default_client_log_filename: string | null;
  log_requests: boolean;
  log_headers: boolean;
  log_bodies: boolean;
}

export interface TaskMonitorSettings {
  poll_interval_ms: number;
  timeout_ms: number;
}

export interface TestbedConfig {
  global: GlobalSettings;
  connection: ConnectionSettings;
  vcd: VcdSettings;
  vc?: VcenterSettings;
  nsx?: NsxSettings;
  logging: LoggingSettings;
  task_monitor: TaskMonitorSettings;
}
