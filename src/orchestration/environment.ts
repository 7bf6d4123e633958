import { join } from 'path';
import {
  ConfigurationError,
  DependencyNotResolvedError,
  type ResourceHandle,
  type TestbedConfig
} from '../types';
import { ALL_ROLES, CommonRole, roleForUsername, usernameForRole } from '../config/roles';
import { createLogger, createNullLogger, type Logger } from '../logging';
import { VcdRestClientFactory } from '../client/vcd-client';
import type { VcdClientFactory, VcdCredentials, VcdSession } from '../client/types';
import { withSession } from '../provisioning/session';
import type { ContextDependency, ProvisioningContext } from './types';

export interface EnvironmentDependencies {
  clientFactory?: VcdClientFactory;
  logger?: Logger;
}

export type HandleKind = 'pvdc' | 'org' | 'vdc' | 'catalog' | 'template' | 'vapp' | 'user';

function emptyContext(): ProvisioningContext {
  return {
    vcenterAttached: false,
    pvdcName: null,
    pvdcHref: null,
    orgHref: null,
    userHrefs: new Map(),
    vdcHref: null,
    networkPresent: false,
    catalogHref: null,
    templateHref: null,
    vappHref: null
  };
}

function clientFactoryFor(config: TestbedConfig): VcdClientFactory {
  const { logging, connection, vcd, task_monitor } = config;
  return new VcdRestClientFactory({
    host: vcd.host,
    apiVersion: vcd.api_version,
    verifySsl: connection.verify,
    logger: logging.default_client_log_filename
      ? createLogger({ name: 'vcd-testbed.client', filename: logging.default_client_log_filename })
      : createNullLogger('vcd-testbed.client'),
    logRequests: logging.log_requests,
    logHeaders: logging.log_headers,
    logBodies: logging.log_bodies,
    taskMonitor: {
      pollIntervalMs: task_monitor.poll_interval_ms,
      timeoutMs: task_monitor.timeout_ms
    }
  });
}

/**
 * State of one test run against vCloud Director: the validated configuration,
 * the system administrator session and every handle resolved while
 * provisioning. Test bodies read handles from here once provisioning is done.
 */
export class Environment {
  readonly config: TestbedConfig;
  readonly logger: Logger;
  private readonly clientFactory: VcdClientFactory;
  private sysAdminClient: VcdSession | null = null;
  private context: ProvisioningContext = emptyContext();

  private constructor(config: TestbedConfig, dependencies: EnvironmentDependencies) {
    this.config = config;
    this.logger =
      dependencies.logger ??
      (config.logging.default_log_filename
        ? createLogger({ name: 'vcd-testbed', filename: config.logging.default_log_filename })
        : createNullLogger('vcd-testbed'));
    this.clientFactory = dependencies.clientFactory ?? clientFactoryFor(config);
  }

  /**
   * Build the environment for a test run. No remote call is made until a
   * session is requested.
   */
  static init(config: TestbedConfig, dependencies: EnvironmentDependencies = {}): Environment {
    if (!config.vcd.host) {
      throw new ConfigurationError('Missing base configuration: vcd.host');
    }
    const environment = new Environment(config, dependencies);
    if (!config.connection.verify && !config.connection.disable_ssl_warnings) {
      environment.logger.warn(`TLS certificate verification is disabled for ${config.vcd.host}`);
    }
    return environment;
  }

  /** Session of the system administrator, logged in on first use. */
  async getSysAdminClient(): Promise<VcdSession> {
    if (this.sysAdminClient === null) {
      const { sys_org_name, sys_admin_username, sys_admin_pass } = this.config.vcd;
      const client = this.createClient({ org: sys_org_name, username: sys_admin_username, password: sys_admin_pass });
      await client.login();
      this.sysAdminClient = client;
    }
    return this.sysAdminClient;
  }

  /** A not yet logged in session for an arbitrary user. */
  createClient(credentials: VcdCredentials): VcdSession {
    return this.clientFactory.createSession(credentials);
  }

  /** A not yet logged in session for the test user holding `role`. */
  getClientInDefaultOrg(role: CommonRole): VcdSession {
    return this.createClient({
      org: this.config.vcd.default_org_name,
      username: usernameForRole(role),
      password: this.config.vcd.default_org_user_password
    });
  }

  /** Run `body` as the test user holding `role`, logging out afterwards. */
  async withClient<T>(role: CommonRole, body: (session: VcdSession) => Promise<T>): Promise<T> {
    return withSession(this.getClientInDefaultOrg(role), body, this.logger);
  }

  has(dependency: ContextDependency): boolean {
    const context = this.context;
    switch (dependency) {
      case 'vcenter':
        return context.vcenterAttached;
      case 'pvdc':
        return context.pvdcHref !== null;
      case 'org':
        return context.orgHref !== null;
      case 'users':
        return ALL_ROLES.every(role => context.userHrefs.has(role));
      case 'vdc':
        return context.vdcHref !== null;
      case 'network':
        return context.networkPresent;
      case 'catalog':
        return context.catalogHref !== null;
      case 'template':
        return context.templateHref !== null;
      case 'vapp':
        return context.vappHref !== null;
    }
  }

  /**
   * Href of a resolved dependency.
   * @throws DependencyNotResolvedError when the dependency is not in the context
   */
  require(dependency: 'pvdc' | 'org' | 'vdc' | 'catalog' | 'template' | 'vapp', step?: string): ResourceHandle {
    const href = this.lookup(dependency);
    if (href === null) {
      throw new DependencyNotResolvedError(dependency, step);
    }
    return href;
  }

  /** Like {@link require}, for flags and the per-role users. */
  assertResolved(dependency: ContextDependency, step?: string): void {
    if (!this.has(dependency)) {
      throw new DependencyNotResolvedError(dependency, step);
    }
  }

  requireUser(role: CommonRole, step?: string): ResourceHandle {
    const href = this.context.userHrefs.get(role);
    if (href === undefined) {
      throw new DependencyNotResolvedError(`user ${usernameForRole(role)}`, step);
    }
    return href;
  }

  /**
   * Handle of a provisioned resource. For `user`, `name` is either the
   * username or the role of the user.
   */
  getHandle(kind: HandleKind, name?: string): ResourceHandle {
    if (kind === 'user') {
      const role = name === undefined ? undefined : (roleForUsername(name) ?? ALL_ROLES.find(r => r === name));
      if (role === undefined) {
        throw new DependencyNotResolvedError(`user ${name ?? '<unnamed>'}`);
      }
      return this.requireUser(role);
    }
    return this.require(kind);
  }

  markVcenterAttached(): void {
    this.context.vcenterAttached = true;
  }

  setPvdc(name: string, href: ResourceHandle): void {
    this.context.pvdcName = name;
    this.context.pvdcHref = href;
  }

  setOrgHref(href: ResourceHandle): void {
    this.context.orgHref = href;
  }

  setUserHref(role: CommonRole, href: ResourceHandle): void {
    this.context.userHrefs.set(role, href);
  }

  setVdcHref(href: ResourceHandle): void {
    this.context.vdcHref = href;
  }

  markNetworkPresent(): void {
    this.context.networkPresent = true;
  }

  setCatalogHref(href: ResourceHandle): void {
    this.context.catalogHref = href;
  }

  setTemplateHref(href: ResourceHandle): void {
    this.context.templateHref = href;
  }

  setVappHref(href: ResourceHandle): void {
    this.context.vappHref = href;
  }

  /** Copy of the provisioning context. */
  snapshot(): ProvisioningContext {
    return { ...this.context, userHrefs: new Map(this.context.userHrefs) };
  }

  getUsernameForRole(role: CommonRole): string {
    return usernameForRole(role);
  }

  getUserHref(username: string): ResourceHandle {
    return this.getHandle('user', username);
  }

  getTestPvdcName(): string {
    if (this.context.pvdcName === null) {
      throw new DependencyNotResolvedError('pvdc');
    }
    return this.context.pvdcName;
  }

  getDefaultOrgName(): string {
    return this.config.vcd.default_org_name;
  }

  getDefaultVdcName(): string {
    return this.config.vcd.default_ovdc_name;
  }

  getDefaultCatalogName(): string {
    return this.config.vcd.default_catalog_name;
  }

  getDefaultTemplateName(): string {
    return this.config.vcd.default_template_file_name;
  }

  getDefaultTemplatePath(): string {
    return join(this.config.vcd.template_dir, this.config.vcd.default_template_file_name);
  }

  getDefaultOrgVdcNetworkName(): string {
    return this.config.vcd.default_ovdc_network_name;
  }

  getDefaultVAppName(): string {
    return this.config.vcd.default_vapp_name;
  }

  getDefaultVmName(): string {
    return this.config.vcd.default_vm_name;
  }

  isDeveloperMode(): boolean {
    return this.config.global.developer_mode;
  }

  /**
   * Log out the system administrator and forget every resolved handle.
   */
  async reset(): Promise<void> {
    const client = this.sysAdminClient;
    this.sysAdminClient = null;
    this.context = emptyContext();
    if (client !== null) {
      await client.logout();
    }
  }

  private lookup(dependency: 'pvdc' | 'org' | 'vdc' | 'catalog' | 'template' | 'vapp'): ResourceHandle | null {
    switch (dependency) {
      case 'pvdc':
        return this.context.pvdcHref;
      case 'org':
        return this.context.orgHref;
      case 'vdc':
        return this.context.vdcHref;
      case 'catalog':
        return this.context.catalogHref;
      case 'template':
        return this.context.templateHref;
      case 'vapp':
        return this.context.vappHref;
    }
  }
}
