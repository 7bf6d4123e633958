import { ConfigurationError, type ProvisionedResource, type ResourceDescriptor } from '../types';
import type { Environment } from '../orchestration/environment';
import type { VcdSession } from '../client/types';
import { BaseManager } from './base-manager';
import { findResource } from './resource-locator';
import type { ResourceManager } from './types';

/** Registers the configured vCenter and NSX manager with vCloud Director. */
export class VcenterManager extends BaseManager implements ResourceManager<ProvisionedResource | null> {
  constructor(environment: Environment) {
    super(environment, 'vcenter');
  }

  isConfigured(): boolean {
    return this.environment.config.vc !== undefined;
  }

  /** Attach the vCenter unless one of the same name already is. No-op without a `vc` section. */
  async ensure(): Promise<ProvisionedResource | null> {
    const { vc, nsx } = this.environment.config;
    if (vc === undefined) {
      return null;
    }
    if (nsx === undefined) {
      throw new ConfigurationError('An nsx section is required to attach a vCenter');
    }

    const client = await this.environment.getSysAdminClient();
    const existing = await this.find(client);
    if (existing !== null) {
      this.environment.markVcenterAttached();
      return this.provisioned(existing, 'reused');
    }

    this.logger.info(`Attaching vCenter ${vc.vcenter_host_name}`);
    const task = await client.attachVcenter({
      vcServerName: vc.vcenter_host_name,
      vcServerHost: vc.vcenter_host_ip,
      vcAdminUser: vc.vcenter_admin_username,
      vcAdminPassword: vc.vcenter_admin_password,
      nsxServerName: nsx.nsx_hostname,
      nsxHost: nsx.nsx_host_ip,
      nsxAdminUser: nsx.nsx_admin_username,
      nsxAdminPassword: nsx.nsx_admin_password,
      isEnabled: true
    });
    await this.waitForTask(client, task ?? undefined);

    const attached = await this.relocate(() => client.listResources('vcenter'), vc.vcenter_host_name, 'vcenter');
    this.environment.markVcenterAttached();
    return this.provisioned(attached, 'created');
  }

  async lookup(): Promise<ResourceDescriptor | null> {
    if (!this.isConfigured()) {
      return null;
    }
    const found = await this.find(await this.environment.getSysAdminClient());
    if (found !== null) {
      this.environment.markVcenterAttached();
    }
    return found;
  }

  private async find(client: VcdSession): Promise<ResourceDescriptor | null> {
    const name = this.environment.config.vc?.vcenter_host_name;
    if (name === undefined) {
      return null;
    }
    return findResource(() => client.listResources('vcenter'), name, { kind: 'vcenter' });
  }
}
