import {
  OperationNotSupportedError,
  isNotFoundError,
  type ProvisionedResource,
  type ResourceDescriptor,
  type ResourceHandle
} from '../types';
import type { Environment } from '../orchestration/environment';
import type { VcdSession } from '../client/types';
import { BaseManager } from './base-manager';
import { findResource, locateResource } from './resource-locator';
import type { DeletionOutcome } from './types';

/** The test org VDC and its isolated network. */
export class VdcManager extends BaseManager {
  constructor(environment: Environment) {
    super(environment, 'vdc');
  }

  async ensureVdc(): Promise<ProvisionedResource> {
    const orgHref = this.environment.require('org', 'vdc');
    const pvdcHref = this.environment.require('pvdc', 'vdc');
    const client = await this.environment.getSysAdminClient();
    const { vcd } = this.environment.config;

    const existing = await this.findVdc(client, orgHref);
    if (existing !== null) {
      this.environment.setVdcHref(existing.href);
      return this.provisioned(existing, 'reused');
    }

    const netpool = await locateResource(() => client.listResources('netpool'), vcd.default_netpool_name, {
      kind: 'netpool',
      fallbackToFirst: true,
      logger: this.logger
    });
    const storageProfile = await locateResource(
      () => client.listResources('storageProfile', pvdcHref),
      vcd.default_storage_profile_name,
      { kind: 'storageProfile', fallbackToFirst: true, logger: this.logger }
    );

    this.logger.info(`Creating VDC ${vcd.default_ovdc_name} on ${this.environment.getTestPvdcName()}`);
    const outcome = await client.createResource(orgHref, {
      kind: 'vdc',
      name: vcd.default_ovdc_name,
      providerVdcHref: pvdcHref,
      networkPoolHref: netpool.href,
      networkQuota: vcd.default_network_quota,
      storageProfiles: [
        { name: storageProfile.name, href: storageProfile.href, enabled: true, units: 'MB', limit: 0, default: true }
      ],
      usesFastProvisioning: true,
      isThinProvision: true
    });
    await this.waitForTask(client, outcome.task);

    const vdc = await this.relocate(() => client.listResources('vdc', orgHref), vcd.default_ovdc_name, 'vdc');
    this.environment.setVdcHref(vdc.href);
    return this.provisioned(vdc, 'created');
  }

  async ensureNetwork(): Promise<ProvisionedResource> {
    const vdcHref = this.environment.require('vdc', 'network');
    const client = await this.environment.getSysAdminClient();
    const { vcd } = this.environment.config;

    const existing = await this.findNetwork(client, vdcHref);
    if (existing !== null) {
      this.environment.markNetworkPresent();
      return this.provisioned(existing, 'reused');
    }

    this.logger.info(`Creating isolated network ${vcd.default_ovdc_network_name}`);
    const outcome = await client.createResource(vdcHref, {
      kind: 'network',
      name: vcd.default_ovdc_network_name,
      gatewayIp: vcd.default_ovdc_network_gateway_ip,
      netmask: vcd.default_ovdc_network_gateway_netmask
    });
    await this.waitForTask(client, outcome.task);

    const network = await this.relocate(
      () => client.listResources('network', vdcHref),
      vcd.default_ovdc_network_name,
      'network'
    );
    this.environment.markNetworkPresent();
    return this.provisioned(network, 'created');
  }

  /**
   * Disable and delete the test VDC with everything in it. A VDC that is
   * already disabled or already gone is not an error.
   */
  async deleteVdc(): Promise<DeletionOutcome> {
    const name = this.environment.getDefaultVdcName();
    const href = this.environment.has('vdc') ? this.environment.require('vdc') : (await this.lookupVdc())?.href;
    if (href === undefined) {
      return { kind: 'vdc', name, href: null, deleted: false };
    }

    const client = await this.environment.getSysAdminClient();
    try {
      await this.disable(client, href);
      this.logger.info(`Deleting VDC ${name}`);
      const task = await client.deleteResource(href, { force: true, recursive: true });
      await client.getTaskMonitor().waitForSuccess(task);
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.debug(`VDC ${name} is already gone`);
        return { kind: 'vdc', name, href, deleted: false };
      }
      throw error;
    }
    return { kind: 'vdc', name, href, deleted: true };
  }

  async lookupVdc(): Promise<ResourceDescriptor | null> {
    if (!this.environment.has('org')) {
      return null;
    }
    const vdc = await this.findVdc(await this.environment.getSysAdminClient(), this.environment.require('org'));
    if (vdc !== null) {
      this.environment.setVdcHref(vdc.href);
    }
    return vdc;
  }

  async lookupNetwork(): Promise<ResourceDescriptor | null> {
    if (!this.environment.has('vdc')) {
      return null;
    }
    const network = await this.findNetwork(await this.environment.getSysAdminClient(), this.environment.require('vdc'));
    if (network !== null) {
      this.environment.markNetworkPresent();
    }
    return network;
  }

  private async disable(client: VcdSession, href: ResourceHandle): Promise<void> {
    try {
      await client.setVdcEnabled(href, false);
    } catch (error) {
      if (error instanceof OperationNotSupportedError) {
        this.logger.debug(`VDC ${this.environment.getDefaultVdcName()} is already disabled`);
        return;
      }
      throw error;
    }
  }

  private async findVdc(client: VcdSession, orgHref: ResourceHandle): Promise<ResourceDescriptor | null> {
    return findResource(() => client.listResources('vdc', orgHref), this.environment.getDefaultVdcName(), {
      kind: 'vdc'
    });
  }

  private async findNetwork(client: VcdSession, vdcHref: ResourceHandle): Promise<ResourceDescriptor | null> {
    return findResource(
      () => client.listResources('network', vdcHref),
      this.environment.getDefaultOrgVdcNetworkName(),
      { kind: 'network' }
    );
  }
}
