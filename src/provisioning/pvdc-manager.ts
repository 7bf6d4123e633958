import type { ProvisionedResource, ResourceDescriptor } from '../types';
import type { Environment } from '../orchestration/environment';
import { BaseManager } from './base-manager';
import { findResource, locateResource } from './resource-locator';
import type { ResourceManager } from './types';

/**
 * Provider VDCs are backed by vSphere resources and cannot be created from
 * here; the configured one is looked up, or the first one available.
 */
export class PvdcManager extends BaseManager implements ResourceManager {
  constructor(environment: Environment) {
    super(environment, 'pvdc');
  }

  async ensure(): Promise<ProvisionedResource> {
    const client = await this.environment.getSysAdminClient();
    const pvdc = await locateResource(() => client.listResources('pvdc'), this.environment.config.vcd.default_pvdc_name, {
      kind: 'pvdc',
      fallbackToFirst: true,
      logger: this.logger
    });
    this.environment.setPvdc(pvdc.name, pvdc.href);
    return this.provisioned(pvdc, 'reused');
  }

  async lookup(): Promise<ResourceDescriptor | null> {
    const client = await this.environment.getSysAdminClient();
    const pvdc = await findResource(() => client.listResources('pvdc'), this.environment.config.vcd.default_pvdc_name, {
      kind: 'pvdc',
      fallbackToFirst: true
    });
    if (pvdc !== null) {
      this.environment.setPvdc(pvdc.name, pvdc.href);
    }
    return pvdc;
  }
}
