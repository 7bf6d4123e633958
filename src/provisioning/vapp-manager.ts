import { isNotFoundError, type ProvisionedResource, type ResourceDescriptor, type ResourceHandle } from '../types';
import { CommonRole } from '../config/roles';
import type { Environment } from '../orchestration/environment';
import type { VcdSession } from '../client/types';
import { BaseManager } from './base-manager';
import { findResource } from './resource-locator';
import type { DeletionOutcome, ResourceManager } from './types';

export class VAppManager extends BaseManager implements ResourceManager {
  constructor(environment: Environment) {
    super(environment, 'vapp');
  }

  /** Instantiate the test template as the test vApp, accepting its EULAs. */
  async ensure(): Promise<ProvisionedResource> {
    const vdcHref = this.environment.require('vdc', 'vapp');
    const templateHref = this.environment.require('template', 'vapp');
    this.environment.assertResolved('network', 'vapp');
    const name = this.environment.getDefaultVAppName();

    return this.environment.withClient(CommonRole.CATALOG_AUTHOR, async client => {
      const existing = await this.find(client, vdcHref);
      if (existing !== null) {
        this.environment.setVappHref(existing.href);
        return this.provisioned(existing, 'reused');
      }

      this.logger.info(`Instantiating vApp ${name}`);
      const outcome = await client.createResource(vdcHref, { kind: 'vapp', name, templateHref, acceptAllEulas: true });
      await this.waitForTask(client, outcome.task);

      this.environment.setVappHref(outcome.descriptor.href);
      return this.provisioned(outcome.descriptor, 'created');
    });
  }

  /** Delete the test vApp as the org administrator; an absent vApp is not an error. */
  async delete(): Promise<DeletionOutcome> {
    const name = this.environment.getDefaultVAppName();
    const href = this.environment.has('vapp') ? this.environment.require('vapp') : (await this.lookup())?.href;
    if (href === undefined) {
      return { kind: 'vapp', name, href: null, deleted: false };
    }

    try {
      await this.environment.withClient(CommonRole.ORGANIZATION_ADMINISTRATOR, async client => {
        this.logger.info(`Deleting vApp ${name}`);
        const task = await client.deleteResource(href, { force: true });
        await client.getTaskMonitor().waitForSuccess(task);
      });
    } catch (error) {
      if (isNotFoundError(error)) {
        this.logger.debug(`vApp ${name} is already gone`);
        return { kind: 'vapp', name, href, deleted: false };
      }
      throw error;
    }
    return { kind: 'vapp', name, href, deleted: true };
  }

  async lookup(): Promise<ResourceDescriptor | null> {
    if (!this.environment.has('vdc')) {
      return null;
    }
    const vapp = await this.find(await this.environment.getSysAdminClient(), this.environment.require('vdc'));
    if (vapp !== null) {
      this.environment.setVappHref(vapp.href);
    }
    return vapp;
  }

  private async find(client: VcdSession, vdcHref: ResourceHandle): Promise<ResourceDescriptor | null> {
    return findResource(() => client.listResources('vapp', vdcHref), this.environment.getDefaultVAppName(), {
      kind: 'vapp'
    });
  }
}
