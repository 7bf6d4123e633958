import { access } from 'fs/promises';
import {
  ConfigurationError,
  RemoteOperationError,
  type ProvisionedResource,
  type ResourceDescriptor,
  type ResourceHandle
} from '../types';
import { CommonRole } from '../config/roles';
import type { Environment } from '../orchestration/environment';
import type { VcdSession } from '../client/types';
import { BaseManager } from './base-manager';
import { findResource } from './resource-locator';

/**
 * The test catalog and the template uploaded to it. Both are owned by the
 * catalog author of the test org.
 */
export class CatalogManager extends BaseManager {
  constructor(environment: Environment) {
    super(environment, 'catalog');
  }

  async ensureCatalog(): Promise<ProvisionedResource> {
    const orgHref = this.environment.require('org', 'catalog');
    this.environment.requireUser(CommonRole.CATALOG_AUTHOR, 'catalog');
    const name = this.environment.getDefaultCatalogName();

    return this.environment.withClient(CommonRole.CATALOG_AUTHOR, async client => {
      const existing = await this.findCatalog(client, orgHref);
      if (existing !== null) {
        this.environment.setCatalogHref(existing.href);
        return this.provisioned(existing, 'reused');
      }

      this.logger.info(`Creating catalog ${name}`);
      const outcome = await client.createResource(orgHref, { kind: 'catalog', name, description: '' });
      await this.waitForTask(client, outcome.task);

      const catalog = await this.relocate(() => client.listResources('catalog', orgHref), name, 'catalog');
      this.environment.setCatalogHref(catalog.href);
      return this.provisioned(catalog, 'created');
    });
  }

  /**
   * Share the test catalog with every member of the test org.
   * @returns whether the catalog had to be shared
   */
  async ensureShared(): Promise<boolean> {
    const catalogHref = this.environment.require('catalog', 'catalog sharing');
    const client = await this.environment.getSysAdminClient();
    if (await client.isCatalogShared(catalogHref)) {
      return false;
    }
    this.logger.debug(`Sharing catalog ${this.environment.getDefaultCatalogName()} with all members of the org`);
    await client.shareCatalog(catalogHref);
    return true;
  }

  /**
   * Upload the configured OVF template unless the catalog already has an item
   * of that name.
   */
  async ensureTemplate(): Promise<ProvisionedResource> {
    const catalogHref = this.environment.require('catalog', 'template');
    this.environment.requireUser(CommonRole.CATALOG_AUTHOR, 'template');
    const name = this.environment.getDefaultTemplateName();

    return this.environment.withClient(CommonRole.CATALOG_AUTHOR, async client => {
      const existing = await this.findTemplate(client, catalogHref);
      if (existing !== null) {
        this.environment.setTemplateHref(await this.templateHrefOf(client, existing));
        return this.provisioned(existing, 'reused');
      }

      const ovfPath = this.environment.getDefaultTemplatePath();
      try {
        await access(ovfPath);
      } catch (error) {
        throw new ConfigurationError(`Template ${ovfPath} cannot be read`, [
          error instanceof Error ? error.message : String(error)
        ]);
      }

      this.logger.info(`Uploading template ${name} to catalog ${this.environment.getDefaultCatalogName()}`);
      const outcome = await client.createResource(catalogHref, { kind: 'template', name, ovfPath });
      await this.waitForTask(client, outcome.task);

      this.environment.setTemplateHref(await this.templateHrefOf(client, outcome.descriptor));
      return this.provisioned(outcome.descriptor, 'created');
    });
  }

  async lookupCatalog(): Promise<ResourceDescriptor | null> {
    if (!this.environment.has('org')) {
      return null;
    }
    const catalog = await this.findCatalog(await this.environment.getSysAdminClient(), this.environment.require('org'));
    if (catalog !== null) {
      this.environment.setCatalogHref(catalog.href);
    }
    return catalog;
  }

  async lookupTemplate(): Promise<ResourceDescriptor | null> {
    if (!this.environment.has('catalog')) {
      return null;
    }
    const client = await this.environment.getSysAdminClient();
    const item = await this.findTemplate(client, this.environment.require('catalog'));
    if (item !== null) {
      this.environment.setTemplateHref(await this.templateHrefOf(client, item));
    }
    return item;
  }

  /** The vApp template behind a catalog item. */
  private async templateHrefOf(client: VcdSession, item: ResourceDescriptor): Promise<ResourceHandle> {
    const known = item.attributes.entityHref;
    if (typeof known === 'string') {
      return known;
    }
    const entityHref = (await client.getResource(item.href, 'catalogItem')).attributes.entityHref;
    if (typeof entityHref !== 'string') {
      throw new RemoteOperationError(`Catalog item ${item.name} does not reference a template`);
    }
    return entityHref;
  }

  private async findCatalog(client: VcdSession, orgHref: ResourceHandle): Promise<ResourceDescriptor | null> {
    return findResource(() => client.listResources('catalog', orgHref), this.environment.getDefaultCatalogName(), {
      kind: 'catalog'
    });
  }

  private async findTemplate(client: VcdSession, catalogHref: ResourceHandle): Promise<ResourceDescriptor | null> {
    return findResource(
      () => client.listResources('catalogItem', catalogHref),
      this.environment.getDefaultTemplateName(),
      { kind: 'catalogItem' }
    );
  }
}
