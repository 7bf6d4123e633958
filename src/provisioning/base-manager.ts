import {
  RemoteOperationError,
  type ProvisionStatus,
  type ProvisionedResource,
  type ResourceDescriptor,
  type ResourceKind,
  type TaskHandle
} from '../types';
import type { Logger } from '../logging';
import type { VcdSession } from '../client/types';
import type { Environment } from '../orchestration/environment';
import { findResource } from './resource-locator';
import type { ListingSource } from './types';

export abstract class BaseManager {
  protected readonly logger: Logger;

  constructor(protected readonly environment: Environment, loggerName: string) {
    this.logger = environment.logger.child(loggerName);
  }

  protected async waitForTask(session: VcdSession, task: TaskHandle | undefined): Promise<void> {
    if (task !== undefined) {
      await session.getTaskMonitor().waitForSuccess(task);
    }
  }

  /**
   * Find a resource that was just created. Creation responses carry the admin
   * view of orgs, VDCs and catalogs; listing the parent again yields the href
   * non-administrators can use.
   */
  protected async relocate(listing: ListingSource, name: string, kind: ResourceKind): Promise<ResourceDescriptor> {
    const found = await findResource(listing, name, { kind });
    if (found === null) {
      throw new RemoteOperationError(`Created ${kind} ${name} but it is not listed`);
    }
    return found;
  }

  protected provisioned(descriptor: ResourceDescriptor, status: ProvisionStatus): ProvisionedResource {
    this.logger.debug(`${status === 'created' ? 'Created' : 'Reusing existing'} ${descriptor.kind} ${descriptor.name}`);
    return { kind: descriptor.kind, name: descriptor.name, href: descriptor.href, status };
  }
}
