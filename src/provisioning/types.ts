// Provisioning-specific types
import type { ProvisionedResource, ResourceDescriptor, ResourceHandle, ResourceKind } from '../types';

/**
 * One family of remote resources the test environment depends on. `ensure`
 * is idempotent: it reuses what already exists and creates only what is
 * missing, recording every resolved handle in the environment.
 */
export interface ResourceManager<TResult = ProvisionedResource> {
  ensure(): Promise<TResult>;
}

/** A listing of candidates, either already fetched or fetched on demand. */
export type ListingSource = ResourceDescriptor[] | (() => Promise<ResourceDescriptor[]>);

export interface LocateOptions {
  kind: ResourceKind;
  /** Pick the first entry when nothing matches `desiredName`. */
  fallbackToFirst?: boolean;
  /** Extra filter applied before name matching. */
  matches?: (candidate: ResourceDescriptor) => boolean;
}

export interface DeletionOutcome {
  kind: ResourceKind;
  name: string;
  href: ResourceHandle | null;
  deleted: boolean;
}
